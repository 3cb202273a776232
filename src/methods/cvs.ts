import { promises as fs, type Dirent } from 'fs';
import path from 'path';
import { isAvailable, runWithSpinner } from '../shell.js';
import { StampedStrategy, type StrategyPaths } from './base.js';

export class CvsStrategy extends StampedStrategy {
  readonly method = 'cvs' as const;

  constructor(paths: StrategyPaths, private readonly cvsRoot: string) {
    super(paths);
  }

  systemCheck(): Promise<boolean> {
    return isAvailable('cvs');
  }

  async doDirect(): Promise<void> {
    const label = 'Synchronizing package descriptions (cvs)';
    const options = { debug: this.paths.debug };

    if (await exists(path.join(this.treePath, 'CVS'))) {
      await runWithSpinner(label, 'cvs', ['-z3', 'update', '-d', '-P'], { ...options, cwd: this.treePath });
      return;
    }

    const parent = path.dirname(this.treePath);
    await fs.mkdir(parent, { recursive: true });
    await runWithSpinner(
      label,
      'cvs',
      ['-z3', '-d', this.cvsRoot, 'checkout', '-P', '-d', path.basename(this.treePath), 'descriptions'],
      { ...options, cwd: parent }
    );
  }

  /** Removes every CVS bookkeeping directory in the description tree */
  async clearMetadata(): Promise<void> {
    for (const dir of await findCvsDirs(this.treePath)) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function findCvsDirs(root: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const found: string[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue;
    }
    const full = path.join(root, entry.name);
    if (entry.name === 'CVS') {
      found.push(full);
    } else {
      found.push(...await findCvsDirs(full));
    }
  }
  return found;
}
