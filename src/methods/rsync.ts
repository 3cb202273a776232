import { promises as fs } from 'fs';
import path from 'path';
import { isAvailable, runWithSpinner } from '../shell.js';
import { StampedStrategy, type StrategyPaths } from './base.js';

export class RsyncStrategy extends StampedStrategy {
  readonly method = 'rsync' as const;

  constructor(paths: StrategyPaths, private readonly mirror: string) {
    super(paths);
  }

  systemCheck(): Promise<boolean> {
    return isAvailable('rsync');
  }

  async doDirect(): Promise<void> {
    await fs.mkdir(this.treePath, { recursive: true });
    const source = this.mirror.endsWith('/') ? this.mirror : `${this.mirror}/`;
    await runWithSpinner(
      'Synchronizing package descriptions (rsync)',
      'rsync',
      ['-rtz', '--delete-after', source, `${this.treePath}/`],
      { debug: this.paths.debug }
    );
  }

  async clearMetadata(): Promise<void> {
    await fs.rm(path.join(this.treePath, 'TIMESTAMP'), { force: true });
  }
}
