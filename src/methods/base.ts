import { promises as fs } from 'fs';
import path from 'path';
import type { UpdateMethod, UpdateStrategy } from '../types.js';

export interface StrategyPaths {
  basepath: string;
  debug?: boolean;
}

export function stateDir(basepath: string): string {
  return path.join(basepath, 'var', 'lib', 'tendril');
}

export function descriptionsDir(basepath: string): string {
  return path.join(basepath, 'share', 'tendril', 'descriptions');
}

/**
 * Shared stamp handling. Each method owns one stamp file; subclasses
 * provide the transfer itself and the metadata they leave in the tree.
 */
export abstract class StampedStrategy implements UpdateStrategy {
  abstract readonly method: UpdateMethod;

  constructor(protected readonly paths: StrategyPaths) {}

  abstract systemCheck(): Promise<boolean>;
  abstract doDirect(): Promise<void>;
  abstract clearMetadata(): Promise<void>;

  get stampPath(): string {
    return path.join(stateDir(this.paths.basepath), `stamp-${this.method}`);
  }

  get treePath(): string {
    return descriptionsDir(this.paths.basepath);
  }

  async stampSet(): Promise<void> {
    await fs.mkdir(path.dirname(this.stampPath), { recursive: true });
    await fs.writeFile(this.stampPath, new Date().toISOString() + '\n', 'utf-8');
  }

  async stampClear(): Promise<void> {
    await fs.rm(this.stampPath, { force: true });
  }

  async isStamped(): Promise<boolean> {
    try {
      await fs.access(this.stampPath);
      return true;
    } catch {
      return false;
    }
  }
}
