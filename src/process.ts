import { spawnSync } from 'child_process';
import type { ProcessControl } from './types.js';

/**
 * Node cannot replace its own process image, so the new executable runs in
 * the foreground with our stdio and this process exits with its status.
 */
export class NodeProcessControl implements ProcessControl {
  replace(executable: string, args: string[]): Error {
    const result = spawnSync(executable, args, { stdio: 'inherit' });
    if (result.error) {
      return result.error;
    }
    process.exit(result.status ?? 1);
  }
}
