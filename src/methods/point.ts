import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { CommandFailedError } from '../errors.js';
import { isAvailable, runWithSpinner } from '../shell.js';
import { StampedStrategy, type StrategyPaths } from './base.js';

/**
 * Replaces the description tree with the tarball published for the latest
 * point release.
 */
export class PointStrategy extends StampedStrategy {
  readonly method = 'point' as const;

  constructor(paths: StrategyPaths, private readonly url: string) {
    super(paths);
  }

  systemCheck(): Promise<boolean> {
    return isAvailable('tar');
  }

  async doDirect(): Promise<void> {
    const workDir = await fs.mkdtemp(path.join(tmpdir(), 'tendril-point-'));
    const archive = path.join(workDir, 'descriptions.tar.gz');

    try {
      await this.download(archive);
      await fs.mkdir(this.treePath, { recursive: true });
      await runWithSpinner(
        'Unpacking package descriptions',
        'tar',
        ['-xzf', archive, '-C', this.treePath, '--strip-components=1'],
        { debug: this.paths.debug }
      );
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  async clearMetadata(): Promise<void> {
    await fs.rm(path.join(this.treePath, 'VERSION'), { force: true });
  }

  private async download(target: string): Promise<void> {
    const spinner = ora({
      text: `Downloading ${chalk.gray(this.url)}`,
      prefixText: '🔄',
      stream: process.stdout
    }).start();

    try {
      const response = await fetch(this.url);
      if (!response.ok) {
        throw new CommandFailedError(`GET ${this.url}`, response.status, response.statusText);
      }
      await fs.writeFile(target, Buffer.from(await response.arrayBuffer()));
    } catch (error) {
      spinner.fail(chalk.red('Download failed'));
      throw error;
    }

    spinner.succeed(chalk.green('Downloaded point release descriptions'));
  }
}
