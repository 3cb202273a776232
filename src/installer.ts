import path from 'path';
import chalk from 'chalk';
import { runWithSpinner } from './shell.js';
import type { Installer } from './types.js';

export interface CommandInstallerOptions {
  basepath: string;
  debug?: boolean;
}

/**
 * Installs through the tendril build engine and refreshes the apt index
 * that lives under the same prefix.
 */
export class CommandInstaller implements Installer {
  constructor(private readonly options: CommandInstallerOptions) {}

  private bin(name: string): string {
    return path.join(this.options.basepath, 'bin', name);
  }

  async install(names: string[]): Promise<void> {
    // Nothing to install
    if (names.length === 0) {
      return;
    }

    console.log(chalk.bold.cyan(`\n🚀 Updating ${names.length} package(s): ${names.join(', ')}\n`));

    await runWithSpinner(
      `Installing ${names.join(' ')}`,
      this.bin('tendril-install'),
      ['--yes', ...names],
      // Batch mode: the build engine must not stop for questions
      { debug: this.options.debug, env: { ...process.env, TENDRIL_NONINTERACTIVE: '1' } }
    );
  }

  /** Resolves to false instead of rejecting; a stale index is recoverable */
  async refreshIndex(): Promise<boolean> {
    try {
      await runWithSpinner('Updating apt index', this.bin('apt-get'), ['update'], {
        debug: this.options.debug
      });
      return true;
    } catch {
      return false;
    }
  }
}
