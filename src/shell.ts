import { exec, spawn } from 'child_process';
import { promisify } from 'util';
import chalk from 'chalk';
import ora from 'ora';
import { CommandFailedError } from './errors.js';

const execAsync = promisify(exec);

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  debug?: boolean;
}

/**
 * Run a program without a shell, capturing stderr for the error report.
 * stdout is ignored so it does not interfere with spinners.
 */
export function runCommand(file: string, args: string[], options: RunOptions = {}): Promise<void> {
  const display = [file, ...args].join(' ');
  if (options.debug) {
    console.error(chalk.gray(`$ ${display}`));
  }

  return new Promise((resolve, reject) => {
    let stderr = '';

    const child = spawn(file, args, {
      cwd: options.cwd,
      stdio: ['ignore', 'ignore', 'pipe'],
      env: options.env || process.env
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code) => {
      if (code === 0) {
        resolve();
      } else {
        reject(new CommandFailedError(display, code, stderr.trim()));
      }
    });

    child.on('error', (error) => {
      reject(error);
    });
  });
}

/**
 * Run a command behind an ora spinner that shows the command line while it runs.
 */
export async function runWithSpinner(
  label: string,
  file: string,
  args: string[],
  options: RunOptions = {}
): Promise<void> {
  const spinner = ora({
    text: `${chalk.bold(label)}: ${chalk.gray([file, ...args].join(' '))}`,
    prefixText: '🔄',
    stream: process.stdout
  }).start();

  try {
    await runCommand(file, args, options);
    spinner.succeed(chalk.green(label));
  } catch (error) {
    spinner.fail(chalk.red(`${label} failed`));
    if (error instanceof CommandFailedError && error.stderr) {
      console.error(chalk.gray(`   Error: ${error.stderr.split('\n')[0]}`));
    }
    throw error;
  }
}

export async function isAvailable(command: string): Promise<boolean> {
  try {
    await execAsync(`command -v ${command}`);
    return true;
  } catch {
    return false;
  }
}
