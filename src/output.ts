import chalk from 'chalk';
import wrapAnsi from 'wrap-ansi';
import type { Reporter } from './types.js';

const DEFAULT_COLUMNS = 80;

function terminalColumns(): number {
  return process.stdout.isTTY && process.stdout.columns ? process.stdout.columns : DEFAULT_COLUMNS;
}

/**
 * Wraps each paragraph of `message` to `columns`, keeping the blank lines
 * between paragraphs.
 */
export function breakLines(message: string, columns: number = terminalColumns()): string {
  return message
    .split('\n')
    .map(line => wrapAnsi(line.trim(), columns, { hard: false, trim: true }))
    .join('\n');
}

export class ConsoleReporter implements Reporter {
  constructor(private readonly columns?: number) {}

  breaking(message: string): void {
    console.log(breakLines(message, this.columns));
  }

  info(message: string): void {
    console.log(chalk.cyan(breakLines(message, this.columns)));
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`⚠️  ${breakLines(message, this.columns)}`));
  }
}

export function printError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`❌ ${message}`));
}
