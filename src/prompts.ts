import { confirm, select } from '@inquirer/prompts';
import chalk from 'chalk';
import type { Prompter, SelectChoice } from './types.js';

export class InquirerPrompter implements Prompter {
  async select<T extends string>(options: {
    message: string;
    intro?: string;
    choices: SelectChoice<T>[];
    default: T;
  }): Promise<T> {
    if (options.intro) {
      console.log(chalk.bold(`\n${options.intro}\n`));
    }
    return select<T>({
      message: options.message,
      choices: options.choices,
      default: options.default
    });
  }

  confirm(options: { message: string; default: boolean }): Promise<boolean> {
    return confirm(options);
  }
}
