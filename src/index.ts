#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { isRuntimeSupported } from './bootstrap.js';
import { loadSettings } from './config.js';
import { createContext } from './context.js';
import { finishStandalone } from './finalizer.js';
import { KNOWN_METHODS } from './methods/registry.js';
import { runSelfUpdate } from './orchestrator.js';
import { printError } from './output.js';
import { previousMethod } from './selector.js';
import type { SelfUpdateContext } from './types.js';

const program = new Command();

program
  .name('tendril')
  .description('tendril — package manager client')
  .version('0.4.0')
  .option('-b, --basepath <dir>', 'installation prefix (default: $TENDRIL_BASEPATH or /opt/tendril)');

async function withContext(action: (ctx: SelfUpdateContext) => Promise<void>): Promise<void> {
  try {
    const { basepath } = program.opts<{ basepath?: string }>();
    const ctx = await createContext(loadSettings(process.env, { basepath }));
    await action(ctx);
  } catch (error) {
    printError(error);
    process.exit(1);
  }
}

async function selfUpdate(ctx: SelfUpdateContext, method?: string): Promise<void> {
  const result = await runSelfUpdate(ctx, method);
  if (result.status === 'declined') {
    console.log(chalk.gray('\nSelfupdate method unchanged; nothing was updated.'));
  }
}

program
  .command('selfupdate [method]')
  .description('Update the package descriptions and the package manager itself')
  .action((method: string | undefined) => withContext(ctx => selfUpdate(ctx, method)));

for (const method of KNOWN_METHODS) {
  program
    .command(`selfupdate-${method}`)
    .description(`Switch the default selfupdate method to ${method} and update`)
    .action(() => withContext(ctx => selfUpdate(ctx, method)));
}

program
  .command('selfupdate-finish')
  .description('Update the essential packages (run after tendril upgraded itself)')
  .action(() => withContext(finishStandalone));

program
  .command('doctor')
  .description('Report the selfupdate method and the state of each method')
  .action(() => withContext(async ctx => {
    console.log(chalk.bold.cyan('\n🩺 Selfupdate Check:\n'));

    console.log(chalk.bold('Installation:'));
    console.log(chalk.gray(`  Base path: ${ctx.basepath}`));
    const saved = previousMethod(ctx);
    console.log(chalk.gray(`  SelfUpdateMethod: ${saved || '(not set)'}`));

    console.log(chalk.bold('\nNode.js:'));
    console.log(chalk.gray(`  Version: ${ctx.runtimeVersion}`));
    if (isRuntimeSupported(ctx.runtimeVersion)) {
      console.log(chalk.green('  ✅ Supported'));
    } else {
      console.log(chalk.yellow('  ⚠️  Not supported by the current package collection'));
    }

    console.log(chalk.bold('\nMethods:'));
    for (const method of KNOWN_METHODS) {
      const strategy = ctx.strategies[method];
      const usable = await strategy.systemCheck();
      const stamped = await strategy.isStamped();
      const mark = usable ? chalk.green(`  ✅ ${method}`) : chalk.gray(`  ○ ${method} (not usable)`);
      console.log(`${mark}${stamped ? chalk.cyan(' [active]') : ''}`);
    }

    console.log();
  }));

program.parseAsync().catch((error: unknown) => {
  printError(error);
  process.exit(1);
});
