import path from 'path';
import { ReexecError } from './errors.js';
import type { SelfUpdateContext } from './types.js';

/** Name of the package manager's own package in the collection */
export const SELF_PACKAGE = 'tendril';

export const FINISH_COMMAND = 'selfupdate-finish';

export type FinishOutcome = 'finished' | 'handed-off';

export interface EssentialSet {
  packages: string[];
  runtimeSupported: boolean;
}

/**
 * Phase A: refresh the index, reload package data, and upgrade the manager
 * itself before anything else. When it was upgraded, the rest of the work
 * is handed to the new binary.
 */
export async function doFinish(ctx: SelfUpdateContext): Promise<FinishOutcome> {
  // update the apt index; a stale one only warrants a warning
  let indexed: boolean;
  try {
    indexed = await ctx.installer.refreshIndex();
  } catch (error) {
    ctx.reporter.warn(`Updating the package index failed: ${error instanceof Error ? error.message : String(error)}`);
    indexed = false;
  }
  if (!indexed) {
    ctx.reporter.warn("Running 'tendril scanpackages' may fix indexing problems.");
  }

  // drop cached package data and read the refreshed descriptions
  ctx.packages.forgetAll();
  await ctx.packages.reloadAll();

  // the manager itself goes first when a newer version is available
  const self = ctx.packages.lookupByName(SELF_PACKAGE);
  if (!self || self.isInstalled()) {
    await finish(ctx);
    return 'finished';
  }

  await ctx.installer.install([SELF_PACKAGE]);

  // the new process must finish the same installation
  ctx.reporter.info('Re-executing tendril to use the new version...');
  const failure = ctx.processControl.replace(
    path.join(ctx.basepath, 'bin', 'tendril'),
    ['--basepath', ctx.basepath, FINISH_COMMAND]
  );
  if (failure) {
    throw new ReexecError(failure);
  }
  return 'handed-off';
}

export function essentialPackageSet(ctx: Pick<SelfUpdateContext, 'packages' | 'additionalPackages'>): EssentialSet {
  const packages = ctx.packages.listEssential();
  const { packages: important, runtimeSupported } = ctx.additionalPackages();

  for (const name of important) {
    // only the important ones that are already installed
    if (ctx.packages.lookupByName(name)?.isAnyVersionInstalled() && !packages.includes(name)) {
      packages.push(name);
    }
  }

  return { packages, runtimeSupported };
}

/**
 * Phase B: bring the essential packages up to date. Runs right after
 * `doFinish`, or on its own as `tendril selfupdate-finish` in a freshly
 * started process.
 */
export async function finish(ctx: SelfUpdateContext): Promise<void> {
  const { packages, runtimeSupported } = essentialPackageSet(ctx);

  if (!runtimeSupported) {
    ctx.reporter.warn(
      `WARNING! This version of Node.js (${ctx.runtimeVersion}) is not currently supported by tendril. `
      + 'Updating anyway, but you may encounter problems.'
    );
  }

  await ctx.installer.install(packages);

  // tell the user what has happened
  ctx.reporter.breaking(
    '\nThe core packages have been updated. You should now update the other packages '
    + "using commands like 'tendril update-all'.\n"
  );
}

/**
 * `tendril selfupdate-finish`: Phase B in a process started after the
 * manager upgraded itself. Package data is loaded fresh first.
 */
export async function finishStandalone(ctx: SelfUpdateContext): Promise<void> {
  await ctx.packages.reloadAll();
  await finish(ctx);
}
