import { SELF_UPDATE_METHOD_KEY } from './config.js';
import { StrategyUnavailableError } from './errors.js';
import { doFinish, type FinishOutcome } from './finalizer.js';
import { KNOWN_METHODS, strategyFor } from './methods/registry.js';
import { selectMethod, type RequestedMethod } from './selector.js';
import type { SelfUpdateContext, UpdateMethod } from './types.js';

export type SelfUpdateResult =
  | { status: 'declined' }
  | { status: FinishOutcome; method: UpdateMethod };

/**
 * One update cycle with an already resolved method. `changed` says whether
 * the method differs from the saved preference.
 */
export async function runUpdateCycle(
  ctx: SelfUpdateContext,
  method: UpdateMethod,
  changed: boolean
): Promise<FinishOutcome> {
  const strategy = strategyFor(ctx.strategies, method);

  // the method must be usable before anything is changed
  if (!await strategy.systemCheck()) {
    throw new StrategyUnavailableError(method);
  }

  // save the new selection (explicit change or first time)
  if (changed) {
    ctx.reporter.breaking(`tendril is setting your default update method to ${method}`);
    ctx.config.setParam(SELF_UPDATE_METHOD_KEY, method);
    await ctx.config.save();
  }

  // clear remnants of every method other than the one in use
  for (const other of KNOWN_METHODS) {
    if (other === method) {
      continue;
    }
    await ctx.strategies[other].stampClear();
    await ctx.strategies[other].clearMetadata();
  }

  // refresh the descriptions, then mark this method as the active one
  await strategy.doDirect();
  await strategy.stampSet();

  return doFinish(ctx);
}

/**
 * Entry point for `tendril selfupdate [method]`.
 */
export async function runSelfUpdate(
  ctx: SelfUpdateContext,
  requested?: RequestedMethod
): Promise<SelfUpdateResult> {
  const selection = await selectMethod(ctx, requested);
  if (selection.kind === 'declined') {
    return { status: 'declined' };
  }

  const status = await runUpdateCycle(ctx, selection.method, selection.changed);
  return { status, method: selection.method };
}
