import { SELF_UPDATE_METHOD_KEY } from './config.js';
import { UnknownMethodError } from './errors.js';
import { isUpdateMethod, KNOWN_METHODS, METHOD_DESCRIPTIONS } from './methods/registry.js';
import type { SelfUpdateContext, UpdateMethod } from './types.js';

export type MethodSelection =
  | { kind: 'selected'; method: UpdateMethod; previous: string; changed: boolean }
  | { kind: 'declined'; requested: string; previous: string };

export type RequestedMethod = string | number | undefined;

/** Codes accepted by the old numeric calling convention */
const LEGACY_CODES = new Map<string, string>([
  ['0', ''],
  ['1', 'cvs'],
  ['2', 'rsync']
]);

const DEFAULT_METHOD: UpdateMethod = 'rsync';

/**
 * Canonical, lower-case form of a requested method. An empty string means
 * no method was asked for.
 */
export function normalizeRequestedMethod(requested: RequestedMethod): string {
  if (requested === undefined) {
    return '';
  }
  const token = String(requested);
  return (LEGACY_CODES.get(token) ?? token).toLowerCase();
}

export function previousMethod(ctx: Pick<SelfUpdateContext, 'config'>): string {
  return ctx.config.getWithDefault(SELF_UPDATE_METHOD_KEY, '').toLowerCase();
}

/**
 * Decides which method this run uses. Nothing is written here; the
 * orchestrator persists the choice once the method passes its system check.
 */
export async function selectMethod(
  ctx: Pick<SelfUpdateContext, 'config' | 'prompter' | 'reporter'>,
  requested?: RequestedMethod
): Promise<MethodSelection> {
  let method = normalizeRequestedMethod(requested);
  const previous = previousMethod(ctx);

  if (method === '') {
    if (previous !== '') {
      method = previous;
    } else {
      method = await ctx.prompter.select<UpdateMethod>({
        message: 'Choose an update method',
        intro: 'tendril needs you to choose a SelfUpdateMethod.',
        choices: KNOWN_METHODS.map(value => ({ name: METHOD_DESCRIPTIONS[value], value })),
        default: DEFAULT_METHOD
      });
    }
  } else {
    ctx.reporter.breaking(
      "\nPlease note: the command 'tendril selfupdate' should be used for routine updating; "
      + "you only need to use a command like 'tendril selfupdate-cvs' or 'tendril selfupdate-rsync' "
      + 'if you are changing your update method.\n'
    );

    if (!isUpdateMethod(method)) {
      throw new UnknownMethodError(method);
    }

    if (previous !== '' && method !== previous) {
      const answer = await ctx.prompter.confirm({
        message: `The current selfupdate method is ${previous}. `
          + `Do you wish to change this default method to ${method}?`,
        default: true
      });
      if (!answer) {
        return { kind: 'declined', requested: method, previous };
      }
    }
  }

  if (!isUpdateMethod(method)) {
    throw new UnknownMethodError(method);
  }

  return { kind: 'selected', method, previous, changed: method !== previous };
}
