import { UnknownMethodError } from '../errors.js';
import type { StrategyRegistry, UpdateMethod, UpdateStrategy } from '../types.js';
import { CvsStrategy } from './cvs.js';
import { PointStrategy } from './point.js';
import { RsyncStrategy } from './rsync.js';

/** Registered methods, in prompt order */
export const KNOWN_METHODS: readonly UpdateMethod[] = ['rsync', 'cvs', 'point'];

export const METHOD_DESCRIPTIONS: Record<UpdateMethod, string> = {
  rsync: 'rsync',
  cvs: 'cvs',
  point: 'Stick to point releases'
};

export interface RegistryOptions {
  basepath: string;
  debug?: boolean;
  rsyncMirror: string;
  cvsRoot: string;
  pointUrl: string;
}

export function createRegistry(options: RegistryOptions): StrategyRegistry {
  const paths = { basepath: options.basepath, debug: options.debug };
  return {
    rsync: new RsyncStrategy(paths, options.rsyncMirror),
    cvs: new CvsStrategy(paths, options.cvsRoot),
    point: new PointStrategy(paths, options.pointUrl)
  };
}

export function isUpdateMethod(value: string): value is UpdateMethod {
  return KNOWN_METHODS.some(method => method === value);
}

export function strategyFor(registry: StrategyRegistry, method: string): UpdateStrategy {
  if (!isUpdateMethod(method)) {
    throw new UnknownMethodError(method);
  }
  return registry[method];
}
