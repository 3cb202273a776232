import type { AdditionalPackages } from './types.js';

/** Node.js majors the current package collection is built against */
export const SUPPORTED_NODE_MAJORS: readonly number[] = [18, 20, 22];

/** Not essential, but kept current alongside the manager when present */
const IMPORTANT_PACKAGES = ['tendril-mirrors', 'apt', 'apt-shlibs', 'gettext-tools', 'libiconv'];

export function nodeMajor(version: string): number {
  return parseInt(version.replace(/^v/, '').split('.')[0], 10);
}

export function isRuntimeSupported(version: string): boolean {
  return SUPPORTED_NODE_MAJORS.includes(nodeMajor(version));
}

export function additionalPackages(runtimeVersion: string = process.version): AdditionalPackages {
  return {
    packages: [...IMPORTANT_PACKAGES],
    runtimeSupported: isRuntimeSupported(runtimeVersion)
  };
}
