import path from 'path';
import { z } from 'zod';
import { readJsonFile } from './config.js';
import { stateDir } from './methods/base.js';
import type { PackageDatabase, PackageEntry } from './types.js';

const IndexSchema = z.object({
  packages: z.array(z.object({
    name: z.string().min(1),
    version: z.string().min(1),
    essential: z.boolean().optional()
  }))
});

const StatusSchema = z.object({
  installed: z.record(z.string(), z.string()).default({})
});

class IndexedPackage implements PackageEntry {
  constructor(
    readonly name: string,
    readonly version: string,
    private readonly installedVersion: string | undefined
  ) {}

  isInstalled(): boolean {
    return this.installedVersion === this.version;
  }

  isAnyVersionInstalled(): boolean {
    return this.installedVersion !== undefined;
  }
}

/**
 * Package view built from the description index and the installed-status
 * file under `<basepath>/var/lib/tendril`. Loaded on demand and cached until
 * `forgetAll`.
 */
export class IndexPackageDatabase implements PackageDatabase {
  private entries: Map<string, IndexedPackage> | null = null;
  private essential: string[] = [];

  constructor(private readonly basepath: string) {}

  get indexPath(): string {
    return path.join(stateDir(this.basepath), 'packages.json');
  }

  get statusPath(): string {
    return path.join(stateDir(this.basepath), 'status.json');
  }

  forgetAll(): void {
    this.entries = null;
    this.essential = [];
  }

  async reloadAll(): Promise<void> {
    const index = await readJsonFile(this.indexPath, IndexSchema) ?? { packages: [] };
    const status = await readJsonFile(this.statusPath, StatusSchema) ?? { installed: {} };

    const entries = new Map<string, IndexedPackage>();
    const essential: string[] = [];
    for (const record of index.packages) {
      entries.set(record.name, new IndexedPackage(record.name, record.version, status.installed[record.name]));
      if (record.essential) {
        essential.push(record.name);
      }
    }

    this.entries = entries;
    this.essential = essential;
  }

  lookupByName(name: string): PackageEntry | undefined {
    return this.entries?.get(name);
  }

  listEssential(): string[] {
    return [...this.essential];
  }
}
