import { promises as fs } from 'fs';
import path from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { ConfigStore } from './types.js';

const CONFIG_FILENAME = '.tendril.json';

export const SELF_UPDATE_METHOD_KEY = 'SelfUpdateMethod';

const ConfigFileSchema = z.object({
  params: z.record(z.string(), z.string()).default({})
});

const SettingsSchema = z.object({
  basepath: z.string().min(1).default('/opt/tendril'),
  configPath: z.string().min(1).default(path.join(homedir(), CONFIG_FILENAME)),
  debug: z.boolean().default(false),
  rsyncMirror: z.string().min(1).default('rsync://rsync.tendril.dev/descriptions/'),
  cvsRoot: z.string().min(1).default(':pserver:anonymous@cvs.tendril.dev:/cvsroot/tendril'),
  pointUrl: z.string().url().default('https://dist.tendril.dev/descriptions-latest.tar.gz')
});

export type Settings = z.infer<typeof SettingsSchema>;

export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  overrides: { basepath?: string } = {}
): Settings {
  const raw = {
    basepath: overrides.basepath || env.TENDRIL_BASEPATH || undefined,
    configPath: env.TENDRIL_CONFIG || undefined,
    debug: env.TENDRIL_DEBUG === '1' || env.TENDRIL_DEBUG === 'true',
    rsyncMirror: env.TENDRIL_MIRROR_RSYNC || undefined,
    cvsRoot: env.TENDRIL_MIRROR_CVS || undefined,
    pointUrl: env.TENDRIL_MIRROR_POINT || undefined
  };

  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError('environment', detail);
  }
  return result.data;
}

/**
 * Preferences kept in a JSON file in the home directory.
 * A missing file reads as an empty store; it is created on the first save.
 */
export class FileConfigStore implements ConfigStore {
  private params: Record<string, string>;

  private constructor(readonly filePath: string, params: Record<string, string>) {
    this.params = params;
  }

  static async load(filePath: string): Promise<FileConfigStore> {
    const file = await readJsonFile(filePath, ConfigFileSchema);
    return new FileConfigStore(filePath, file?.params ?? {});
  }

  getWithDefault(key: string, defaultValue: string): string {
    return this.params[key] ?? defaultValue;
  }

  setParam(key: string, value: string): void {
    this.params[key] = value;
  }

  async save(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const content = JSON.stringify({ params: this.params }, null, 2) + '\n';
    await fs.writeFile(this.filePath, content, 'utf-8');
  }
}

/**
 * Reads and validates a JSON file. Resolves to null when the file does not exist.
 */
export async function readJsonFile<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): Promise<z.output<T> | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(filePath, error instanceof Error ? error.message : String(error));
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(filePath, result.error.issues.map(issue => issue.message).join('; '));
  }
  return result.data;
}
