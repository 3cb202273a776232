export type UpdateMethod = 'rsync' | 'cvs' | 'point';

export interface UpdateStrategy {
  readonly method: UpdateMethod;
  systemCheck(): Promise<boolean>;
  doDirect(): Promise<void>;
  stampSet(): Promise<void>;
  stampClear(): Promise<void>;
  clearMetadata(): Promise<void>;
  isStamped(): Promise<boolean>;
}

export type StrategyRegistry = Record<UpdateMethod, UpdateStrategy>;

export interface ConfigStore {
  getWithDefault(key: string, defaultValue: string): string;
  setParam(key: string, value: string): void;
  save(): Promise<void>;
}

export interface PackageEntry {
  readonly name: string;
  /** True when the newest known version is the installed one */
  isInstalled(): boolean;
  isAnyVersionInstalled(): boolean;
}

export interface PackageDatabase {
  forgetAll(): void;
  reloadAll(): Promise<void>;
  lookupByName(name: string): PackageEntry | undefined;
  listEssential(): string[];
}

export interface Installer {
  install(names: string[]): Promise<void>;
  refreshIndex(): Promise<boolean>;
}

export interface ProcessControl {
  /**
   * Hands the process over to `executable`. Returns the failure when the
   * hand-off did not happen.
   */
  replace(executable: string, args: string[]): Error | undefined;
}

export interface SelectChoice<T extends string> {
  name: string;
  value: T;
}

export interface Prompter {
  select<T extends string>(options: {
    message: string;
    intro?: string;
    choices: SelectChoice<T>[];
    default: T;
  }): Promise<T>;
  confirm(options: { message: string; default: boolean }): Promise<boolean>;
}

export interface Reporter {
  /** Wrapped paragraph, as the terminal width allows */
  breaking(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface AdditionalPackages {
  packages: string[];
  runtimeSupported: boolean;
}

export interface SelfUpdateContext {
  basepath: string;
  config: ConfigStore;
  strategies: StrategyRegistry;
  packages: PackageDatabase;
  installer: Installer;
  processControl: ProcessControl;
  prompter: Prompter;
  reporter: Reporter;
  additionalPackages(): AdditionalPackages;
  runtimeVersion: string;
}
