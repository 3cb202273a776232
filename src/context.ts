import { additionalPackages } from './bootstrap.js';
import { FileConfigStore, type Settings } from './config.js';
import { CommandInstaller } from './installer.js';
import { createRegistry } from './methods/registry.js';
import { ConsoleReporter } from './output.js';
import { IndexPackageDatabase } from './packages.js';
import { NodeProcessControl } from './process.js';
import { InquirerPrompter } from './prompts.js';
import type { SelfUpdateContext } from './types.js';

export async function createContext(settings: Settings): Promise<SelfUpdateContext> {
  const runtimeVersion = process.version;

  return {
    basepath: settings.basepath,
    config: await FileConfigStore.load(settings.configPath),
    strategies: createRegistry(settings),
    packages: new IndexPackageDatabase(settings.basepath),
    installer: new CommandInstaller({ basepath: settings.basepath, debug: settings.debug }),
    processControl: new NodeProcessControl(),
    prompter: new InquirerPrompter(),
    reporter: new ConsoleReporter(),
    additionalPackages: () => additionalPackages(runtimeVersion),
    runtimeVersion
  };
}
