import { isAbsolute, resolve } from 'path';
import { pathToFileURL } from 'url';
import { registerBuiltinHooks } from '../hooks/index.js';
import { registerBuiltinResolvers } from '../resolvers/index.js';
import { errorMessageOf, InvalidConfigError } from './errors.js';
import { createRegistries, type Registries } from './registry.js';

/** Shape of a plugin module listed in the project settings. */
export interface StackpilotPlugin {
  register(registries: Registries): void | Promise<void>;
}

const isPlugin = (value: unknown): value is StackpilotPlugin =>
  typeof value === 'object' &&
  value !== null &&
  'register' in value &&
  typeof value.register === 'function';

const moduleSpecifier = (plugin: string, projectDir: string): string =>
  plugin.startsWith('.') || isAbsolute(plugin)
    ? pathToFileURL(resolve(projectDir, plugin)).href
    : plugin;

/**
 * Import each plugin module in order and let it register its resolvers and
 * hooks. Paths starting with `.` are relative to the project directory;
 * anything else is a package name.
 */
export const loadPlugins = async ({
  plugins,
  projectDir,
  registries,
}: {
  plugins: string[];
  projectDir: string;
  registries: Registries;
}): Promise<void> => {
  for (const plugin of plugins) {
    let loaded: unknown;
    try {
      loaded = await import(moduleSpecifier(plugin, projectDir));
    } catch (error) {
      throw new InvalidConfigError(`Plugin '${plugin}' could not be loaded: ${errorMessageOf(error)}`, {
        cause: error,
      });
    }

    if (!isPlugin(loaded)) {
      throw new InvalidConfigError(`Plugin '${plugin}' does not export a register function.`);
    }
    await loaded.register(registries);
  }
};

/**
 * Registries holding the built-in resolvers and hooks plus those of every
 * configured plugin
 */
export const createProjectRegistries = async ({
  plugins = [],
  projectDir,
}: {
  plugins?: string[];
  projectDir: string;
}): Promise<Registries> => {
  const registries = createRegistries();
  registerBuiltinResolvers(registries.resolvers);
  registerBuiltinHooks(registries.hooks);
  await loadPlugins({ plugins, projectDir, registries });
  return registries;
};
