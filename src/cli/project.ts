import type { Operation, Stack } from '../types/index.js';
import { OPERATIONS } from '../types/index.js';
import { createStackActions, type StackActions } from '../core/actions.js';
import { createProjectRegistries } from '../core/plugins.js';
import type { Registries } from '../core/registry.js';
import { readStacks } from '../config/stack-config-reader.js';
import { createLocalProviderFactory } from '../providers/local-provider.js';
import { createSessionCache } from '../providers/session-cache.js';
import { loadSettings, type ProjectSettings } from '../storage/config.js';
import { createFileTemplateCompiler } from '../templates/template-compiler.js';

export interface Project {
  settings: ProjectSettings;
  registries: Registries;
  stacks: Stack[];
}

/**
 * Load settings, plugins and every stack of a project directory
 */
export const loadProject = async ({ projectDir }: { projectDir: string }): Promise<Project> => {
  const settings = await loadSettings({ projectDir });
  const registries = await createProjectRegistries({
    plugins: settings.plugins,
    projectDir: settings.projectDir,
  });
  const stacks = await readStacks({ settings, registries });
  return { settings, registries, stacks };
};

/**
 * Stack actions for one command run. Placeholders follow the operation's
 * default unless switched off.
 */
export const createProjectActions = ({
  project,
  operation,
  noPlaceholders = false,
}: {
  project: Project;
  operation: Operation;
  noPlaceholders?: boolean;
}): StackActions => {
  const { settings, stacks } = project;
  return createStackActions({
    stacks: new Map(stacks.map((stack) => [stack.stackId, stack])),
    sessions: createSessionCache({
      createClient: createLocalProviderFactory({ stateDir: settings.stateDir }),
    }),
    compiler: createFileTemplateCompiler({ templatesDir: settings.templatesDir }),
    projectDir: settings.projectDir,
    placeholders: OPERATIONS[operation].placeholders && !noPlaceholders,
    pollIntervalMs: settings.pollIntervalMs,
  });
};
