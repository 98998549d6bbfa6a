import type { Stack, StackConfig, StackConfigInput } from '../types/index.js';
import { bindValue, collectValueDependencies } from '../resolvers/resolver.js';
import {
  ConfigurationError,
  ConflictingAttributesError,
  InvalidConfigError,
} from './errors.js';
import { defaultExternalName, normalizeStackId } from './stack-id.js';

const withDefaults = (config: StackConfigInput): StackConfig => ({
  ...config,
  parameters: config.parameters ?? {},
  userData: config.userData ?? {},
  tags: config.tags ?? {},
  dependencies: config.dependencies ?? [],
  hooks: config.hooks ?? {},
  protect: config.protect ?? false,
  ignore: config.ignore ?? false,
  obsolete: config.obsolete ?? false,
  disableRollback: config.disableRollback ?? false,
});

/**
 * Construct a stack from its merged config. Resolvers and hooks are bound to
 * the stack here, which is when they report the stacks they depend on.
 */
export const createStack = ({
  stackId,
  config,
  projectCode,
}: {
  stackId: string;
  config: StackConfigInput;
  projectCode?: string;
}): Stack => {
  const normalizedId = normalizeStackId(stackId);
  const fullConfig = withDefaults(config);

  if (fullConfig.disableRollback && fullConfig.onFailure) {
    throw new ConflictingAttributesError(normalizedId, ['disable_rollback', 'on_failure']);
  }

  const owner = { stackId: normalizedId };
  const hooks = Object.values(fullConfig.hooks).flat();

  try {
    bindValue({ value: fullConfig.parameters, owner });
    bindValue({ value: fullConfig.userData, owner });
    bindValue({ value: fullConfig.tags, owner });
    hooks.forEach((hook) => hook.bind(owner));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new InvalidConfigError(`Stack '${normalizedId}': ${error.message}`, { cause: error });
    }
    throw error;
  }

  const dependencies = new Set([
    ...fullConfig.dependencies.map(normalizeStackId),
    ...collectValueDependencies(fullConfig.parameters),
    ...collectValueDependencies(fullConfig.userData),
    ...collectValueDependencies(fullConfig.tags),
    ...hooks.flatMap((hook) => hook.collectDependencies()),
  ]);
  dependencies.delete(normalizedId);

  return Object.freeze({
    stackId: normalizedId,
    externalName:
      fullConfig.stackName ?? defaultExternalName({ stackId: normalizedId, projectCode }),
    config: fullConfig,
    dependencies: Object.freeze([...dependencies].sort()),
    region: fullConfig.region,
    profile: fullConfig.profile,
    protect: fullConfig.protect,
    ignore: fullConfig.ignore,
    obsolete: fullConfig.obsolete,
  });
};

/**
 * Index stacks by id, rejecting duplicates
 */
export const indexStacks = ({ stacks }: { stacks: Stack[] }): Map<string, Stack> => {
  const stackMap = new Map<string, Stack>();
  stacks.forEach((stack) => {
    if (stackMap.has(stack.stackId)) {
      throw new InvalidConfigError(`Stack '${stack.stackId}' is defined more than once.`);
    }
    stackMap.set(stack.stackId, stack);
  });
  return stackMap;
};
