import type { Operation, ResolutionContext, Stack } from '../types/index.js';
import { HookError } from '../core/errors.js';
import { createStackLogger } from '../utils/logger.js';

/**
 * Run the hooks configured for one hook point, in order. The first failure
 * stops the sequence.
 */
export const runHooks = async ({
  stack,
  hookPoint,
  resolution,
}: {
  stack: Stack;
  hookPoint: string;
  resolution: ResolutionContext;
}): Promise<void> => {
  const hooks = stack.config.hooks[hookPoint] ?? [];
  const logger = createStackLogger(stack.stackId);

  for (const hook of hooks) {
    logger.debug(`Running ${hookPoint} hook !${hook.tag}`);
    try {
      await hook.run({ stack, hookPoint, resolution, logger });
    } catch (error) {
      throw new HookError(hook.tag, hookPoint, error);
    }
  }
};

/**
 * Config key of a hook point, e.g. before_describe_outputs
 */
export const hookPointFor = (position: 'before' | 'after', operation: Operation): string =>
  `${position}_${operation.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`)}`;

/**
 * Bracket an operation with its before_ and after_ hooks. After hooks only
 * run when the operation succeeded, and their failure fails the operation.
 */
export const withHooks = async <T>(
  {
    stack,
    operation,
    resolution,
  }: {
    stack: Stack;
    operation: Operation;
    resolution: ResolutionContext;
  },
  body: () => Promise<T>
): Promise<T> => {
  await runHooks({ stack, hookPoint: hookPointFor('before', operation), resolution });
  const result = await body();
  await runHooks({ stack, hookPoint: hookPointFor('after', operation), resolution });
  return result;
};
