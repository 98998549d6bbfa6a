import type { HookFactory } from '../types/index.js';
import { defineHook } from './hook.js';

/**
 * `!log "message"` - writes its resolved argument to the stack's log
 */
export const log: HookFactory = (argument) =>
  defineHook({
    tag: 'log',
    argument,
    run: async ({ argument: resolved, context }) => {
      context.logger.info(
        typeof resolved === 'string' ? resolved : JSON.stringify(resolved ?? null)
      );
    },
  });
