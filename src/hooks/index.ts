import type { Registry } from '../core/registry.js';
import type { ActionHook } from '../types/index.js';
import { cmd } from './cmd.js';
import { log } from './log.js';

export * from './hook.js';
export * from './run-hooks.js';
export { cmd, log };

export const registerBuiltinHooks = (registry: Registry<ActionHook>): void => {
  registry.register('cmd', cmd);
  registry.register('log', log);
};
