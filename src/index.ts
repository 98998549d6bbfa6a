export * from './types/index.js';
export * from './core/errors.js';
export * from './core/registry.js';
export * from './core/stack.js';
export * from './core/stack-id.js';
export * from './core/dependency-graph.js';
export * from './core/plan.js';
export * from './core/executor.js';
export * from './core/actions.js';
export * from './core/launcher.js';
export * from './core/plugins.js';
export * from './resolvers/index.js';
export * from './hooks/index.js';
export * from './providers/session-cache.js';
export * from './providers/local-provider.js';
export * from './storage/config.js';
export * from './storage/state-store.js';
export * from './templates/template-compiler.js';
export * from './config/stack-config-reader.js';
export { logger, createStackLogger, setLogLevel, type LogLevel } from './utils/logger.js';
