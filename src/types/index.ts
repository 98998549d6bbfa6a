export * from './hook.js';
export * from './operation.js';
export * from './provider.js';
export * from './resolver.js';
export * from './stack.js';
export * from './status.js';
