export { initCommand } from './init.js';
export { listCommand } from './list.js';
export { launchCommand, pruneCommand } from './launch.js';
export { operationCommand } from './operation.js';
