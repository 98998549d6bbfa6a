import type { Registry } from '../core/registry.js';
import type { ValueResolver } from '../types/index.js';
import { environmentVariable } from './environment-variable.js';
import { fileContents } from './file-contents.js';
import { join } from './join.js';
import { noValue } from './no-value.js';
import { select } from './select.js';
import { split } from './split.js';
import { stackAttr } from './stack-attr.js';
import { stackOutput, stackOutputExternal } from './stack-output.js';
import { sub } from './sub.js';

export * from './materialize.js';
export * from './placeholders.js';
export * from './resolver.js';
export {
  environmentVariable,
  fileContents,
  join,
  noValue,
  select,
  split,
  stackAttr,
  stackOutput,
  stackOutputExternal,
  sub,
};

export const registerBuiltinResolvers = (registry: Registry<ValueResolver>): void => {
  registry.register('env', environmentVariable);
  registry.register('environment_variable', environmentVariable);
  registry.register('file_contents', fileContents);
  registry.register('file', fileContents);
  registry.register('stack_output', stackOutput);
  registry.register('stack_output_external', stackOutputExternal);
  registry.register('no_value', noValue);
  registry.register('join', join);
  registry.register('split', split);
  registry.register('select', select);
  registry.register('sub', sub);
  registry.register('stack_attr', stackAttr);
};
