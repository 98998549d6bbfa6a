import { NO_VALUE, type ResolverFactory } from '../types/index.js';
import { defineResolver } from './resolver.js';

/**
 * `!no_value` - removes the entry holding it, as if it had not been set
 */
export const noValue: ResolverFactory = (argument) =>
  defineResolver({
    tag: 'no_value',
    argument,
    resolve: async () => NO_VALUE,
  });
