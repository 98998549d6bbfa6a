import type { ActionHook, ConfigValue, ValueResolver } from '../types/index.js';
import { UnknownHookError, UnknownResolverError } from './errors.js';

export interface Registry<T> {
  register(tag: string, factory: (argument: ConfigValue) => T): void;
  create(tag: string, argument: ConfigValue): T;
  has(tag: string): boolean;
  tags(): string[];
}

export interface Registries {
  resolvers: Registry<ValueResolver>;
  hooks: Registry<ActionHook>;
}

/**
 * Lookup table from a YAML tag to the factory producing its instances
 */
export const createRegistry = <T>({
  onUnknown,
}: {
  onUnknown: (tag: string) => Error;
}): Registry<T> => {
  const factories = new Map<string, (argument: ConfigValue) => T>();

  return {
    register: (tag, factory) => {
      factories.set(tag, factory);
    },
    create: (tag, argument) => {
      const factory = factories.get(tag);
      if (!factory) throw onUnknown(tag);
      return factory(argument);
    },
    has: (tag) => factories.has(tag),
    tags: () => [...factories.keys()].sort(),
  };
};

export const createRegistries = (): Registries => ({
  resolvers: createRegistry<ValueResolver>({
    onUnknown: (tag) => new UnknownResolverError(tag),
  }),
  hooks: createRegistry<ActionHook>({
    onUnknown: (tag) => new UnknownHookError(tag),
  }),
});
