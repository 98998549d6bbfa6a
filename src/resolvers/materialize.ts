import {
  NO_VALUE,
  type ConfigValue,
  type NoValue,
  type ResolutionCache,
  type ResolutionContext,
  type ResolvedValue,
  type ValueResolver,
} from '../types/index.js';
import { ResolutionError, errorMessageOf } from '../core/errors.js';
import { isValueResolver } from './resolver.js';

export const createResolutionCache = (): ResolutionCache => new Map();

/**
 * Fail a resolver that is reached again while it is still resolving, which
 * would otherwise wait on itself forever
 */
const assertNotResolving = ({
  resolver,
  context,
}: {
  resolver: ValueResolver;
  context: ResolutionContext;
}): void => {
  if (!context.resolving.has(resolver)) return;

  const chain = [...context.resolving];
  const cycle = [...chain.slice(chain.indexOf(resolver)), resolver].map(String).join(' -> ');
  throw new ResolutionError(
    `Circular resolver reference in stack '${context.stack.stackId}': ${cycle}`
  );
};

const resolveOnce = async ({
  resolver,
  context,
}: {
  resolver: ValueResolver;
  context: ResolutionContext;
}): Promise<ResolvedValue | NoValue> => {
  assertNotResolving({ resolver, context });
  const cached = context.cache.get(resolver);
  if (cached) return cached;

  context.resolving.add(resolver);
  const pending = resolver
    .resolve(context)
    .catch((error: unknown) => {
      if (error instanceof ResolutionError) throw error;
      throw new ResolutionError(
        `${String(resolver)} could not be resolved for stack '${context.stack.stackId}': ${errorMessageOf(error)}`,
        { cause: error }
      );
    })
    .finally(() => {
      context.resolving.delete(resolver);
    });
  context.cache.set(resolver, pending);
  return pending;
};

const materialize = async ({
  value,
  context,
}: {
  value: ConfigValue;
  context: ResolutionContext;
}): Promise<ResolvedValue | NoValue> => {
  if (isValueResolver(value)) {
    return resolveOnce({ resolver: value, context });
  }

  if (Array.isArray(value)) {
    const items: ResolvedValue[] = [];
    for (const item of value) {
      const resolved = await materialize({ value: item, context });
      if (resolved !== NO_VALUE) items.push(resolved);
    }
    return items;
  }

  if (value !== null && typeof value === 'object') {
    const mapping: Record<string, ResolvedValue> = {};
    for (const [key, item] of Object.entries(value)) {
      const resolved = await materialize({ value: item, context });
      if (resolved !== NO_VALUE) mapping[key] = resolved;
    }
    return mapping;
  }

  return value;
};

/**
 * Resolve every resolver reachable from a value, depth first. Entries that
 * resolve to NO_VALUE are dropped from their sequence or mapping; a value that
 * is itself NO_VALUE materialises to undefined.
 */
export const materializeValue = async ({
  value,
  context,
}: {
  value: ConfigValue;
  context: ResolutionContext;
}): Promise<ResolvedValue | undefined> => {
  const resolved = await materialize({ value, context });
  return resolved === NO_VALUE ? undefined : resolved;
};

/**
 * Materialise a top-level mapping such as a stack's parameters
 */
export const materializeRecord = async ({
  record,
  context,
}: {
  record: Record<string, ConfigValue>;
  context: ResolutionContext;
}): Promise<Record<string, ResolvedValue>> => {
  const mapping: Record<string, ResolvedValue> = {};
  for (const [key, item] of Object.entries(record)) {
    const resolved = await materialize({ value: item, context });
    if (resolved !== NO_VALUE) mapping[key] = resolved;
  }
  return mapping;
};
