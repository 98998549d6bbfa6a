import {
  RESOLVER_BRAND,
  type ConfigValue,
  type NoValue,
  type ResolutionContext,
  type ResolvedValue,
  type StackOwner,
  type ValueResolver,
} from '../types/index.js';
import { materializeValue } from './materialize.js';

export const isValueResolver = (value: unknown): value is ValueResolver =>
  typeof value === 'object' &&
  value !== null &&
  RESOLVER_BRAND in value &&
  value[RESOLVER_BRAND] === true;

/**
 * Bind every resolver reachable from a config value to its owning stack
 */
export const bindValue = ({
  value,
  owner,
}: {
  value: ConfigValue;
  owner: StackOwner;
}): void => {
  if (isValueResolver(value)) {
    value.bind(owner);
  } else if (Array.isArray(value)) {
    value.forEach((item) => bindValue({ value: item, owner }));
  } else if (value !== null && typeof value === 'object') {
    Object.values(value).forEach((item) => bindValue({ value: item, owner }));
  }
};

/**
 * Collect the stack ids that resolvers inside a config value depend on
 */
export const collectValueDependencies = (value: ConfigValue): string[] => {
  if (isValueResolver(value)) {
    return value.collectDependencies();
  }
  if (Array.isArray(value)) {
    return value.flatMap(collectValueDependencies);
  }
  if (value !== null && typeof value === 'object') {
    return Object.values(value).flatMap(collectValueDependencies);
  }
  return [];
};

export interface ResolverState {
  readonly tag: string;
  readonly argument: ConfigValue;
  /** Owning stack; set by bind() before setup() runs. */
  owner: StackOwner | null;
  /** Stack ids registered during setup(). */
  readonly dependencies: Set<string>;
}

export interface ResolverDefinition {
  tag: string;
  argument: ConfigValue;
  setup?: (state: ResolverState) => void;
  resolve: (input: {
    state: ResolverState;
    context: ResolutionContext;
    /** Materialise the argument, resolving any nested resolvers. */
    resolveArgument: () => Promise<ResolvedValue | undefined>;
  }) => Promise<ResolvedValue | NoValue>;
  /** Rendering of the resolver used in placeholders and messages. */
  describe?: (state: ResolverState) => string;
}

const describeArgument = (argument: ConfigValue): string => {
  if (argument === null || argument === '') return '';
  if (typeof argument === 'string') return argument;
  if (isValueResolver(argument)) return String(argument);
  return JSON.stringify(argument, (_key, value: unknown) =>
    isValueResolver(value) ? String(value) : value
  );
};

/**
 * Build a ValueResolver from a definition. Built-in and plugin resolvers are
 * all created this way.
 */
export const defineResolver = (definition: ResolverDefinition): ValueResolver => {
  const state: ResolverState = {
    tag: definition.tag,
    argument: definition.argument,
    owner: null,
    dependencies: new Set(),
  };

  const resolver: ValueResolver = {
    [RESOLVER_BRAND]: true,
    tag: definition.tag,
    argument: definition.argument,
    bind(owner) {
      state.owner = owner;
      bindValue({ value: definition.argument, owner });
      resolver.setup();
    },
    setup() {
      definition.setup?.(state);
    },
    collectDependencies() {
      return [...state.dependencies, ...collectValueDependencies(definition.argument)];
    },
    resolve(context) {
      return definition.resolve({
        state,
        context,
        resolveArgument: () =>
          materializeValue({ value: definition.argument, context }),
      });
    },
    toString() {
      if (definition.describe) return definition.describe(state);
      const argument = describeArgument(definition.argument);
      return argument === '' ? `!${definition.tag}` : `!${definition.tag}(${argument})`;
    },
  };

  return resolver;
};
