import type { Stack, StackOwner } from './stack.js';

export const RESOLVER_BRAND: unique symbol = Symbol('stackpilot.resolver');

/** Returned by a resolver whose entry should disappear from its container. */
export const NO_VALUE: unique symbol = Symbol('stackpilot.no-value');

export type NoValue = typeof NO_VALUE;

export type ScalarValue = string | number | boolean | null;

export type ConfigValue =
  | ScalarValue
  | ValueResolver
  | ConfigValue[]
  | { [key: string]: ConfigValue };

export type ResolvedValue =
  | ScalarValue
  | ResolvedValue[]
  | { [key: string]: ResolvedValue };

export type ResolutionCache = Map<ValueResolver, Promise<ResolvedValue | NoValue>>;

export interface ExternalOutputsRequest {
  stackName: string;
  region?: string;
  profile?: string;
}

export type PlaceholderType = 'explicit' | 'alphanum' | 'none';

export interface ResolutionContext {
  readonly stack: Stack;
  readonly projectDir: string;
  /** Substitute placeholders for references to stacks that are not deployed. */
  readonly placeholders: boolean;
  readonly placeholderType: PlaceholderType;
  readonly cache: ResolutionCache;
  /** Resolvers whose resolution is under way, in the order they started. */
  readonly resolving: Set<ValueResolver>;
  lookupStack(stackId: string): Stack | undefined;
  getStackOutputs(stack: Stack): Promise<Record<string, string>>;
  getExternalStackOutputs(
    request: ExternalOutputsRequest
  ): Promise<Record<string, string>>;
}

export interface ValueResolver {
  readonly [RESOLVER_BRAND]: true;
  readonly tag: string;
  readonly argument: ConfigValue;
  /** Attaches the owning stack, binds nested resolvers, then runs setup(). */
  bind(owner: StackOwner): void;
  setup(): void;
  collectDependencies(): string[];
  resolve(context: ResolutionContext): Promise<ResolvedValue | NoValue>;
  /** `!tag(argument)`, used in messages and placeholders. */
  toString(): string;
}

export type ResolverFactory = (argument: ConfigValue) => ValueResolver;
