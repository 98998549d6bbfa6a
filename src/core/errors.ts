import type { FailureReason } from '../types/index.js';

export class StackpilotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Configuration errors abort a run before any stack operation starts.

export class ConfigurationError extends StackpilotError {}

export class UnknownDependencyError extends ConfigurationError {
  constructor(
    readonly stackId: string,
    readonly dependencyId: string
  ) {
    super(
      `Stack '${stackId}' depends on '${dependencyId}', which does not exist in the project.`
    );
  }
}

export class CircularDependencyError extends ConfigurationError {
  constructor(readonly cycle: string[]) {
    super(`Dependency cycle detected: ${cycle.join(' -> ')}`);
  }
}

export class CannotSkipDependencyError extends ConfigurationError {
  constructor(
    readonly stackId: string,
    readonly dependentIds: string[]
  ) {
    super(
      `Cannot skip stack '${stackId}': ${dependentIds.map((id) => `'${id}'`).join(', ')} depend${dependentIds.length === 1 ? 's' : ''} on it.`
    );
  }
}

export class CannotPruneStackError extends ConfigurationError {
  constructor(
    readonly stackId: string,
    readonly dependentIds: string[]
  ) {
    super(
      `Cannot prune obsolete stack '${stackId}': non-obsolete stacks ${dependentIds.map((id) => `'${id}'`).join(', ')} depend on it.`
    );
  }
}

export class ConflictingAttributesError extends ConfigurationError {
  constructor(
    readonly stackId: string,
    readonly attributes: string[]
  ) {
    super(
      `Stack '${stackId}' sets mutually exclusive attributes: ${attributes.join(', ')}.`
    );
  }
}

export class InvalidConfigError extends ConfigurationError {}

export class UnknownPathError extends ConfigurationError {
  constructor(readonly path: string) {
    super(`No stack or stack group matches '${path}'.`);
  }
}

export class UnknownResolverError extends ConfigurationError {
  constructor(readonly tag: string) {
    super(`No resolver is registered for '!${tag}'.`);
  }
}

export class UnknownHookError extends ConfigurationError {
  constructor(readonly tag: string) {
    super(`No hook is registered for '!${tag}'.`);
  }
}

// Resolution errors fail only the stack being materialised.

export class ResolutionError extends StackpilotError {}

export class MissingEnvironmentVariableError extends ResolutionError {
  constructor(readonly variable: string) {
    super(`Environment variable '${variable}' is not set.`);
  }
}

export class FileContentsError extends ResolutionError {}

export class InvalidResolverArgumentError extends ResolutionError {}

export class MissingStackOutputError extends ResolutionError {
  constructor(
    readonly stackName: string,
    readonly outputName: string
  ) {
    super(`The stack '${stackName}' does not have an output named '${outputName}'.`);
  }
}

export class HookError extends StackpilotError {
  constructor(
    readonly hookTag: string,
    readonly hookPoint: string,
    cause: unknown
  ) {
    super(
      `Hook '!${hookTag}' failed during ${hookPoint}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export class InvalidHookArgumentError extends StackpilotError {}

// Provider and operation errors.

export class ProviderError extends StackpilotError {
  constructor(
    readonly code: string,
    message: string
  ) {
    super(message);
  }
}

export class StackDoesNotExistError extends ProviderError {
  constructor(readonly stackName: string) {
    super('StackNotFound', `Stack with id ${stackName} does not exist`);
  }
}

export class ProtectedStackError extends StackpilotError {
  constructor(readonly stackId: string) {
    super(`Cannot perform action on '${stackId}': stack protection is currently enabled.`);
  }
}

export class CannotUpdateFailedStackError extends StackpilotError {}

export class UnknownStackStatusError extends StackpilotError {
  constructor(readonly status: string) {
    super(`${status} is unknown`);
  }
}

/**
 * Classify an error raised while running one stack's operation
 */
export const failureReasonOf = (error: unknown): FailureReason => {
  if (error instanceof ResolutionError) return 'resolution-error';
  if (error instanceof HookError) return 'hook-error';
  if (error instanceof ProviderError) return 'provider-error';
  return 'operation-error';
};

export const errorMessageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
