import { setTimeout as sleepFor } from 'timers/promises';
import type {
  DeployStackInput,
  Operation,
  OperationResult,
  PlaceholderType,
  ProviderClient,
  ResolutionContext,
  ResolvedValue,
  Stack,
  StackDescription,
  StackStatus,
  TemplateValidation,
} from '../types/index.js';
import { createResolutionCache, materializeRecord } from '../resolvers/materialize.js';
import { withHooks } from '../hooks/run-hooks.js';
import type { SessionCache } from '../providers/session-cache.js';
import { parseTemplate } from '../providers/template-document.js';
import type { TemplateCompiler } from '../templates/template-compiler.js';
import { createStackLogger } from '../utils/logger.js';
import {
  CannotUpdateFailedStackError,
  ProtectedStackError,
  ProviderError,
  UnknownStackStatusError,
} from './errors.js';
import type { StackRunner } from './executor.js';
import { diffStack, type StackDiff } from './stack-diff.js';

const NO_UPDATES_MESSAGE = 'No updates are to be performed.';

/** Provider statuses from which launch recreates the stack. */
const RECREATE_STATUSES = new Set(['CREATE_FAILED', 'ROLLBACK_COMPLETE', 'REVIEW_IN_PROGRESS']);

/**
 * Collapse a provider status into complete, failed or in-progress
 */
export const simplifyStatus = (status: string): StackStatus => {
  if (status.endsWith('ROLLBACK_COMPLETE')) return 'failed';
  if (status.endsWith('_COMPLETE')) return 'complete';
  if (status.endsWith('_IN_PROGRESS')) return 'in-progress';
  if (status.endsWith('_FAILED')) return 'failed';
  throw new UnknownStackStatusError(status);
};

const formatScalar = (value: ResolvedValue): string =>
  value !== null && typeof value === 'object' ? JSON.stringify(value) : String(value);

/**
 * Flatten materialised values into the strings a provider takes: lists are
 * comma-joined and null entries are left out
 */
export const formatProviderValues = (
  values: Record<string, ResolvedValue>
): Record<string, string> => {
  const formatted: Record<string, string> = {};
  Object.entries(values).forEach(([key, value]) => {
    if (value === null) return;
    formatted[key] = Array.isArray(value) ? value.map(formatScalar).join(',') : formatScalar(value);
  });
  return formatted;
};

export interface StackConfigDump {
  stackId: string;
  stackName: string;
  template: string | null;
  region: string | null;
  profile: string | null;
  parameters: Record<string, ResolvedValue>;
  userData: Record<string, ResolvedValue>;
  tags: Record<string, ResolvedValue>;
  dependencies: string[];
  hooks: Record<string, string[]>;
  protect: boolean;
  ignore: boolean;
  obsolete: boolean;
  timeout: number | null;
  disableRollback: boolean;
  onFailure: string | null;
}

export interface StackActionsOptions {
  /** Every stack in the project, for cross-stack output lookups. */
  stacks: ReadonlyMap<string, Stack>;
  sessions: SessionCache;
  compiler: TemplateCompiler;
  projectDir: string;
  /** Substitute placeholders for outputs of stacks that are not deployed. */
  placeholders: boolean;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

interface WaitResult {
  status: StackStatus;
  providerStatus: string | null;
  timedOut: boolean;
}

export interface StackActions {
  create(stack: Stack): Promise<OperationResult>;
  update(stack: Stack): Promise<OperationResult>;
  launch(stack: Stack): Promise<OperationResult>;
  delete(stack: Stack): Promise<OperationResult>;
  describe(stack: Stack): Promise<OperationResult>;
  describeOutputs(stack: Stack): Promise<OperationResult>;
  getStatus(stack: Stack): Promise<OperationResult>;
  validate(stack: Stack): Promise<OperationResult>;
  generate(stack: Stack): Promise<OperationResult>;
  dumpConfig(stack: Stack): Promise<OperationResult>;
  diff(stack: Stack): Promise<OperationResult>;
  /** Dispatch by operation name; this is what the executor calls. */
  runOperation: StackRunner;
}

/**
 * Per-stack implementation of every operation. Each one runs its before_
 * hooks, materialises the stack's config, talks to the provider and then
 * runs its after_ hooks.
 */
export const createStackActions = ({
  stacks,
  sessions,
  compiler,
  projectDir,
  placeholders,
  pollIntervalMs = 4000,
  sleep = (ms) => sleepFor(ms),
  now = () => Date.now(),
}: StackActionsOptions): StackActions => {
  const clientFor = (stack: Stack): Promise<ProviderClient> =>
    sessions.getClient({ region: stack.region, profile: stack.profile });

  const resolutionFor = ({
    stack,
    placeholderType,
  }: {
    stack: Stack;
    placeholderType: PlaceholderType;
  }): ResolutionContext => ({
    stack,
    projectDir,
    placeholders,
    placeholderType,
    cache: createResolutionCache(),
    resolving: new Set(),
    lookupStack: (stackId) => stacks.get(stackId),
    getStackOutputs: async (target) =>
      (await clientFor(target)).getStackOutputs({ stackName: target.externalName }),
    getExternalStackOutputs: async ({ stackName, region, profile }) =>
      (await sessions.getClient({ region, profile })).getStackOutputs({ stackName }),
  });

  /** Run an operation body between the stack's hooks for that operation. */
  const bracket = (
    stack: Stack,
    operation: Operation,
    body: () => Promise<OperationResult>
  ): Promise<OperationResult> =>
    withHooks(
      { stack, operation, resolution: resolutionFor({ stack, placeholderType: 'explicit' }) },
      body
    );

  const protect = (stack: Stack): void => {
    if (stack.protect) throw new ProtectedStackError(stack.stackId);
  };

  const materialize = async (stack: Stack) => {
    const parameterContext = resolutionFor({ stack, placeholderType: 'alphanum' });
    const explicitContext = resolutionFor({ stack, placeholderType: 'explicit' });
    return {
      parameters: await materializeRecord({
        record: stack.config.parameters,
        context: parameterContext,
      }),
      userData: await materializeRecord({ record: stack.config.userData, context: explicitContext }),
      tags: await materializeRecord({ record: stack.config.tags, context: explicitContext }),
    };
  };

  // templates only see user data; parameters and tags are left unresolved
  const compileTemplate = async (stack: Stack): Promise<string> => {
    const userData = await materializeRecord({
      record: stack.config.userData,
      context: resolutionFor({ stack, placeholderType: 'explicit' }),
    });
    return compiler.compile({ stack, userData });
  };

  const deployInput = async (stack: Stack): Promise<DeployStackInput> => {
    const { parameters, userData, tags } = await materialize(stack);
    const templateBody = await compiler.compile({ stack, userData });
    const { timeoutMinutes, disableRollback, onFailure } = stack.config;
    return {
      stackName: stack.externalName,
      templateBody,
      parameters: formatProviderValues(parameters),
      tags: formatProviderValues(tags),
      timeoutInMinutes: timeoutMinutes,
      disableRollback: disableRollback || undefined,
      onFailure,
    };
  };

  const providerStatus = async (stack: Stack): Promise<string | null> => {
    const description = await (await clientFor(stack)).describeStack({
      stackName: stack.externalName,
    });
    return description?.status ?? null;
  };

  /**
   * Poll until the stack leaves its IN_PROGRESS status or the stack timeout
   * passes. A stack that disappears counts as complete when it was being
   * deleted.
   */
  const waitForCompletion = async ({
    stack,
    deleting = false,
  }: {
    stack: Stack;
    deleting?: boolean;
  }): Promise<WaitResult> => {
    const logger = createStackLogger(stack.stackId);
    const { timeoutMinutes } = stack.config;
    const deadline =
      timeoutMinutes === undefined ? Number.POSITIVE_INFINITY : now() + timeoutMinutes * 60_000;

    for (;;) {
      await sleep(pollIntervalMs);
      const status = await providerStatus(stack);
      if (status === null) {
        if (deleting) return { status: 'complete', providerStatus: null, timedOut: false };
        throw new ProviderError('StackNotFound', `Stack ${stack.externalName} disappeared while waiting.`);
      }

      logger.debug(`Stack is in ${status}`);
      const simplified = simplifyStatus(status);
      if (simplified !== 'in-progress') {
        return { status: simplified, providerStatus: status, timedOut: false };
      }
      if (now() >= deadline) {
        return { status: simplified, providerStatus: status, timedOut: true };
      }
    }
  };

  const doCreate = async (stack: Stack): Promise<OperationResult> => {
    const logger = createStackLogger(stack.stackId);
    protect(stack);
    const input = await deployInput(stack);
    logger.info(`Creating stack ${stack.externalName}`);

    try {
      await (await clientFor(stack)).createStack(input);
    } catch (error) {
      if (error instanceof ProviderError && error.code === 'AlreadyExistsException') {
        logger.info('Stack already exists');
        return { status: 'complete' };
      }
      throw error;
    }

    const { status, timedOut } = await waitForCompletion({ stack });
    logger.info(`Create finished with status ${status}`);
    return { status, timedOut: timedOut || undefined };
  };

  const doUpdate = async (stack: Stack): Promise<OperationResult> => {
    const logger = createStackLogger(stack.stackId);
    protect(stack);
    const input = await deployInput(stack);
    logger.info(`Updating stack ${stack.externalName}`);
    const client = await clientFor(stack);

    try {
      await client.updateStack(input);
    } catch (error) {
      if (error instanceof ProviderError && error.message.includes(NO_UPDATES_MESSAGE)) {
        logger.info('No updates to perform');
        return { status: 'complete' };
      }
      throw error;
    }

    const waited = await waitForCompletion({ stack });
    if (waited.timedOut) {
      logger.warn('Update timed out; cancelling it');
      await client.cancelUpdateStack({ stackName: stack.externalName });
      const cancelled = await waitForCompletion({ stack });
      return { status: cancelled.status === 'complete' ? 'failed' : cancelled.status, timedOut: true };
    }

    logger.info(`Update finished with status ${waited.status}`);
    return { status: waited.status };
  };

  const doDelete = async (stack: Stack): Promise<OperationResult> => {
    const logger = createStackLogger(stack.stackId);
    protect(stack);

    if ((await providerStatus(stack)) === null) {
      logger.info('Stack does not exist; nothing to delete');
      return { status: 'complete' };
    }

    logger.info(`Deleting stack ${stack.externalName}`);
    await (await clientFor(stack)).deleteStack({ stackName: stack.externalName });
    const { status, timedOut } = await waitForCompletion({ stack, deleting: true });
    logger.info(`Delete finished with status ${status}`);
    return { status, timedOut: timedOut || undefined };
  };

  const create = (stack: Stack) => bracket(stack, 'create', () => doCreate(stack));
  const update = (stack: Stack) => bracket(stack, 'update', () => doUpdate(stack));
  const remove = (stack: Stack) => bracket(stack, 'delete', () => doDelete(stack));

  const launch = (stack: Stack) =>
    bracket(stack, 'launch', async () => {
      const logger = createStackLogger(stack.stackId);
      protect(stack);

      const status = await providerStatus(stack);
      if (status === null) {
        return create(stack);
      }
      if (RECREATE_STATUSES.has(status)) {
        logger.info(`Stack is in ${status}; deleting it before creating it again`);
        const deleted = await remove(stack);
        return deleted.status === 'complete' ? create(stack) : deleted;
      }
      if (status.endsWith('_COMPLETE')) {
        return update(stack);
      }
      if (status.endsWith('_IN_PROGRESS')) {
        logger.info(`Stack is in ${status}; not launching`);
        return { status: 'in-progress' };
      }
      if (status.endsWith('_FAILED')) {
        throw new CannotUpdateFailedStackError(
          `'${stack.stackId}' is in ${status}; it must be fixed or deleted before it can be launched.`
        );
      }
      throw new UnknownStackStatusError(status);
    });

  const describe = (stack: Stack) =>
    bracket(stack, 'describe', async () => {
      const client = await clientFor(stack);
      const description: StackDescription | null = await client.describeStack({
        stackName: stack.externalName,
      });
      return { status: 'complete', data: description };
    });

  const describeOutputs = (stack: Stack) =>
    bracket(stack, 'describeOutputs', async () => {
      const client = await clientFor(stack);
      const description = await client.describeStack({ stackName: stack.externalName });
      return { status: 'complete', data: description ? description.outputs : null };
    });

  const getStatus = (stack: Stack) =>
    bracket(stack, 'getStatus', async () => ({
      status: 'complete',
      data: (await providerStatus(stack)) ?? 'PENDING',
    }));

  const validate = (stack: Stack) =>
    bracket(stack, 'validate', async () => {
      const templateBody = await compileTemplate(stack);
      const validation: TemplateValidation = await (await clientFor(stack)).validateTemplate({
        templateBody,
      });
      return { status: 'complete', data: validation };
    });

  const generate = (stack: Stack) =>
    bracket(stack, 'generate', async () => ({
      status: 'complete',
      data: await compileTemplate(stack),
    }));

  const dumpConfig = (stack: Stack) =>
    bracket(stack, 'dumpConfig', async () => {
      const { parameters, userData, tags } = await materialize(stack);
      const { config } = stack;
      const dump: StackConfigDump = {
        stackId: stack.stackId,
        stackName: stack.externalName,
        template: config.template ?? null,
        region: stack.region ?? null,
        profile: stack.profile ?? null,
        parameters,
        userData,
        tags,
        dependencies: [...stack.dependencies],
        hooks: Object.fromEntries(
          Object.entries(config.hooks).map(([point, hooks]) => [
            point,
            hooks.map((hook) => `!${hook.tag}`),
          ])
        ),
        protect: stack.protect,
        ignore: stack.ignore,
        obsolete: stack.obsolete,
        timeout: config.timeoutMinutes ?? null,
        disableRollback: config.disableRollback,
        onFailure: config.onFailure ?? null,
      };
      return { status: 'complete', data: dump };
    });

  /**
   * Compare the template, parameters and tags a deployment would send now
   * with what the provider holds. Parameters left to their template default
   * count as set to that default.
   */
  const diff = (stack: Stack) =>
    bracket(stack, 'diff', async () => {
      const { parameters, userData, tags } = await materialize(stack);
      const templateBody = await compiler.compile({ stack, userData });
      const client = await clientFor(stack);
      const { parameterDefaults } = await client.validateTemplate({ templateBody });

      const description = await client.describeStack({ stackName: stack.externalName });
      const deployedBody = description
        ? await client.getTemplate({ stackName: stack.externalName })
        : null;

      const result: StackDiff = diffStack({
        stackName: stack.externalName,
        generated: {
          template: parseTemplate(templateBody),
          parameters: { ...parameterDefaults, ...formatProviderValues(parameters) },
          tags: formatProviderValues(tags),
        },
        deployed: description && {
          template: deployedBody === null ? {} : parseTemplate(deployedBody),
          parameters: description.parameters,
          tags: description.tags,
        },
      });
      return { status: 'complete', data: result };
    });

  const handlers: Record<Operation, (stack: Stack) => Promise<OperationResult>> = {
    create,
    update,
    launch,
    delete: remove,
    describe,
    describeOutputs,
    getStatus,
    validate,
    generate,
    dumpConfig,
    diff,
  };

  return {
    ...handlers,
    runOperation: ({ stack, operation }) => handlers[operation](stack),
  };
};
