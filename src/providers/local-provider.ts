import { join } from 'path';
import type {
  DeployStackInput,
  ProviderClient,
  ProviderClientFactory,
  StackDescription,
} from '../types/index.js';
import { ProviderError, StackDoesNotExistError } from '../core/errors.js';
import {
  createFileStateStore,
  type DeployedStackRecord,
  type StateStore,
} from '../storage/state-store.js';
import {
  effectiveParameters,
  evaluateOutputs,
  parameterDefaults,
  parseTemplate,
} from './template-document.js';

const sameEntries = (a: Record<string, string>, b: Record<string, string>): boolean => {
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every((key) => a[key] === b[key]);
};

const toDescription = (record: DeployedStackRecord): StackDescription => ({
  stackName: record.stackName,
  status: record.status,
  statusReason: record.statusReason,
  parameters: { ...record.parameters },
  outputs: { ...record.outputs },
  tags: { ...record.tags },
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

/**
 * Provider that deploys templates into a state store instead of a cloud
 * account. Operations settle immediately, so a stack is never left in an
 * IN_PROGRESS status.
 */
export const createLocalProvider = ({
  store,
  now = () => new Date(),
}: {
  store: StateStore;
  now?: () => Date;
}): ProviderClient => {
  const deploy = (input: DeployStackInput) => {
    const template = parseTemplate(input.templateBody);
    const parameters = effectiveParameters({ template, parameters: input.parameters });
    const outputs = evaluateOutputs({ template, stackName: input.stackName, parameters });
    return { parameters, outputs };
  };

  const requireRecord = async (stackName: string): Promise<DeployedStackRecord> => {
    const record = await store.load({ stackName });
    if (!record) throw new StackDoesNotExistError(stackName);
    return record;
  };

  return {
    createStack: async (input) => {
      const existing = await store.load({ stackName: input.stackName });
      if (existing) {
        throw new ProviderError('AlreadyExistsException', `Stack [${input.stackName}] already exists`);
      }

      const { parameters, outputs } = deploy(input);
      await store.save({
        record: {
          stackName: input.stackName,
          status: 'CREATE_COMPLETE',
          templateBody: input.templateBody,
          parameters,
          tags: { ...input.tags },
          outputs,
          createdAt: now().toISOString(),
          updatedAt: null,
        },
      });
    },

    updateStack: async (input) => {
      const record = await requireRecord(input.stackName);
      if (record.status.endsWith('_IN_PROGRESS')) {
        throw new ProviderError(
          'ValidationError',
          `Stack:${input.stackName} is in ${record.status} state and can not be updated.`
        );
      }

      const { parameters, outputs } = deploy(input);
      if (
        record.templateBody === input.templateBody &&
        sameEntries(record.parameters, parameters) &&
        sameEntries(record.tags, input.tags)
      ) {
        throw new ProviderError('ValidationError', 'No updates are to be performed.');
      }

      await store.save({
        record: {
          ...record,
          status: 'UPDATE_COMPLETE',
          statusReason: undefined,
          templateBody: input.templateBody,
          parameters,
          tags: { ...input.tags },
          outputs,
          updatedAt: now().toISOString(),
        },
      });
    },

    deleteStack: async ({ stackName }) => {
      await store.remove({ stackName });
    },

    cancelUpdateStack: async ({ stackName }) => {
      const record = await requireRecord(stackName);
      if (record.status !== 'UPDATE_IN_PROGRESS') {
        throw new ProviderError(
          'ValidationError',
          `CancelUpdateStack cannot be called from current stack status ${record.status}.`
        );
      }
      await store.save({
        record: {
          ...record,
          status: 'UPDATE_ROLLBACK_COMPLETE',
          statusReason: 'User Initiated',
          updatedAt: now().toISOString(),
        },
      });
    },

    describeStack: async ({ stackName }) => {
      const record = await store.load({ stackName });
      return record ? toDescription(record) : null;
    },

    getStackOutputs: async ({ stackName }) => {
      const record = await requireRecord(stackName);
      return { ...record.outputs };
    },

    getTemplate: async ({ stackName }) => {
      const record = await store.load({ stackName });
      return record ? record.templateBody : null;
    },

    validateTemplate: async ({ templateBody }) => {
      const template = parseTemplate(templateBody);
      return {
        description: template.Description,
        parameters: Object.keys(template.Parameters ?? {}),
        outputs: Object.keys(template.Outputs ?? {}),
        parameterDefaults: parameterDefaults(template),
      };
    },
  };
};

/**
 * Client factory for the CLI: each profile and region keeps its own state
 * directory, like separate accounts would.
 */
export const createLocalProviderFactory =
  ({ stateDir }: { stateDir: string }): ProviderClientFactory =>
  async ({ region, profile }) =>
    createLocalProvider({
      store: createFileStateStore({
        stateDir: join(stateDir, profile ?? 'default', region ?? 'default'),
      }),
    });
