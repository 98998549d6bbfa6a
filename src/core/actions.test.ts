import { describe, it, expect } from 'vitest';
import type { ActionHook, ProviderClient, Stack, StackConfigInput } from '../types/index.js';
import { defineHook } from '../hooks/hook.js';
import { createLocalProvider } from '../providers/local-provider.js';
import { createSessionCache } from '../providers/session-cache.js';
import { environmentVariable } from '../resolvers/environment-variable.js';
import { stackOutput } from '../resolvers/stack-output.js';
import { createMemoryStateStore } from '../storage/state-store.js';
import type { TemplateCompiler } from '../templates/template-compiler.js';
import {
  createStackActions,
  formatProviderValues,
  simplifyStatus,
  type StackActionsOptions,
} from './actions.js';
import {
  CannotUpdateFailedStackError,
  ProtectedStackError,
  UnknownStackStatusError,
} from './errors.js';
import { createStack } from './stack.js';

const TEMPLATES: Record<string, string> = {
  vpc: [
    'Description: Network',
    'Parameters:',
    '  VpcCidr:',
    '    Type: String',
    '  Zones:',
    '    Type: CommaDelimitedList',
    'Resources:',
    '  Vpc:',
    '    Type: Local::Vpc',
    'Outputs:',
    '  VpcId:',
    '    Value: !Ref Vpc',
    '  Cidr:',
    '    Value: ${VpcCidr}',
    '',
  ].join('\n'),
  app: [
    'Parameters:',
    '  VpcId:',
    '    Type: String',
    'Resources:',
    '  Service:',
    '    Type: Local::Service',
    'Outputs:',
    '  Endpoint:',
    '    Value: !Sub "https://${VpcId}.example.test"',
    '',
  ].join('\n'),
  queue: [
    'Parameters:',
    '  Size:',
    '    Type: String',
    '  Retention:',
    '    Type: Number',
    '    Default: 4',
    'Resources:',
    '  Queue:',
    '    Type: Local::Queue',
    '',
  ].join('\n'),
};

const compiler: TemplateCompiler = {
  compile: async ({ stack }) => TEMPLATES[stack.config.template ?? ''] ?? '',
};

const stack = (stackId: string, config: StackConfigInput = {}): Stack =>
  createStack({ stackId, projectCode: 'acme', config });

const actionsFor = (
  client: ProviderClient,
  stacks: Stack[],
  options: Partial<StackActionsOptions> = {}
) =>
  createStackActions({
    stacks: new Map(stacks.map((item) => [item.stackId, item])),
    sessions: createSessionCache({ createClient: async () => client }),
    compiler,
    projectDir: '/project',
    placeholders: false,
    pollIntervalMs: 0,
    sleep: async () => {},
    ...options,
  });

/** Provider whose stack moves between statuses the way a test scripts it. */
const fakeClient = ({
  status = null,
  afterUpdate = 'UPDATE_COMPLETE',
}: {
  status?: string | null;
  afterUpdate?: string;
} = {}) => {
  let current = status;
  const calls: string[] = [];
  const client: ProviderClient = {
    createStack: async () => {
      calls.push('create');
      current = 'CREATE_COMPLETE';
    },
    updateStack: async () => {
      calls.push('update');
      current = afterUpdate;
    },
    deleteStack: async () => {
      calls.push('delete');
      current = null;
    },
    cancelUpdateStack: async () => {
      calls.push('cancel');
      current = 'UPDATE_ROLLBACK_COMPLETE';
    },
    describeStack: async ({ stackName }) =>
      current === null
        ? null
        : {
            stackName,
            status: current,
            parameters: {},
            outputs: {},
            tags: {},
            createdAt: '2024-05-01T00:00:00.000Z',
          },
    getStackOutputs: async () => ({}),
    validateTemplate: async () => ({ parameters: [], outputs: [] }),
    getTemplate: async () => null,
  };
  return { client, calls };
};

const recording = (name: string, events: string[]): ActionHook =>
  defineHook({
    tag: name,
    argument: null,
    run: async () => {
      events.push(name);
    },
  });

describe('simplifyStatus', () => {
  it('collapses provider statuses', () => {
    expect(simplifyStatus('CREATE_COMPLETE')).toBe('complete');
    expect(simplifyStatus('UPDATE_ROLLBACK_COMPLETE')).toBe('failed');
    expect(simplifyStatus('ROLLBACK_COMPLETE')).toBe('failed');
    expect(simplifyStatus('DELETE_IN_PROGRESS')).toBe('in-progress');
    expect(simplifyStatus('CREATE_FAILED')).toBe('failed');
    expect(() => simplifyStatus('WEIRD')).toThrow(UnknownStackStatusError);
  });
});

describe('formatProviderValues', () => {
  it('comma-joins lists, stringifies scalars and leaves out nulls', () => {
    expect(
      formatProviderValues({ Zones: ['a', 'b'], Count: 2, Enabled: true, Unset: null, Name: 'x' })
    ).toEqual({ Zones: 'a,b', Count: '2', Enabled: 'true', Name: 'x' });
  });
});

describe('create and update against the local provider', () => {
  const vpcConfig: StackConfigInput = {
    template: 'vpc',
    parameters: { VpcCidr: '10.0.0.0/16', Zones: ['a', 'b'] },
    tags: { Team: 'net', Cost: 12 },
  };

  it('deploys parameters and tags and exposes outputs', async () => {
    const client = createLocalProvider({ store: createMemoryStateStore() });
    const vpc = stack('dev/vpc', vpcConfig);
    const actions = actionsFor(client, [vpc]);

    expect(await actions.create(vpc)).toEqual({ status: 'complete' });

    const description = await client.describeStack({ stackName: 'acme-dev-vpc' });
    expect(description?.status).toBe('CREATE_COMPLETE');
    expect(description?.parameters).toEqual({ VpcCidr: '10.0.0.0/16', Zones: 'a,b' });
    expect(description?.tags).toEqual({ Team: 'net', Cost: '12' });
    expect(description?.outputs).toEqual({ VpcId: 'acme-dev-vpc-Vpc', Cidr: '10.0.0.0/16' });
  });

  it('treats an existing stack as created and an unchanged one as updated', async () => {
    const client = createLocalProvider({ store: createMemoryStateStore() });
    const vpc = stack('dev/vpc', vpcConfig);
    const actions = actionsFor(client, [vpc]);

    await actions.create(vpc);
    expect(await actions.create(vpc)).toEqual({ status: 'complete' });
    expect(await actions.update(vpc)).toEqual({ status: 'complete' });
    expect((await client.describeStack({ stackName: 'acme-dev-vpc' }))?.status).toBe('CREATE_COMPLETE');
  });

  it('updates a stack whose parameters changed', async () => {
    const client = createLocalProvider({ store: createMemoryStateStore() });
    const vpc = stack('dev/vpc', vpcConfig);
    await actionsFor(client, [vpc]).create(vpc);

    const changed = stack('dev/vpc', { ...vpcConfig, parameters: { VpcCidr: '10.1.0.0/16', Zones: ['a'] } });
    expect(await actionsFor(client, [changed]).update(changed)).toEqual({ status: 'complete' });

    const description = await client.describeStack({ stackName: 'acme-dev-vpc' });
    expect(description?.status).toBe('UPDATE_COMPLETE');
    expect(description?.outputs.Cidr).toBe('10.1.0.0/16');
  });

  it('passes outputs of one stack into the parameters of another', async () => {
    const client = createLocalProvider({ store: createMemoryStateStore() });
    const vpc = stack('dev/vpc', vpcConfig);
    const app = stack('dev/app', {
      template: 'app',
      parameters: { VpcId: stackOutput('dev/vpc::VpcId') },
    });
    const actions = actionsFor(client, [vpc, app]);

    await actions.runOperation({ stack: vpc, operation: 'create' });
    await actions.runOperation({ stack: app, operation: 'create' });

    expect(await client.getStackOutputs({ stackName: 'acme-dev-app' })).toEqual({
      Endpoint: 'https://acme-dev-vpc-Vpc.example.test',
    });
  });

  it('reports status, description and outputs', async () => {
    const client = createLocalProvider({
      store: createMemoryStateStore(),
      now: () => new Date('2024-05-01T00:00:00.000Z'),
    });
    const vpc = stack('dev/vpc', vpcConfig);
    const actions = actionsFor(client, [vpc]);

    expect(await actions.getStatus(vpc)).toEqual({ status: 'complete', data: 'PENDING' });
    expect(await actions.describeOutputs(vpc)).toEqual({ status: 'complete', data: null });

    await actions.create(vpc);

    expect(await actions.getStatus(vpc)).toEqual({ status: 'complete', data: 'CREATE_COMPLETE' });
    expect(await actions.describeOutputs(vpc)).toEqual({
      status: 'complete',
      data: { VpcId: 'acme-dev-vpc-Vpc', Cidr: '10.0.0.0/16' },
    });
    expect(await actions.describe(vpc)).toEqual({
      status: 'complete',
      data: {
        stackName: 'acme-dev-vpc',
        status: 'CREATE_COMPLETE',
        parameters: { VpcCidr: '10.0.0.0/16', Zones: 'a,b' },
        outputs: { VpcId: 'acme-dev-vpc-Vpc', Cidr: '10.0.0.0/16' },
        tags: { Team: 'net', Cost: '12' },
        createdAt: '2024-05-01T00:00:00.000Z',
        updatedAt: null,
      },
    });
  });

  it('validates and generates templates', async () => {
    const client = createLocalProvider({ store: createMemoryStateStore() });
    const vpc = stack('dev/vpc', vpcConfig);
    const actions = actionsFor(client, [vpc]);

    expect(await actions.validate(vpc)).toEqual({
      status: 'complete',
      data: {
        description: 'Network',
        parameters: ['VpcCidr', 'Zones'],
        outputs: ['VpcId', 'Cidr'],
        parameterDefaults: {},
      },
    });
    expect(await actions.generate(vpc)).toEqual({ status: 'complete', data: TEMPLATES.vpc });
  });

  it('validates and generates templates whose parameters cannot be resolved', async () => {
    const client = createLocalProvider({ store: createMemoryStateStore() });
    const vpc = stack('dev/vpc', {
      ...vpcConfig,
      parameters: { VpcCidr: environmentVariable('STACKPILOT_UNSET_VARIABLE'), Zones: ['a'] },
      tags: { Owner: environmentVariable('STACKPILOT_UNSET_VARIABLE') },
    });
    const actions = actionsFor(client, [vpc]);

    expect(await actions.generate(vpc)).toEqual({ status: 'complete', data: TEMPLATES.vpc });
    expect((await actions.validate(vpc)).status).toBe('complete');
    await expect(actions.create(vpc)).rejects.toThrow(
      "Environment variable 'STACKPILOT_UNSET_VARIABLE' is not set"
    );
  });

  it('dumps config with placeholders for stacks that are not deployed', async () => {
    const client = createLocalProvider({ store: createMemoryStateStore() });
    const vpc = stack('dev/vpc', vpcConfig);
    const app = stack('dev/app', {
      template: 'app',
      parameters: { VpcId: stackOutput('dev/vpc::VpcId') },
      userData: { Note: stackOutput('dev/vpc::Cidr') },
    });
    const actions = actionsFor(client, [vpc, app], { placeholders: true });

    const result = await actions.dumpConfig(app);

    expect(result.status).toBe('complete');
    expect(result.data).toEqual(
      expect.objectContaining({
        stackId: 'dev/app',
        stackName: 'acme-dev-app',
        parameters: { VpcId: 'stackoutputdevvpcVpcId' },
        userData: { Note: '{ !stack_output(dev/vpc::Cidr) }' },
        dependencies: ['dev/vpc'],
      })
    );
  });
});

describe('diff', () => {
  const vpcConfig: StackConfigInput = {
    template: 'vpc',
    parameters: { VpcCidr: '10.0.0.0/16', Zones: ['a', 'b'] },
    tags: { Team: 'net', Cost: 12 },
  };

  it('reports everything as added for a stack that is not deployed', async () => {
    const client = createLocalProvider({ store: createMemoryStateStore() });
    const vpc = stack('dev/vpc', vpcConfig);

    expect(await actionsFor(client, [vpc]).diff(vpc)).toEqual({
      status: 'complete',
      data: {
        stackName: 'acme-dev-vpc',
        deployed: false,
        template: [
          { path: 'Description', change: 'added' },
          { path: 'Outputs.Cidr', change: 'added' },
          { path: 'Outputs.VpcId', change: 'added' },
          { path: 'Parameters.VpcCidr', change: 'added' },
          { path: 'Parameters.Zones', change: 'added' },
          { path: 'Resources.Vpc', change: 'added' },
        ],
        parameters: [
          { key: 'VpcCidr', change: 'added', deployed: null, generated: '10.0.0.0/16' },
          { key: 'Zones', change: 'added', deployed: null, generated: 'a,b' },
        ],
        tags: [
          { key: 'Cost', change: 'added', deployed: null, generated: '12' },
          { key: 'Team', change: 'added', deployed: null, generated: 'net' },
        ],
        hasChanges: true,
      },
    });
  });

  it('counts parameters left to their default as unchanged', async () => {
    const client = createLocalProvider({ store: createMemoryStateStore() });
    const queue = stack('dev/queue', { template: 'queue', parameters: { Size: 'small' } });
    const actions = actionsFor(client, [queue]);
    await actions.create(queue);

    expect(await actions.diff(queue)).toEqual({
      status: 'complete',
      data: {
        stackName: 'acme-dev-queue',
        deployed: true,
        template: [],
        parameters: [],
        tags: [],
        hasChanges: false,
      },
    });
  });

  it('reports changed parameters and tags of a deployed stack', async () => {
    const client = createLocalProvider({ store: createMemoryStateStore() });
    const vpc = stack('dev/vpc', vpcConfig);
    await actionsFor(client, [vpc]).create(vpc);

    const changed = stack('dev/vpc', {
      ...vpcConfig,
      parameters: { VpcCidr: '10.1.0.0/16', Zones: ['a', 'b'] },
      tags: { Team: 'ops' },
    });
    const result = await actionsFor(client, [changed]).diff(changed);

    expect(result.data).toEqual({
      stackName: 'acme-dev-vpc',
      deployed: true,
      template: [],
      parameters: [
        { key: 'VpcCidr', change: 'modified', deployed: '10.0.0.0/16', generated: '10.1.0.0/16' },
      ],
      tags: [
        { key: 'Cost', change: 'removed', deployed: '12', generated: null },
        { key: 'Team', change: 'modified', deployed: 'net', generated: 'ops' },
      ],
      hasChanges: true,
    });
  });

  it('runs the diff hooks', async () => {
    const events: string[] = [];
    const hooked = stack('dev/vpc', {
      ...vpcConfig,
      hooks: {
        before_diff: [recording('before_diff', events)],
        after_diff: [recording('after_diff', events)],
      },
    });

    await actionsFor(createLocalProvider({ store: createMemoryStateStore() }), [hooked]).diff(hooked);

    expect(events).toEqual(['before_diff', 'after_diff']);
  });
});

describe('launch', () => {
  const target = () => stack('dev/vpc', { template: 'vpc' });

  it('creates a stack that does not exist', async () => {
    const { client, calls } = fakeClient();
    expect(await actionsFor(client, [target()]).launch(target())).toEqual({ status: 'complete' });
    expect(calls).toEqual(['create']);
  });

  it('updates a stack that is complete', async () => {
    const { client, calls } = fakeClient({ status: 'UPDATE_COMPLETE' });
    expect(await actionsFor(client, [target()]).launch(target())).toEqual({ status: 'complete' });
    expect(calls).toEqual(['update']);
  });

  it('deletes and recreates a stack that failed to create', async () => {
    const { client, calls } = fakeClient({ status: 'ROLLBACK_COMPLETE' });
    expect(await actionsFor(client, [target()]).launch(target())).toEqual({ status: 'complete' });
    expect(calls).toEqual(['delete', 'create']);
  });

  it('leaves a stack that is in progress alone', async () => {
    const { client, calls } = fakeClient({ status: 'UPDATE_IN_PROGRESS' });
    expect(await actionsFor(client, [target()]).launch(target())).toEqual({ status: 'in-progress' });
    expect(calls).toEqual([]);
  });

  it('refuses to update a failed stack', async () => {
    const { client } = fakeClient({ status: 'UPDATE_ROLLBACK_FAILED' });
    await expect(actionsFor(client, [target()]).launch(target())).rejects.toThrow(
      CannotUpdateFailedStackError
    );
  });

  it('runs the launch hooks around the create hooks', async () => {
    const events: string[] = [];
    const hooked = stack('dev/vpc', {
      template: 'vpc',
      hooks: {
        before_launch: [recording('before_launch', events)],
        before_create: [recording('before_create', events)],
        after_create: [recording('after_create', events)],
        after_launch: [recording('after_launch', events)],
      },
    });
    const { client } = fakeClient();

    await actionsFor(client, [hooked]).launch(hooked);

    expect(events).toEqual(['before_launch', 'before_create', 'after_create', 'after_launch']);
  });
});

describe('delete', () => {
  it('completes at once when the stack does not exist', async () => {
    const { client, calls } = fakeClient();
    const vpc = stack('dev/vpc');
    expect(await actionsFor(client, [vpc]).delete(vpc)).toEqual({ status: 'complete' });
    expect(calls).toEqual([]);
  });

  it('deletes an existing stack and waits for it to go', async () => {
    const { client, calls } = fakeClient({ status: 'CREATE_COMPLETE' });
    const vpc = stack('dev/vpc');
    expect(await actionsFor(client, [vpc]).delete(vpc)).toEqual({ status: 'complete' });
    expect(calls).toEqual(['delete']);
  });
});

describe('protection', () => {
  it('refuses to change a protected stack', async () => {
    const { client, calls } = fakeClient({ status: 'CREATE_COMPLETE' });
    const guarded = stack('dev/vpc', { template: 'vpc', protect: true });
    const actions = actionsFor(client, [guarded]);

    await expect(actions.update(guarded)).rejects.toThrow(ProtectedStackError);
    await expect(actions.delete(guarded)).rejects.toThrow(
      "Cannot perform action on 'dev/vpc': stack protection is currently enabled."
    );
    await expect(actions.launch(guarded)).rejects.toThrow(ProtectedStackError);
    expect(calls).toEqual([]);
  });
});

describe('timeouts', () => {
  it('cancels an update that outlives the stack timeout', async () => {
    const { client, calls } = fakeClient({
      status: 'CREATE_COMPLETE',
      afterUpdate: 'UPDATE_IN_PROGRESS',
    });
    const slow = stack('dev/vpc', { template: 'vpc', timeoutMinutes: 1 });
    let clock = 0;
    const actions = actionsFor(client, [slow], {
      now: () => clock,
      sleep: async () => {
        clock += 30_000;
      },
    });

    expect(await actions.update(slow)).toEqual({ status: 'failed', timedOut: true });
    expect(calls).toEqual(['update', 'cancel']);
  });

  it('reports a create that is still running at the timeout', async () => {
    const { client } = fakeClient();
    client.createStack = async () => {};
    client.describeStack = async ({ stackName }) => ({
      stackName,
      status: 'CREATE_IN_PROGRESS',
      parameters: {},
      outputs: {},
      tags: {},
      createdAt: '2024-05-01T00:00:00.000Z',
    });
    const slow = stack('dev/vpc', { template: 'vpc', timeoutMinutes: 1 });
    let clock = 0;
    const actions = actionsFor(client, [slow], {
      now: () => clock,
      sleep: async () => {
        clock += 45_000;
      },
    });

    expect(await actions.create(slow)).toEqual({ status: 'in-progress', timedOut: true });
  });
});
