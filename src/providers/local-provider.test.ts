import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { DeployStackInput, ProviderClient } from '../types/index.js';
import { ProviderError, StackDoesNotExistError } from '../core/errors.js';
import { createMemoryStateStore } from '../storage/state-store.js';
import { createLocalProvider, createLocalProviderFactory } from './local-provider.js';
import { createSessionCache } from './session-cache.js';
import { effectiveParameters, evaluateOutputs, parseTemplate } from './template-document.js';

const TEMPLATE = [
  'Description: Queue',
  'Parameters:',
  '  QueueName:',
  '    Type: String',
  '  Retention:',
  '    Type: Number',
  '    Default: 4',
  'Resources:',
  '  Queue:',
  '    Type: Local::Queue',
  'Outputs:',
  '  QueueArn:',
  '    Value: !Join [":", ["arn", !Ref Queue]]',
  '  Name:',
  '    Value: !Ref QueueName',
  '  Label:',
  '    Value: ${AWS::StackName}/${QueueName}',
  '',
].join('\n');

const input = (overrides: Partial<DeployStackInput> = {}): DeployStackInput => ({
  stackName: 'acme-jobs',
  templateBody: TEMPLATE,
  parameters: { QueueName: 'jobs' },
  tags: { Team: 'core' },
  ...overrides,
});

describe('template documents', () => {
  it('turns intrinsic tags into their long form', () => {
    const template = parseTemplate(TEMPLATE);
    expect(template.Outputs?.QueueArn.Value).toEqual({ 'Fn::Join': [':', ['arn', { Ref: 'Queue' }]] });
    expect(template.Outputs?.Name.Value).toEqual({ Ref: 'QueueName' });
  });

  it('rejects templates without resources', () => {
    expect(() => parseTemplate('Description: empty\n')).toThrow(
      'Template format error: Resources: Required'
    );
  });

  it('rejects malformed yaml', () => {
    expect(() => parseTemplate('Resources: [')).toThrow(ProviderError);
  });

  it('fills in defaults and rejects missing or unknown parameters', () => {
    const template = parseTemplate(TEMPLATE);
    expect(effectiveParameters({ template, parameters: { QueueName: 'jobs' } })).toEqual({
      QueueName: 'jobs',
      Retention: '4',
    });
    expect(() => effectiveParameters({ template, parameters: {} })).toThrow(
      'Parameters: [QueueName] must have values'
    );
    expect(() =>
      effectiveParameters({ template, parameters: { QueueName: 'jobs', Color: 'red' } })
    ).toThrow('Parameters: [Color] do not exist in the template');
  });

  it('evaluates outputs', () => {
    const template = parseTemplate(TEMPLATE);
    expect(
      evaluateOutputs({ template, stackName: 'acme-jobs', parameters: { QueueName: 'jobs', Retention: '4' } })
    ).toEqual({
      QueueArn: 'arn:acme-jobs-Queue',
      Name: 'jobs',
      Label: 'acme-jobs/jobs',
    });
  });
});

describe('createLocalProvider', () => {
  let client: ProviderClient;

  beforeEach(() => {
    client = createLocalProvider({
      store: createMemoryStateStore(),
      now: () => new Date('2024-05-01T10:00:00.000Z'),
    });
  });

  it('creates and describes a stack', async () => {
    await client.createStack(input());

    expect(await client.describeStack({ stackName: 'acme-jobs' })).toEqual({
      stackName: 'acme-jobs',
      status: 'CREATE_COMPLETE',
      parameters: { QueueName: 'jobs', Retention: '4' },
      outputs: { QueueArn: 'arn:acme-jobs-Queue', Name: 'jobs', Label: 'acme-jobs/jobs' },
      tags: { Team: 'core' },
      createdAt: '2024-05-01T10:00:00.000Z',
      updatedAt: null,
    });
  });

  it('refuses to create a stack twice', async () => {
    await client.createStack(input());
    await expect(client.createStack(input())).rejects.toMatchObject({
      code: 'AlreadyExistsException',
      message: 'Stack [acme-jobs] already exists',
    });
  });

  it('reports when an update changes nothing', async () => {
    await client.createStack(input());
    await expect(client.updateStack(input())).rejects.toThrow('No updates are to be performed.');
  });

  it('updates parameters and tags', async () => {
    await client.createStack(input());
    await client.updateStack(input({ tags: { Team: 'platform' } }));

    const description = await client.describeStack({ stackName: 'acme-jobs' });
    expect(description?.status).toBe('UPDATE_COMPLETE');
    expect(description?.tags).toEqual({ Team: 'platform' });
    expect(description?.updatedAt).toBe('2024-05-01T10:00:00.000Z');
  });

  it('fails updates and output lookups for missing stacks', async () => {
    await expect(client.updateStack(input())).rejects.toThrow(StackDoesNotExistError);
    await expect(client.getStackOutputs({ stackName: 'acme-jobs' })).rejects.toThrow(
      'Stack with id acme-jobs does not exist'
    );
    expect(await client.describeStack({ stackName: 'acme-jobs' })).toBeNull();
  });

  it('deletes stacks', async () => {
    await client.createStack(input());
    await client.deleteStack({ stackName: 'acme-jobs' });
    expect(await client.describeStack({ stackName: 'acme-jobs' })).toBeNull();
  });

  it('only cancels updates in progress', async () => {
    await client.createStack(input());
    await expect(client.cancelUpdateStack({ stackName: 'acme-jobs' })).rejects.toThrow(
      'CancelUpdateStack cannot be called from current stack status CREATE_COMPLETE.'
    );
  });

  it('validates templates', async () => {
    expect(await client.validateTemplate({ templateBody: TEMPLATE })).toEqual({
      description: 'Queue',
      parameters: ['QueueName', 'Retention'],
      outputs: ['QueueArn', 'Name', 'Label'],
      parameterDefaults: { Retention: '4' },
    });
  });

  it('returns the template a stack was deployed with', async () => {
    expect(await client.getTemplate({ stackName: 'acme-jobs' })).toBeNull();

    await client.createStack(input());

    expect(await client.getTemplate({ stackName: 'acme-jobs' })).toBe(TEMPLATE);
  });
});

describe('createLocalProviderFactory', () => {
  let stateDir: string;

  beforeEach(async () => {
    stateDir = await mkdtemp(join(tmpdir(), 'stackpilot-provider-'));
  });

  afterEach(async () => {
    await rm(stateDir, { recursive: true, force: true });
  });

  it('keeps separate state per region and persists it on disk', async () => {
    const factory = createLocalProviderFactory({ stateDir });
    const west = await factory({ region: 'eu-west-1' });
    await west.createStack(input());

    const westAgain = await factory({ region: 'eu-west-1' });
    const east = await factory({ region: 'us-east-1' });

    expect((await westAgain.describeStack({ stackName: 'acme-jobs' }))?.status).toBe('CREATE_COMPLETE');
    expect(await east.describeStack({ stackName: 'acme-jobs' })).toBeNull();
  });
});

describe('createSessionCache', () => {
  const provider = () => createLocalProvider({ store: createMemoryStateStore() });

  it('creates one client per profile and region', async () => {
    let created = 0;
    const sessions = createSessionCache({
      createClient: async () => {
        created += 1;
        return provider();
      },
    });

    const [first, second] = await Promise.all([
      sessions.getClient({ region: 'eu-west-1' }),
      sessions.getClient({ region: 'eu-west-1' }),
    ]);
    await sessions.getClient({ region: 'eu-west-1', profile: 'ops' });

    expect(first).toBe(second);
    expect(created).toBe(2);
    expect(sessions.size()).toBe(2);
  });

  it('forgets a client whose creation failed', async () => {
    let attempts = 0;
    const sessions = createSessionCache({
      createClient: async () => {
        attempts += 1;
        if (attempts === 1) throw new Error('no credentials');
        return provider();
      },
    });

    await expect(sessions.getClient({})).rejects.toThrow('no credentials');
    expect(sessions.size()).toBe(0);
    await expect(sessions.getClient({})).resolves.toBeDefined();
    expect(attempts).toBe(2);
  });
});
