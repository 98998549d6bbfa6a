import chalk from 'chalk';
import { beforeAll, describe, expect, it } from 'vitest';
import { diffStack } from '../../core/stack-diff.js';
import { renderStackDiff } from './diff.js';

describe('renderStackDiff', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  const deployed = {
    template: { Resources: { Queue: { Type: 'Local::Queue' } } },
    parameters: { Size: 'small', Retention: '4' },
    tags: { Team: 'net' },
  };

  it('says so when nothing changed', () => {
    const diff = diffStack({ stackName: 'acme-dev-queue', generated: deployed, deployed });

    expect(renderStackDiff({ stackId: 'dev/queue', diff })).toEqual(['dev/queue: no changes']);
  });

  it('lists changes by section', () => {
    const diff = diffStack({
      stackName: 'acme-dev-queue',
      generated: {
        template: { Resources: { Queue: { Type: 'Local::Queue' }, Dlq: { Type: 'Local::Queue' } } },
        parameters: { Size: 'large', Retention: '4' },
        tags: {},
      },
      deployed,
    });

    expect(renderStackDiff({ stackId: 'dev/queue', diff })).toEqual([
      'dev/queue:',
      '  template',
      '    + Resources.Dlq',
      '  parameters',
      '    ~ Size: small -> large',
      '  tags',
      '    - Team: net',
    ]);
  });

  it('marks a stack that is not deployed', () => {
    const diff = diffStack({
      stackName: 'acme-dev-queue',
      generated: { template: {}, parameters: { Size: 'small' }, tags: {} },
      deployed: null,
    });

    expect(renderStackDiff({ stackId: 'dev/queue', diff })).toEqual([
      'dev/queue: not deployed',
      '  parameters',
      '    + Size: small',
    ]);
  });
});
