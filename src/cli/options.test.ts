import { InvalidArgumentError } from 'commander';
import { describe, expect, it } from 'vitest';
import { parseMaxConcurrency } from './options.js';

describe('parseMaxConcurrency', () => {
  it('accepts positive integers', () => {
    expect(parseMaxConcurrency('4')).toBe(4);
  });

  it.each(['0', '-1', '1.5', 'many', ''])('rejects %j', (value) => {
    expect(() => parseMaxConcurrency(value)).toThrow(InvalidArgumentError);
  });
});
