import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { listOption, parseOptions, splitList, toConfigOverrides } from '../../src/interfaces/cli/options.js';

describe('splitList', () => {
  it('splits repeated and comma separated values', () => {
    expect(splitList(['a,b', ' c ', ''])).toEqual(['a', 'b', 'c']);
    expect(splitList('x')).toEqual(['x']);
    expect(splitList(undefined)).toEqual([]);
  });
});

describe('parseOptions', () => {
  const schema = z.object({ tag: listOption, jobId: z.string().min(1) });

  it('parses a commander option bag', () => {
    expect(parseOptions(schema, { tag: ['x,y'], jobId: 'job-1' })).toEqual({ tag: ['x', 'y'], jobId: 'job-1' });
  });

  it('raises InvalidConfig for bad options', () => {
    expect(() => parseOptions(schema, { tag: 3 })).toThrow(
      expect.objectContaining({ kind: 'InvalidConfig', message: 'invalid command options' }),
    );
  });
});

describe('toConfigOverrides', () => {
  it('maps flags to config keys', () => {
    expect(toConfigOverrides({ redisUrl: 'redis://cache:6379', cacheTtl: '60' })).toEqual({
      REDIS_URL: 'redis://cache:6379',
      BATCHWATCH_CACHE_TTL_SECONDS: '60',
    });
  });
});
