import { describe, it, expect } from 'vitest';
import { validateTasks, isValidTaskId, createJobContext, isCancelled, throwIfCancelled } from '../../src/domain/index.js';
import { makeTask } from '../helpers.js';

describe('isValidTaskId', () => {
  it.each(['daily', 'failed-logins', 'auth.v2', 'a_b'])('accepts %s', (id) => {
    expect(isValidTaskId(id)).toBe(true);
  });

  it.each(['', 'has space', 'a/b', 'ünicode'])('rejects %j', (id) => {
    expect(isValidTaskId(id)).toBe(false);
  });
});

describe('validateTasks', () => {
  it('accepts distinct well-formed tasks', () => {
    expect(() => validateTasks([makeTask('a'), makeTask('b')])).not.toThrow();
  });

  it('rejects duplicate ids naming both sources', () => {
    const tasks = [makeTask('a', { source: 'one/a.sql' }), makeTask('a', { source: 'two/a.sql' })];
    expect(() => validateTasks(tasks)).toThrow(
      expect.objectContaining({
        kind: 'DuplicateTaskId',
        context: { task_id: 'a', sources: ['one/a.sql', 'two/a.sql'] },
      }),
    );
  });

  it('rejects an empty query', () => {
    expect(() => validateTasks([makeTask('a', { query: '  \n' })])).toThrow(
      expect.objectContaining({ kind: 'InvalidTask', message: 'task "a" has an empty query' }),
    );
  });

  it('rejects a malformed id', () => {
    expect(() => validateTasks([makeTask('bad id')])).toThrow(expect.objectContaining({ kind: 'InvalidTask' }));
  });
});

describe('job context', () => {
  it('trims the job id', () => {
    expect(createJobContext('  job-7 ')).toEqual({ jobId: 'job-7' });
  });

  it('rejects a blank job id', () => {
    expect(() => createJobContext('   ')).toThrow(expect.objectContaining({ kind: 'InvalidConfig' }));
  });

  it('reports cancellation from the signal', () => {
    const controller = new AbortController();
    expect(isCancelled(createJobContext('job-7'))).toBe(false);
    expect(isCancelled(createJobContext('job-7', controller.signal))).toBe(false);

    controller.abort();
    expect(isCancelled(createJobContext('job-7', controller.signal))).toBe(true);
  });

  it('raises Cancelled once the signal fires', () => {
    const controller = new AbortController();
    const ctx = createJobContext('job-7', controller.signal);
    expect(() => throwIfCancelled(ctx)).not.toThrow();

    controller.abort();
    expect(() => throwIfCancelled(ctx)).toThrow(
      expect.objectContaining({ kind: 'Cancelled', context: { job_id: 'job-7' } }),
    );
  });
});
