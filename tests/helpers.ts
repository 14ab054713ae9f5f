import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { Task } from '../src/domain/index.js';

/** Fixed "now" for deterministic timestamps: 2026-02-18T12:00:00Z. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z').getTime();

/** Minimal fake logger; `child` returns the same instance so calls are observable. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

/**
 * Factory for creating test tasks with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeTask(id: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    tags: overrides.tags ?? [],
    query: overrides.query ?? `SELECT * FROM ${id.replace(/[^a-z0-9_]/gi, '_')}`,
    source: overrides.source ?? `${id}.sql`,
  };
}

/** Awaits a promise expected to reject and returns the rejection reason. */
export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err: unknown) {
    return err;
  }
  throw new Error('expected promise to reject');
}
