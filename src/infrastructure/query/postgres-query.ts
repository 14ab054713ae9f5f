import type { Logger } from 'pino';
import type { QueryOptions, QueryResult, QueryService, Task } from '../../domain/index.js';
import { PipelineError } from '../../domain/index.js';
import type { SqlClient } from '../db/index.js';
import { normalizeRow } from './normalize.js';

/**
 * QueryService that runs each task's SQL verbatim against PostgreSQL.
 *
 * The in-flight statement is cancelled server-side when the job's signal
 * aborts or the per-task deadline passes. Rows are normalized before they
 * are handed to the cache.
 */
export class PostgresQueryService implements QueryService {
  private readonly sql: SqlClient;
  private readonly log: Logger;

  constructor(sql: SqlClient, log: Logger) {
    this.sql = sql;
    this.log = log;
  }

  async execute(task: Task, options: QueryOptions = {}): Promise<QueryResult> {
    const { signal, timeoutMs } = options;

    if (signal?.aborted === true) {
      throw new PipelineError('Cancelled', 'query cancelled before start', { task_id: task.id });
    }

    const query = this.sql.unsafe(task.query);
    let timedOut = false;

    const cancel = (): void => {
      query.cancel();
    };
    const timer = timeoutMs !== undefined && timeoutMs > 0
      ? setTimeout(() => {
        timedOut = true;
        cancel();
      }, timeoutMs)
      : undefined;

    signal?.addEventListener('abort', cancel, { once: true });

    const started = Date.now();
    try {
      const rows = await query;
      this.log.debug(
        { task_id: task.id, rows: rows.length, duration_ms: Date.now() - started },
        'Query finished',
      );
      return rows.map((row) => normalizeRow(row));
    } catch (err: unknown) {
      if (timedOut) {
        throw new Error(`query timed out after ${timeoutMs}ms`, { cause: err });
      }
      throw err;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', cancel);
    }
  }
}
