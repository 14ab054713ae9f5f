import { PipelineError } from './errors.js';

/** Stable task identifier, derived from the task's source definition. */
export type TaskId = string;

/**
 * One unit of query work.
 *
 * `query` is opaque to the pipeline; only the query service interprets it.
 * `source` records where the task was defined (file path) for diagnostics.
 */
export interface Task {
  readonly id: TaskId;
  readonly tags: readonly string[];
  readonly query: string;
  readonly source?: string | undefined;
}

const TASK_ID_RE = /^[A-Za-z0-9_.-]+$/;

export function isValidTaskId(id: string): boolean {
  return TASK_ID_RE.test(id);
}

/**
 * Validates a configured task set: well-formed IDs, non-empty queries,
 * and no TaskID used twice.
 */
export function validateTasks(tasks: readonly Task[]): void {
  const seen = new Map<TaskId, string | undefined>();

  for (const task of tasks) {
    if (!isValidTaskId(task.id)) {
      throw new PipelineError('InvalidTask', `invalid task id "${task.id}"`, {
        task_id: task.id,
        source: task.source,
      });
    }
    if (task.query.trim() === '') {
      throw new PipelineError('InvalidTask', `task "${task.id}" has an empty query`, {
        task_id: task.id,
        source: task.source,
      });
    }
    if (seen.has(task.id)) {
      throw new PipelineError('DuplicateTaskId', `duplicate task id "${task.id}"`, {
        task_id: task.id,
        sources: [seen.get(task.id), task.source],
      });
    }
    seen.set(task.id, task.source);
  }
}
