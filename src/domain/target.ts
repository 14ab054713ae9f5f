import type { Task, TaskId } from './task.js';
import { PipelineError } from './errors.js';

/**
 * Selection criterion over tasks. Both sets optional; empty means "all tasks".
 */
export interface Target {
  readonly tags?: readonly string[] | undefined;
  readonly ids?: readonly TaskId[] | undefined;
}

export function isEmptyTarget(target: Target): boolean {
  return (target.tags?.length ?? 0) === 0 && (target.ids?.length ?? 0) === 0;
}

/** Rejects blank tag or ID values, which are almost always flag typos. */
export function validateTarget(target: Target): void {
  const blankTags = (target.tags ?? []).filter((t) => t.trim() === '');
  const blankIds = (target.ids ?? []).filter((id) => id.trim() === '');

  if (blankTags.length > 0 || blankIds.length > 0) {
    throw new PipelineError('InvalidTarget', 'target contains empty tag or id', {
      tags: target.tags ?? [],
      ids: target.ids ?? [],
    });
  }
}

/** A task matches when its ID is listed, it shares a tag, or the target is empty. */
export function matchesTarget(task: Task, target: Target): boolean {
  if (isEmptyTarget(target)) return true;
  if (target.ids?.includes(task.id) === true) return true;
  const tags = target.tags ?? [];
  return task.tags.some((tag) => tags.includes(tag));
}

/**
 * Filters tasks by target, preserving input order.
 *
 * Pure: no I/O. Throws InvalidTarget for malformed criteria and
 * NoTasksSelected when non-empty criteria match none of a non-empty task set.
 */
export function selectTasks(tasks: readonly Task[], target: Target): Task[] {
  validateTarget(target);

  if (isEmptyTarget(target)) return [...tasks];

  const selected = tasks.filter((task) => matchesTarget(task, target));

  if (selected.length === 0 && tasks.length > 0) {
    throw new PipelineError('NoTasksSelected', 'no task matches the requested tags or ids', {
      tags: target.tags ?? [],
      ids: target.ids ?? [],
      configured: tasks.length,
    });
  }

  return selected;
}
