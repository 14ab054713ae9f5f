import type { Task } from './task.js';
import type { Alert, AlertBody } from './alert.js';
import type { CacheEntry, QueryResult } from './cache.js';

export interface QueryOptions {
  readonly signal?: AbortSignal | undefined;
  /** Per-query deadline. The service cancels the in-flight query when it passes. */
  readonly timeoutMs?: number | undefined;
}

/** Executes a task's query. Errors pass through untouched as task failures. */
export interface QueryService {
  execute(task: Task, options?: QueryOptions): Promise<QueryResult>;
}

/**
 * Rule evaluation over one cached result.
 * An empty array means no rule triggered.
 */
export interface PolicyService {
  evaluate(entry: CacheEntry, signal?: AbortSignal): Promise<AlertBody[]>;
}

/** Delivers one alert. Retry policy, if any, lives inside the implementation. */
export interface Notifier {
  notify(alert: Alert, signal?: AbortSignal): Promise<void>;
}
