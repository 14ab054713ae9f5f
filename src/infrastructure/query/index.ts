export { PostgresQueryService } from './postgres-query.js';
export { normalizeRow, normalizeValue } from './normalize.js';
export { listQueryFiles, parseTaskFile, loadTasks } from './task-files.js';
