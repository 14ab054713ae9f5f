import { readFileSync, readdirSync } from 'node:fs';
import type { Dirent } from 'node:fs';
import { basename, extname, join } from 'node:path';
import type { Task } from '../../domain/index.js';
import { PipelineError, describeError, validateTasks } from '../../domain/index.js';

const HEADER_RE = /^--\s*(id|tags)\s*:\s*(.*)$/i;

/**
 * Recursively lists `.sql` files under `queryDir`, sorted so task order
 * does not depend on filesystem enumeration order.
 */
export function listQueryFiles(queryDir: string): string[] {
  let entries: Dirent[];
  try {
    entries = readdirSync(queryDir, { withFileTypes: true });
  } catch (err: unknown) {
    throw new PipelineError('InvalidConfig', `fail to read query directory: ${describeError(err)}`, {
      query_dir: queryDir,
    }, { cause: err });
  }

  const files: string[] = [];
  for (const entry of entries) {
    const path = join(queryDir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listQueryFiles(path));
    } else if (entry.isFile() && extname(entry.name) === '.sql') {
      files.push(path);
    }
  }

  return files.sort();
}

function splitTags(value: string): string[] {
  const tags = value.split(/[,\s]+/).map((t) => t.trim()).filter((t) => t !== '');
  return [...new Set(tags)];
}

/**
 * Parses a task from a SQL file.
 *
 * Metadata lives in the leading comment block:
 *
 *   -- id: failed-logins
 *   -- tags: auth, daily
 *   SELECT ...
 *
 * Without an `id` header the file name (minus `.sql`) is the TaskID.
 * Header lines stay in the query; they are ordinary SQL comments.
 */
export function parseTaskFile(path: string, content: string): Task {
  let id = basename(path, '.sql');
  const tags: string[] = [];

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (line === '') continue;
    if (!line.startsWith('--')) break;

    const match = HEADER_RE.exec(line);
    if (match === null) continue;

    const key = (match[1] ?? '').toLowerCase();
    const value = (match[2] ?? '').trim();
    if (key === 'id' && value !== '') {
      id = value;
    } else if (key === 'tags') {
      tags.push(...splitTags(value));
    }
  }

  return {
    id,
    tags: [...new Set(tags)],
    query: content,
    source: path,
  };
}

/** Loads and validates every task under `queryDir`. */
export function loadTasks(queryDir: string): Task[] {
  const files = listQueryFiles(queryDir);
  if (files.length === 0) {
    throw new PipelineError('InvalidConfig', 'no query files', { query_dir: queryDir });
  }

  const tasks = files.map((file) => parseTaskFile(file, readFileSync(file, 'utf-8')));
  validateTasks(tasks);
  return tasks;
}
