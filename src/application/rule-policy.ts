import type { AlertBody, AttrValue, CacheEntry, PolicyService, QueryRow } from '../domain/index.js';
import type { MatchCondition, Operator, PolicyRule, ThresholdCondition } from './rule-schema.js';

const PLACEHOLDER_RE = /\{\{\s*([\w.-]+)\s*\}\}/g;

/**
 * Compares two dynamic values using the specified operator.
 * Ordering operators only apply to two numbers or two strings.
 */
export function compare(left: AttrValue | undefined, operator: Operator, right: AttrValue): boolean {
  switch (operator) {
    case '==': return left === right;
    case '!=': return left !== right;
  }

  if (typeof left === 'number' && typeof right === 'number') {
    return ordered(left - right, operator);
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return ordered(left < right ? -1 : left > right ? 1 : 0, operator);
  }
  return false;
}

function ordered(diff: number, operator: '>' | '>=' | '<' | '<='): boolean {
  switch (operator) {
    case '>':  return diff > 0;
    case '>=': return diff >= 0;
    case '<':  return diff < 0;
    case '<=': return diff <= 0;
  }
}

/** Resolves a dotted path ("user.name") inside a row. */
export function lookupField(row: QueryRow, path: string): AttrValue | undefined {
  let current: AttrValue | undefined = row;
  for (const segment of path.split('.')) {
    if (current === null || typeof current !== 'object' || Array.isArray(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function renderValue(value: AttrValue | undefined): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

/** Replaces `{{name}}` placeholders; unknown names render as "". */
export function renderTemplate(template: string, vars: QueryRow): string {
  return template.replace(PLACEHOLDER_RE, (_match, name: string) => renderValue(lookupField(vars, name)));
}

function appliesTo(rule: PolicyRule, taskId: string): boolean {
  return rule.enabled && (rule.tasks === undefined || rule.tasks.includes(taskId));
}

function evaluateThreshold(rule: PolicyRule, condition: ThresholdCondition, entry: CacheEntry): AlertBody[] {
  const count = entry.payload.length;
  if (!compare(count, condition.operator, condition.value)) return [];

  const vars: QueryRow = { count, task_id: entry.task_id, rule_id: rule.id };
  return [{
    title: renderTemplate(rule.title, vars),
    description: rule.description === undefined ? undefined : renderTemplate(rule.description, vars),
    attrs: {
      rule_id: rule.id,
      task_id: entry.task_id,
      severity: rule.severity,
      count,
    },
  }];
}

function evaluateMatch(rule: PolicyRule, condition: MatchCondition, entry: CacheEntry): AlertBody[] {
  const bodies: AlertBody[] = [];

  for (const row of entry.payload) {
    if (!compare(lookupField(row, condition.field), condition.operator, condition.value)) continue;

    const vars: QueryRow = { ...row, task_id: entry.task_id, rule_id: rule.id };
    bodies.push({
      title: renderTemplate(rule.title, vars),
      description: rule.description === undefined ? undefined : renderTemplate(rule.description, vars),
      timestamp: condition.timestamp_field === undefined
        ? undefined
        : lookupField(row, condition.timestamp_field),
      attrs: {
        rule_id: rule.id,
        task_id: entry.task_id,
        severity: rule.severity,
        row,
      },
    });
  }

  return bodies;
}

/**
 * PolicyService backed by declarative rules.
 *
 * Pure evaluation over the cached payload: no I/O, deterministic
 * apart from timestamps the alert constructor fills in later.
 */
export class RulePolicy implements PolicyService {
  private readonly rules: readonly PolicyRule[];

  constructor(rules: readonly PolicyRule[]) {
    this.rules = rules;
  }

  async evaluate(entry: CacheEntry): Promise<AlertBody[]> {
    const bodies: AlertBody[] = [];

    for (const rule of this.rules) {
      if (!appliesTo(rule, entry.task_id)) continue;

      const condition = rule.condition;
      if (condition.type === 'threshold') {
        bodies.push(...evaluateThreshold(rule, condition, entry));
      } else {
        bodies.push(...evaluateMatch(rule, condition, entry));
      }
    }

    return bodies;
  }

  /** Number of loaded rules. */
  get size(): number {
    return this.rules.length;
  }
}
