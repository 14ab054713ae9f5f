import { readFileSync } from 'node:fs';
import type { PolicyRule } from '../../application/rule-schema.js';
import { ruleFileSchema } from '../../application/rule-schema.js';
import { RulePolicy } from '../../application/rule-policy.js';
import { PipelineError, describeError } from '../../domain/index.js';

/**
 * Reads and validates a JSON rule file.
 * Unlike notification config there is no fallback: a broken rule file
 * would silently suppress every alert.
 */
export function loadRules(filePath: string): PolicyRule[] {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err: unknown) {
    throw new PipelineError('InvalidConfig', `fail to read rule file: ${describeError(err)}`, {
      rules_file: filePath,
    }, { cause: err });
  }

  const parsed = ruleFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new PipelineError('InvalidConfig', 'invalid rule file', {
      rules_file: filePath,
      issues: parsed.error.flatten(),
    });
  }

  return parsed.data.rules;
}

export function createRulePolicy(filePath: string): RulePolicy {
  return new RulePolicy(loadRules(filePath));
}
