export { runTasks } from './run-tasks.js';
export type { RunDeps, RunOptions, RunSummary } from './run-tasks.js';
export { evalAlerts } from './eval-alerts.js';
export type { EvalDeps, EvalSummary } from './eval-alerts.js';
export { forEachBounded } from './bounded.js';
export { attrValueSchema, attrsSchema, alertJsonSchema, decodeAlert } from './alert-schema.js';
export { RulePolicy, compare, lookupField, renderTemplate } from './rule-policy.js';
export { ruleFileSchema, policyRuleSchema, ruleConditionSchema } from './rule-schema.js';
export type { RuleFile, PolicyRule, RuleCondition, Operator, RuleSeverity } from './rule-schema.js';
export { queryResultSchema, storedEntrySchema, decodeStoredEntry } from './cache-schema.js';
export type { StoredEntry } from './cache-schema.js';
