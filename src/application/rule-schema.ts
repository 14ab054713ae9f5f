import { z } from 'zod';

/** Comparison operators shared by every condition type. */
export const operatorSchema = z.enum(['>', '>=', '<', '<=', '==', '!=']);

export type Operator = z.infer<typeof operatorSchema>;

/**
 * Fires once per cached result when its row count satisfies the comparison.
 * Example: `{ type: "threshold", metric: "count", operator: ">", value: 0 }`.
 */
export const thresholdConditionSchema = z.object({
  type: z.literal('threshold'),
  metric: z.literal('count'),
  operator: operatorSchema,
  value: z.number().finite(),
});

export type ThresholdCondition = z.infer<typeof thresholdConditionSchema>;

/**
 * Fires once per row whose `field` (dotted path) satisfies the comparison.
 * `timestamp_field` names the row column copied into the alert timestamp.
 */
export const matchConditionSchema = z.object({
  type: z.literal('match'),
  field: z.string().min(1),
  operator: operatorSchema,
  value: z.union([z.string(), z.number().finite(), z.boolean(), z.null()]),
  timestamp_field: z.string().min(1).optional(),
});

export type MatchCondition = z.infer<typeof matchConditionSchema>;

export const ruleConditionSchema = z.discriminatedUnion('type', [
  thresholdConditionSchema,
  matchConditionSchema,
]);

export type RuleCondition = z.infer<typeof ruleConditionSchema>;

const ruleSeverityEnum = z.enum(['critical', 'warning', 'info']);

export type RuleSeverity = z.infer<typeof ruleSeverityEnum>;

/**
 * One policy rule. `tasks` scopes the rule to specific TaskIDs;
 * omitted means it applies to every cached result.
 */
export const policyRuleSchema = z.object({
  id: z.string().min(1).max(255),
  title: z.string().min(1),
  description: z.string().optional(),
  severity: ruleSeverityEnum.optional().default('warning'),
  enabled: z.boolean().optional().default(true),
  tasks: z.array(z.string().min(1)).optional(),
  condition: ruleConditionSchema,
});

export type PolicyRule = z.infer<typeof policyRuleSchema>;

export const ruleFileSchema = z.object({
  rules: z.array(policyRuleSchema),
}).superRefine((file, ctx) => {
  const seen = new Set<string>();
  file.rules.forEach((rule, index) => {
    if (seen.has(rule.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate rule id "${rule.id}"`,
        path: ['rules', index, 'id'],
      });
    }
    seen.add(rule.id);
  });
});

export type RuleFile = z.infer<typeof ruleFileSchema>;
