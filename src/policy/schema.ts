/**
 * Governance Policy Schema
 *
 * The policy documents are validated once at startup into these types and
 * are never re-interpreted afterwards.
 */
import { z } from 'zod';
import { Mode } from '../control/modes';

export const ComparatorSchema = z.enum(['>', '<', '>=', '<=', '==', '!=']);
export type Comparator = z.infer<typeof ComparatorSchema>;

export const ModeRateLimitsSchema = z.object({
  tool_calls_per_minute: z.number().int().nonnegative(),
  model_calls_per_minute: z.number().int().nonnegative(),
});

export const ModelLimitsSchema = z.object({
  max_tokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  timeout_ms: z.number().int().positive().optional(),
});

export const ModeDefinitionSchema = z.object({
  description: z.string(),
  max_concurrent_tasks: z.number().int().nonnegative(),
  allowed_categories: z.array(z.string().min(1)).default([]),
  require_approval_for: z.array(z.string().min(1)).default([]),
  allowed_model_roles: z.array(z.string().min(1)).default([]),
  step_timeout_ms: z.number().int().positive(),
  task_budget_ms: z.number().int().positive(),
  /** Never zero: sampling continues in every mode */
  sampling_interval_ms: z.number().int().positive(),
  rate_limits: ModeRateLimitsSchema,
  model_limits: z.record(z.string(), ModelLimitsSchema).default({}),
});

export const ModesSchema = z.object({
  [Mode.NORMAL]: ModeDefinitionSchema,
  [Mode.ALERT]: ModeDefinitionSchema,
  [Mode.DEGRADED]: ModeDefinitionSchema,
  [Mode.LOCKDOWN]: ModeDefinitionSchema,
  [Mode.RECOVERY]: ModeDefinitionSchema,
});

export const TransitionConditionSchema = z.object({
  metric: z.string().min(1),
  operator: ComparatorSchema,
  value: z.number(),
  duration_seconds: z.number().nonnegative().default(0),
});

export const TransitionRuleSchema = z
  .object({
    name: z.string().min(1),
    from: z.nativeEnum(Mode),
    to: z.nativeEnum(Mode),
    logic: z.enum(['any', 'all']).default('any'),
    requires_approval: z.boolean().default(false),
    conditions: z.array(TransitionConditionSchema).min(1),
  })
  .refine((rule) => rule.from !== rule.to, {
    message: 'source and target mode must differ',
    path: ['to'],
  });

export const ToolPolicySchema = z.object({
  category: z.string().min(1),
  description: z.string().default(''),
  requires_approval: z.boolean().default(false),
  requires_approval_in_modes: z.array(z.nativeEnum(Mode)).default([]),
  forbidden_in_modes: z.array(z.nativeEnum(Mode)).default([]),
  allowed_paths: z.array(z.string()).default([]),
  forbidden_paths: z.array(z.string()).default([]),
  allowed_commands: z.array(z.string()).default([]),
  forbidden_commands: z.array(z.string()).default([]),
  rate_limit_per_hour: z.number().int().positive().optional(),
});

export const ModelRolePolicySchema = z.object({
  description: z.string().default(''),
});

export const ApprovalPolicySchema = z.object({
  timeout_seconds: z.number().int().positive().default(300),
});

export const GovernancePolicySchema = z
  .object({
    modes: ModesSchema,
    transition_rules: z.array(TransitionRuleSchema).default([]),
    tools: z.record(z.string(), ToolPolicySchema).default({}),
    model_roles: z.record(z.string(), ModelRolePolicySchema).default({}),
    approval: ApprovalPolicySchema.default({}),
  })
  .superRefine((policy, ctx) => {
    const seen = new Set<string>();
    policy.transition_rules.forEach((rule, index) => {
      if (seen.has(rule.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate transition rule name '${rule.name}'`,
          path: ['transition_rules', index, 'name'],
        });
      }
      seen.add(rule.name);
    });

    for (const [modeName, definition] of Object.entries(policy.modes)) {
      const roles = [...definition.allowed_model_roles, ...Object.keys(definition.model_limits)];
      for (const role of roles) {
        if (!Object.hasOwn(policy.model_roles, role)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `unknown model role '${role}'`,
            path: ['modes', modeName],
          });
        }
      }
    }
  });

export type ModeRateLimits = z.infer<typeof ModeRateLimitsSchema>;
export type ModelLimits = z.infer<typeof ModelLimitsSchema>;
export type ModeDefinition = z.infer<typeof ModeDefinitionSchema>;
export type TransitionCondition = z.infer<typeof TransitionConditionSchema>;
export type TransitionRule = z.infer<typeof TransitionRuleSchema>;
export type ToolPolicy = z.infer<typeof ToolPolicySchema>;
export type ModelRolePolicy = z.infer<typeof ModelRolePolicySchema>;
export type GovernancePolicy = z.infer<typeof GovernancePolicySchema>;
