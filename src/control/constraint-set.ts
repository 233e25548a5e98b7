/**
 * Constraint sets: the concrete limits of one mode, derived from the
 * governance policy. Computed once per mode and never mutated; a mode change
 * replaces the published snapshot as a whole.
 */
import { GovernancePolicy, ModelLimits } from '../policy/schema';
import { Mode } from './modes';

export interface ConstraintSet {
  readonly mode: Mode;
  readonly allowedCategories: readonly string[];
  readonly approvalRequired: readonly string[];
  readonly allowedModelRoles: readonly string[];
  readonly concurrencyCeiling: number;
  readonly stepTimeoutMs: number;
  readonly taskBudgetMs: number;
  readonly samplingIntervalMs: number;
  readonly toolCallsPerMinute: number;
  readonly modelCallsPerMinute: number;
  readonly modelLimits: Readonly<Record<string, Readonly<ModelLimits>>>;
}

/**
 * The pair every reader sees together. `version` increases by one on every
 * transition.
 */
export interface ModeSnapshot {
  readonly mode: Mode;
  readonly constraints: ConstraintSet;
  readonly version: number;
  /** When this mode became active (ms since epoch) */
  readonly since: number;
}

export function deriveConstraintSet(mode: Mode, policy: GovernancePolicy): ConstraintSet {
  const definition = policy.modes[mode];

  const modelLimits: Record<string, Readonly<ModelLimits>> = {};
  for (const [role, limits] of Object.entries(definition.model_limits)) {
    modelLimits[role] = Object.freeze({ ...limits });
  }

  return Object.freeze({
    mode,
    allowedCategories: Object.freeze([...definition.allowed_categories]),
    approvalRequired: Object.freeze([...definition.require_approval_for]),
    allowedModelRoles: Object.freeze([...definition.allowed_model_roles]),
    concurrencyCeiling: definition.max_concurrent_tasks,
    stepTimeoutMs: definition.step_timeout_ms,
    taskBudgetMs: definition.task_budget_ms,
    samplingIntervalMs: definition.sampling_interval_ms,
    toolCallsPerMinute: definition.rate_limits.tool_calls_per_minute,
    modelCallsPerMinute: definition.rate_limits.model_calls_per_minute,
    modelLimits: Object.freeze(modelLimits),
  });
}

export function deriveAllConstraintSets(
  policy: GovernancePolicy,
  modes: readonly Mode[],
): ReadonlyMap<Mode, ConstraintSet> {
  return new Map(modes.map((mode): [Mode, ConstraintSet] => [mode, deriveConstraintSet(mode, policy)]));
}

export function createSnapshot(constraints: ConstraintSet, version: number, since: number): ModeSnapshot {
  return Object.freeze({
    mode: constraints.mode,
    constraints,
    version,
    since,
  });
}

/**
 * Anything that can hand out the current snapshot (the mode controller).
 */
export interface ModeSnapshotSource {
  snapshot(): ModeSnapshot;
}
