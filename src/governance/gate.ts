/**
 * Governance Gate
 *
 * Answers, for one capability request against the active mode's constraint
 * set: allowed, requires approval, or denied (with a reason). Unknown
 * capabilities are always denied. The only side effect of a check is the
 * rate-limit admission recorded on an allowed result.
 */
import logger from '../utils/logger';
import { Clock, systemClock } from '../utils/clock';
import { ConstraintSet, ModeSnapshot, ModeSnapshotSource } from '../control/constraint-set';
import { Mode } from '../control/modes';
import { GovernancePolicy, ToolPolicy } from '../policy/schema';
import { COUNTED_EVENTS, EventCounter } from '../sampler/event-counter';
import { POLICY_VIOLATION } from '../telemetry/events';
import { recordDecision, recordRateLimitHit } from '../telemetry/metrics';
import { checkToolArguments } from './argument-policy';
import { RateLimitRule, SlidingWindowRateLimiter } from './rate-limiter';

const MINUTE_MS = 60_000;
const HOUR_MS = 3_600_000;

export const MODEL_CATEGORY = 'model';
export const CONCURRENCY_CATEGORY = 'concurrency';

export interface ToolCapability {
  kind: 'tool';
  name: string;
  arguments?: Readonly<Record<string, unknown>>;
}

export interface ModelRoleCapability {
  kind: 'model_role';
  role: string;
}

export interface ConcurrencyCapability {
  kind: 'concurrency';
  /** Tasks already running, not counting the one asking */
  in_flight: number;
}

export type Capability = ToolCapability | ModelRoleCapability | ConcurrencyCapability;

export enum DecisionOutcome {
  ALLOWED = 'allowed',
  REQUIRES_APPROVAL = 'requires_approval',
  DENIED = 'denied',
}

export type Decision =
  | { outcome: DecisionOutcome.ALLOWED; mode: Mode; category: string }
  | { outcome: DecisionOutcome.REQUIRES_APPROVAL; mode: Mode; category: string; reason: string }
  | { outcome: DecisionOutcome.DENIED; mode: Mode; category?: string; reason: string };

export interface CheckOptions {
  /** A human already approved this request; skip the approval step */
  approved?: boolean;
  trace_id?: string;
}

export interface EffectiveLimits {
  mode: Mode;
  timeout_ms: number;
  max_tokens?: number;
  temperature?: number;
  rate_limits: RateLimitRule[];
}

export interface GovernanceGateOptions {
  policy: GovernancePolicy;
  modes: ModeSnapshotSource;
  events?: EventCounter;
  clock?: Clock;
  /** Home directory used to expand `$HOME` in path patterns */
  home?: string;
}

export function describeCapability(capability: Capability): string {
  switch (capability.kind) {
    case 'tool':
      return `tool:${capability.name}`;
    case 'model_role':
      return `model_role:${capability.role}`;
    case 'concurrency':
      return 'concurrency';
  }
}

export class GovernanceGate {
  private readonly policy: GovernancePolicy;
  private readonly modes: ModeSnapshotSource;
  private readonly events?: EventCounter;
  private readonly limiter: SlidingWindowRateLimiter;
  private readonly home?: string;

  constructor(options: GovernanceGateOptions) {
    this.policy = options.policy;
    this.modes = options.modes;
    this.events = options.events;
    this.limiter = new SlidingWindowRateLimiter(options.clock ?? systemClock);
    this.home = options.home;
  }

  check(capability: Capability, options: CheckOptions = {}): Decision {
    // One snapshot read per check: mode and constraints always agree.
    const snapshot = this.modes.snapshot();
    const decision = this.evaluate(capability, snapshot, options);

    recordDecision(decision.outcome, decision.category ?? 'unknown', snapshot.mode);
    if (decision.outcome === DecisionOutcome.DENIED) {
      logger.warn(
        {
          event: POLICY_VIOLATION,
          trace_id: options.trace_id,
          capability: describeCapability(capability),
          mode: snapshot.mode,
          reason: decision.reason,
        },
        'Capability denied',
      );
    } else {
      logger.debug(
        {
          trace_id: options.trace_id,
          capability: describeCapability(capability),
          mode: snapshot.mode,
          outcome: decision.outcome,
        },
        'Capability checked',
      );
    }
    return decision;
  }

  /**
   * Effective limits for a capability under the active mode.
   */
  limits(capability: Capability): EffectiveLimits {
    const { mode, constraints } = this.modes.snapshot();
    const base: EffectiveLimits = {
      mode,
      timeout_ms: constraints.stepTimeoutMs,
      rate_limits: this.rateLimitRules(capability, constraints),
    };

    if (capability.kind !== 'model_role') {
      return base;
    }

    const roleLimits = Object.hasOwn(constraints.modelLimits, capability.role)
      ? constraints.modelLimits[capability.role]
      : undefined;
    if (!roleLimits) {
      return base;
    }

    return {
      ...base,
      timeout_ms:
        roleLimits.timeout_ms === undefined
          ? base.timeout_ms
          : Math.min(base.timeout_ms, roleLimits.timeout_ms),
      ...(roleLimits.max_tokens !== undefined && { max_tokens: roleLimits.max_tokens }),
      ...(roleLimits.temperature !== undefined && { temperature: roleLimits.temperature }),
    };
  }

  /**
   * Admissions recorded against a rate-limit key's rule.
   */
  usage(rule: RateLimitRule): number {
    return this.limiter.usage(rule);
  }

  private evaluate(capability: Capability, snapshot: ModeSnapshot, options: CheckOptions): Decision {
    const { mode, constraints } = snapshot;

    switch (capability.kind) {
      case 'concurrency': {
        if (capability.in_flight >= constraints.concurrencyCeiling) {
          return {
            outcome: DecisionOutcome.DENIED,
            mode,
            category: CONCURRENCY_CATEGORY,
            reason: `Concurrency ceiling of ${constraints.concurrencyCeiling} reached in mode ${mode}`,
          };
        }
        return { outcome: DecisionOutcome.ALLOWED, mode, category: CONCURRENCY_CATEGORY };
      }

      case 'model_role': {
        if (!Object.hasOwn(this.policy.model_roles, capability.role)) {
          return this.violation(mode, undefined, `Unknown model role '${capability.role}'`);
        }
        if (!constraints.allowedModelRoles.includes(capability.role)) {
          return this.violation(
            mode,
            MODEL_CATEGORY,
            `Model role '${capability.role}' is not allowed in mode ${mode}`,
          );
        }
        if (!options.approved && constraints.approvalRequired.includes(MODEL_CATEGORY)) {
          return {
            outcome: DecisionOutcome.REQUIRES_APPROVAL,
            mode,
            category: MODEL_CATEGORY,
            reason: `Model calls require approval in mode ${mode}`,
          };
        }
        return this.admit(capability, constraints, mode, MODEL_CATEGORY);
      }

      case 'tool': {
        const tool = Object.hasOwn(this.policy.tools, capability.name)
          ? this.policy.tools[capability.name]
          : undefined;
        if (!tool) {
          return this.violation(mode, undefined, `Unknown tool '${capability.name}'`);
        }
        if (!constraints.allowedCategories.includes(tool.category)) {
          return this.violation(
            mode,
            tool.category,
            `Category '${tool.category}' is not allowed in mode ${mode}`,
          );
        }
        if (tool.forbidden_in_modes.includes(mode)) {
          return this.violation(mode, tool.category, `Tool '${capability.name}' is forbidden in mode ${mode}`);
        }

        const argumentViolation = checkToolArguments(tool, capability.arguments, this.home);
        if (argumentViolation) {
          return this.violation(mode, tool.category, argumentViolation);
        }

        if (!options.approved && this.toolNeedsApproval(tool, constraints, mode)) {
          return {
            outcome: DecisionOutcome.REQUIRES_APPROVAL,
            mode,
            category: tool.category,
            reason: `Tool '${capability.name}' requires approval in mode ${mode}`,
          };
        }
        return this.admit(capability, constraints, mode, tool.category);
      }
    }
  }

  private toolNeedsApproval(tool: ToolPolicy, constraints: ConstraintSet, mode: Mode): boolean {
    return (
      tool.requires_approval ||
      tool.requires_approval_in_modes.includes(mode) ||
      constraints.approvalRequired.includes(tool.category)
    );
  }

  private admit(capability: Capability, constraints: ConstraintSet, mode: Mode, category: string): Decision {
    const result = this.limiter.consume(this.rateLimitRules(capability, constraints));
    if (!result.allowed && result.exceeded) {
      recordRateLimitHit(result.exceeded.key, mode);
      return {
        outcome: DecisionOutcome.DENIED,
        mode,
        category,
        reason: `Rate limit '${result.exceeded.key}' exceeded (${result.exceeded.limit} per ${
          result.exceeded.windowMs / 1000
        }s), retry in ${Math.ceil(result.retryAfterMs / 1000)}s`,
      };
    }
    return { outcome: DecisionOutcome.ALLOWED, mode, category };
  }

  private violation(mode: Mode, category: string | undefined, reason: string): Decision {
    this.events?.record(COUNTED_EVENTS.POLICY_VIOLATION);
    return { outcome: DecisionOutcome.DENIED, mode, category, reason };
  }

  private rateLimitRules(capability: Capability, constraints: ConstraintSet): RateLimitRule[] {
    switch (capability.kind) {
      case 'concurrency':
        return [];
      case 'model_role':
        return [{ key: 'model_calls', limit: constraints.modelCallsPerMinute, windowMs: MINUTE_MS }];
      case 'tool': {
        const rules: RateLimitRule[] = [
          { key: 'tool_calls', limit: constraints.toolCallsPerMinute, windowMs: MINUTE_MS },
        ];
        const perHour = Object.hasOwn(this.policy.tools, capability.name)
          ? this.policy.tools[capability.name].rate_limit_per_hour
          : undefined;
        if (perHour !== undefined) {
          rules.push({ key: `tool:${capability.name}`, limit: perHour, windowMs: HOUR_MS });
        }
        return rules;
      }
    }
  }
}
