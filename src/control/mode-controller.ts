/**
 * Mode Controller
 *
 * Owns the active operating mode. Consumes metric samples and control
 * signals, evaluates the transition rules of the active mode with
 * sustained-duration tracking, and publishes a new (mode, constraints)
 * snapshot when a rule fires. It is the only writer of the mode; every
 * other component reads the snapshot it hands out.
 *
 * Evaluation semantics:
 * - each condition must hold continuously for its own duration_seconds;
 *   `any` / `all` is applied to the per-condition results
 * - the latest value of each metric is used; a value older than
 *   `staleAfterMs` counts as absent, which makes its condition false
 * - rules of the active mode are tried in policy order, first match wins
 * - entering a mode clears every sustained timer
 * - while a transition awaits approval no other rule fires, but conditions
 *   are still tracked
 */
import logger from '../utils/logger';
import { Clock, systemClock } from '../utils/clock';
import { errorMessage } from '../utils/errors';
import { compare } from '../policy/conditions';
import { PolicyError } from '../policy/errors';
import { GovernancePolicy, TransitionCondition, TransitionRule } from '../policy/schema';
import { ControlSignal, MetricSample } from '../sampler/types';
import { MODE_TRANSITION, MODE_TRANSITION_SKIPPED } from '../telemetry/events';
import { recordActiveMode, recordModeTransition } from '../telemetry/metrics';
import { ModeTransitionEvent, TelemetrySink } from '../telemetry/telemetry-log';
import { ApprovalBroker, ApprovalResolution } from './approval-broker';
import {
  ConstraintSet,
  ModeSnapshot,
  ModeSnapshotSource,
  createSnapshot,
  deriveAllConstraintSets,
} from './constraint-set';
import { ModeTransitionError } from './errors';
import { ALL_MODES, INITIAL_MODE, Mode, isTransitionAllowed } from './modes';

export interface ModeControllerOptions {
  policy: GovernancePolicy;
  approvals?: ApprovalBroker;
  telemetry?: TelemetrySink;
  clock?: Clock;
  /** Readings older than this are treated as missing */
  staleAfterMs?: number;
  initialMode?: Mode;
  /** How many consumed signal ids are remembered for de-duplication */
  signalMemory?: number;
}

export interface TransitionRecord {
  from: Mode;
  to: Mode;
  rule?: string;
  trigger_metric?: string;
  trigger_value?: number;
  reason: string;
  version: number;
  timestamp: number;
}

interface MetricValue {
  value: number;
  at: number;
}

interface Trigger {
  metric: string;
  value: number;
}

interface PendingTransition {
  requestId: string;
  rule: TransitionRule;
  trigger?: Trigger;
  fromVersion: number;
}

type TransitionListener = (snapshot: ModeSnapshot, record: TransitionRecord) => void;

const DEFAULT_STALE_AFTER_MS = 30000;
const HISTORY_LIMIT = 500;
const DEFAULT_SIGNAL_MEMORY = 1000;

export class ModeController implements ModeSnapshotSource {
  private readonly policy: GovernancePolicy;
  private readonly approvals?: ApprovalBroker;
  private readonly telemetry?: TelemetrySink;
  private readonly clock: Clock;
  private readonly staleAfterMs: number;
  private readonly signalMemory: number;
  private readonly constraintSets: ReadonlyMap<Mode, ConstraintSet>;

  private current: ModeSnapshot;
  private readonly latestValues = new Map<string, MetricValue>();
  private readonly conditionSince = new Map<string, number>();
  private readonly consumedSignals = new Set<string>();
  private readonly transitions: TransitionRecord[] = [];
  private readonly listeners = new Set<TransitionListener>();
  private pendingTransition?: PendingTransition;
  private tickTimer?: NodeJS.Timeout;

  constructor(options: ModeControllerOptions) {
    this.policy = options.policy;
    this.approvals = options.approvals;
    this.telemetry = options.telemetry;
    this.clock = options.clock ?? systemClock;
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
    this.signalMemory = Math.max(options.signalMemory ?? DEFAULT_SIGNAL_MEMORY, 1);
    this.constraintSets = deriveAllConstraintSets(options.policy, ALL_MODES);

    const initial = options.initialMode ?? INITIAL_MODE;
    this.current = createSnapshot(this.constraintsFor(initial), 0, this.clock.now());
    recordActiveMode(initial, ALL_MODES);

    logger.info({ mode: initial, rules: this.policy.transition_rules.length }, 'Mode controller initialized');
  }

  /**
   * The active mode and its constraints, read together.
   */
  snapshot(): ModeSnapshot {
    return this.current;
  }

  get mode(): Mode {
    return this.current.mode;
  }

  /**
   * Constraint set of any mode, for operators previewing a policy.
   */
  constraintsFor(mode: Mode): ConstraintSet {
    const constraints = this.constraintSets.get(mode);
    if (!constraints) {
      throw new PolicyError(`No constraint set for mode ${mode}`);
    }
    return constraints;
  }

  history(): TransitionRecord[] {
    return [...this.transitions];
  }

  get pendingApprovalId(): string | undefined {
    return this.pendingTransition?.requestId;
  }

  observeSample(sample: MetricSample): void {
    for (const [metric, value] of Object.entries(sample.readings)) {
      this.recordValue(metric, value, sample.timestamp);
    }
    this.evaluate();
  }

  /**
   * Apply a control signal. Returns false when the signal id was already
   * consumed. Only the most recent `signalMemory` ids are remembered.
   */
  observeSignal(signal: ControlSignal): boolean {
    if (this.consumedSignals.has(signal.id)) {
      logger.debug({ signal_id: signal.id, name: signal.name }, 'Duplicate control signal ignored');
      return false;
    }
    this.consumedSignals.add(signal.id);
    if (this.consumedSignals.size > this.signalMemory) {
      // Sets iterate in insertion order: drop the oldest id.
      for (const oldest of this.consumedSignals) {
        this.consumedSignals.delete(oldest);
        break;
      }
    }
    this.recordValue(signal.metric, signal.value, signal.timestamp);
    this.evaluate();
    return true;
  }

  /**
   * Re-evaluate with no new data, so sustained durations complete even
   * between samples.
   */
  tick(): ModeSnapshot {
    this.evaluate();
    return this.current;
  }

  onTransition(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Operator-requested transition. Must follow the transition graph.
   */
  requestTransition(target: Mode, reason: string): ModeSnapshot {
    const from = this.current.mode;
    if (!isTransitionAllowed(from, target)) {
      throw new ModeTransitionError(from, target, { reason });
    }
    this.commit(target, { reason });
    return this.current;
  }

  startTicking(intervalMs: number): void {
    this.stopTicking();
    this.tickTimer = setInterval(() => {
      try {
        this.tick();
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Mode controller tick failed');
      }
    }, intervalMs);
    this.tickTimer.unref();
  }

  stopTicking(): void {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = undefined;
    }
  }

  private recordValue(metric: string, value: number, at: number): void {
    const previous = this.latestValues.get(metric);
    if (previous && previous.at > at) return;
    this.latestValues.set(metric, { value, at });
  }

  private freshValue(metric: string, now: number): number | undefined {
    const entry = this.latestValues.get(metric);
    if (!entry || now - entry.at > this.staleAfterMs) return undefined;
    return entry.value;
  }

  private evaluate(): void {
    const now = this.clock.now();
    const rules = this.policy.transition_rules.filter((rule) => rule.from === this.current.mode);

    // Every rule is evaluated, even while an approval is pending, so that
    // sustained timers keep running (and resetting) for all of them.
    const results = rules.map((rule) => ({ rule, outcome: this.evaluateRule(rule, now) }));
    if (this.pendingTransition) return;

    for (const { rule, outcome } of results) {
      if (!outcome.fired) continue;

      if (!isTransitionAllowed(rule.from, rule.to)) {
        const error = new ModeTransitionError(rule.from, rule.to, { rule: rule.name });
        logger.error(
          { event: MODE_TRANSITION_SKIPPED, rule: rule.name, code: error.code, error: error.message },
          'Transition rule fired on a disallowed edge',
        );
        this.resetRule(rule);
        continue;
      }

      if (rule.requires_approval) {
        this.requestApproval(rule, outcome.trigger);
      } else {
        this.commit(rule.to, {
          rule: rule.name,
          trigger: outcome.trigger,
          reason: `Transition rule '${rule.name}' fired`,
        });
      }
      return;
    }
  }

  private evaluateRule(rule: TransitionRule, now: number): { fired: boolean; trigger?: Trigger } {
    const held = rule.conditions.map((condition, index) =>
      this.evaluateCondition(this.conditionKey(rule, index), condition, now),
    );

    const fired = rule.logic === 'all' ? held.every((h) => h !== undefined) : held.some((h) => h !== undefined);
    if (!fired) return { fired };

    return { fired, trigger: held.find((h): h is Trigger => h !== undefined) };
  }

  /**
   * Returns the triggering reading when the condition has held for its full
   * duration, undefined otherwise.
   */
  private evaluateCondition(key: string, condition: TransitionCondition, now: number): Trigger | undefined {
    const entry = this.latestValues.get(condition.metric);
    const value = this.freshValue(condition.metric, now);

    if (entry === undefined || value === undefined || !compare(value, condition.operator, condition.value)) {
      this.conditionSince.delete(key);
      return undefined;
    }

    let since = this.conditionSince.get(key);
    if (since === undefined) {
      since = entry.at;
      this.conditionSince.set(key, since);
    }

    if (now - since < condition.duration_seconds * 1000) {
      return undefined;
    }
    return { metric: condition.metric, value };
  }

  private conditionKey(rule: TransitionRule, index: number): string {
    return `${rule.name}#${index}`;
  }

  private resetRule(rule: TransitionRule): void {
    rule.conditions.forEach((_, index) => this.conditionSince.delete(this.conditionKey(rule, index)));
  }

  private requestApproval(rule: TransitionRule, trigger?: Trigger): void {
    if (!this.approvals) {
      logger.warn(
        { event: MODE_TRANSITION_SKIPPED, rule: rule.name },
        'Transition requires approval but no approval broker is configured',
      );
      this.resetRule(rule);
      return;
    }

    const { request, decision } = this.approvals.request({
      kind: 'mode_transition',
      subject: `${rule.from} -> ${rule.to}`,
      reason: `Transition rule '${rule.name}' conditions met`,
      details: {
        rule: rule.name,
        from: rule.from,
        to: rule.to,
        ...(trigger && { trigger_metric: trigger.metric, trigger_value: trigger.value }),
      },
    });

    this.pendingTransition = {
      requestId: request.id,
      rule,
      trigger,
      fromVersion: this.current.version,
    };

    void decision.then(
      (resolution) => this.resolveApproval(resolution),
      (error: unknown) => {
        this.pendingTransition = undefined;
        logger.error({ error: errorMessage(error), rule: rule.name }, 'Transition approval failed');
      },
    );
  }

  private resolveApproval(resolution: ApprovalResolution): void {
    const pending = this.pendingTransition;
    if (!pending || pending.requestId !== resolution.request_id) return;
    this.pendingTransition = undefined;

    const { rule, trigger } = pending;

    if (resolution.outcome !== 'approved') {
      logger.info(
        { event: MODE_TRANSITION_SKIPPED, rule: rule.name, outcome: resolution.outcome },
        'Mode transition not approved',
      );
      this.resetRule(rule);
      return;
    }

    if (this.current.version !== pending.fromVersion || this.current.mode !== rule.from) {
      logger.info(
        { event: MODE_TRANSITION_SKIPPED, rule: rule.name, mode: this.current.mode },
        'Mode changed while transition awaited approval',
      );
      return;
    }

    this.commit(rule.to, {
      rule: rule.name,
      trigger,
      reason: `Transition rule '${rule.name}' approved${resolution.approver ? ` by ${resolution.approver}` : ''}`,
    });
  }

  private commit(target: Mode, cause: { rule?: string; trigger?: Trigger; reason: string }): void {
    const previous = this.current;
    const now = this.clock.now();

    this.current = createSnapshot(this.constraintsFor(target), previous.version + 1, now);
    this.conditionSince.clear();

    const record: TransitionRecord = Object.freeze({
      from: previous.mode,
      to: target,
      rule: cause.rule,
      trigger_metric: cause.trigger?.metric,
      trigger_value: cause.trigger?.value,
      reason: cause.reason,
      version: this.current.version,
      timestamp: now,
    });
    this.transitions.push(record);
    if (this.transitions.length > HISTORY_LIMIT) {
      this.transitions.shift();
    }

    const event: ModeTransitionEvent = {
      type: MODE_TRANSITION,
      old_mode: previous.mode,
      new_mode: target,
      trigger_metric: cause.trigger?.metric,
      trigger_value: cause.trigger?.value,
      rule: cause.rule,
      reason: cause.reason,
      timestamp: now,
    };
    this.telemetry?.emit(event);
    if (!this.telemetry) {
      logger.info({ ...event, event: MODE_TRANSITION }, 'Mode transition');
    }

    recordModeTransition(previous.mode, target);
    recordActiveMode(target, ALL_MODES);

    for (const listener of this.listeners) {
      try {
        listener(this.current, record);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Mode transition listener failed');
      }
    }
  }
}
