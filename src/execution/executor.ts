/**
 * Task Executor
 *
 * Drives one task through its state machine until COMPLETED or FAILED.
 *
 * For every non-terminal step the executor:
 * 1. clears each capability the step declares with the governance gate,
 *    suspending for human approval where the gate asks for it
 * 2. opens a step record (next sequence number of the trace)
 * 3. runs the handler under the step timeout, which is the tightest of the
 *    mode's step timeout, the model role's timeout and the remaining budget
 * 4. closes the record and publishes a state_transition event
 *
 * Any failure ends the task in FAILED with a structured error on the context;
 * nothing thrown by a handler, or by the step bookkeeping, crosses the
 * executor boundary. Mode changes
 * take effect at the next gate check, never in the middle of a step.
 */
import logger, { Logger } from '../utils/logger';
import { Clock, systemClock } from '../utils/clock';
import { GovernorError, errorMessage } from '../utils/errors';
import { withTimeout } from '../utils/timeout';
import { ApprovalBroker } from '../control/approval-broker';
import { ModeSnapshotSource } from '../control/constraint-set';
import { Capability, DecisionOutcome, GovernanceGate, describeCapability } from '../governance/gate';
import { COUNTED_EVENTS, EventCounter } from '../sampler/event-counter';
import { MetricWindow } from '../sampler/metric-window';
import { STATE_TRANSITION, TASK_COMPLETED, TASK_FAILED, TASK_STARTED } from '../telemetry/events';
import { recordStepDuration, recordTaskOutcome } from '../telemetry/metrics';
import { TelemetrySink } from '../telemetry/telemetry-log';
import { TraceContext } from '../telemetry/trace';
import { ModelBackend, SessionStore, ToolLayer } from './collaborators';
import { createExecutionContext } from './context';
import {
  ApprovalTimeoutError,
  DeniedError,
  StepExecutionError,
  StepTimeoutError,
  TaskBudgetExceededError,
} from './errors';
import { HandlerRegistry, StepHandler, StepOutcome, defaultHandlers } from './handlers';
import { AttemptTracker, runWithRetry } from './retry';
import { OpenStep, appendStep, closeStep, openStep } from './step-records';
import {
  ExecutionContext,
  MetricsSummary,
  TaskError,
  TaskRequest,
  TaskState,
  isTaskState,
  isTerminal,
} from './types';

/** Metrics attached to a finished task's context */
export const SUMMARY_METRICS: readonly string[] = ['cpu_load', 'memory_used'];

/**
 * Anything that can return recent metric samples (the sampler).
 */
export interface MetricWindowSource {
  window(durationMs: number): MetricWindow;
}

export interface TaskExecutorOptions {
  gate: GovernanceGate;
  modes: ModeSnapshotSource;
  approvals: ApprovalBroker;
  model: ModelBackend;
  tools: ToolLayer;
  sessions: SessionStore;
  approvalTimeoutMs: number;
  maxToolIterations?: number;
  handlers?: HandlerRegistry;
  telemetry?: TelemetrySink;
  events?: EventCounter;
  metrics?: MetricWindowSource;
  clock?: Clock;
}

/**
 * Outcome of clearing a step's capabilities with the gate.
 */
type Clearance = { cleared: true } | { cleared: false; error: GovernorError };

const DEFAULT_MAX_TOOL_ITERATIONS = 5;

function describeCause(cause: unknown): string {
  return cause instanceof GovernorError ? `${cause.code}: ${cause.message}` : errorMessage(cause);
}

export class TaskExecutor {
  private readonly gate: GovernanceGate;
  private readonly modes: ModeSnapshotSource;
  private readonly approvals: ApprovalBroker;
  private readonly model: ModelBackend;
  private readonly tools: ToolLayer;
  private readonly sessions: SessionStore;
  private readonly approvalTimeoutMs: number;
  private readonly maxToolIterations: number;
  private readonly handlers: HandlerRegistry;
  private readonly telemetry?: TelemetrySink;
  private readonly events?: EventCounter;
  private readonly metrics?: MetricWindowSource;
  private readonly clock: Clock;
  private running = 0;

  constructor(options: TaskExecutorOptions) {
    this.gate = options.gate;
    this.modes = options.modes;
    this.approvals = options.approvals;
    this.model = options.model;
    this.tools = options.tools;
    this.sessions = options.sessions;
    this.approvalTimeoutMs = options.approvalTimeoutMs;
    this.maxToolIterations = options.maxToolIterations ?? DEFAULT_MAX_TOOL_ITERATIONS;
    this.handlers = options.handlers ?? defaultHandlers();
    this.telemetry = options.telemetry;
    this.events = options.events;
    this.metrics = options.metrics;
    this.clock = options.clock ?? systemClock;
  }

  /** Tasks currently executing */
  get inFlight(): number {
    return this.running;
  }

  /**
   * Create a context for a new request and run it to completion.
   */
  async execute(request: TaskRequest, parentSpanId?: string): Promise<ExecutionContext> {
    const trace = TraceContext.newTrace(parentSpanId);
    return this.run(createExecutionContext(request, trace, this.clock.now()));
  }

  /**
   * Run a context until it reaches a terminal state. A context that is
   * already terminal is returned as is.
   */
  async run(context: ExecutionContext): Promise<ExecutionContext> {
    if (isTerminal(context.state)) {
      return context;
    }

    const trace = TraceContext.resume(
      context.trace_id,
      context.steps.length === 0 ? 0 : context.steps[context.steps.length - 1].sequence,
      context.parent_span_id,
    );
    const log = trace.bind(logger);
    let ctx = context;

    if (ctx.deadline_at === undefined) {
      const concurrency = this.gate.check({ kind: 'concurrency', in_flight: this.running }, { trace_id: ctx.trace_id });
      if (concurrency.outcome === DecisionOutcome.DENIED) {
        return this.finish(this.fail(ctx, trace, new DeniedError(concurrency.reason), log), log);
      }
      const { mode, constraints } = this.modes.snapshot();
      ctx = { ...ctx, deadline_at: this.clock.now() + constraints.taskBudgetMs };
      log.info({ event: TASK_STARTED, mode, session_id: ctx.session_id }, 'Task started');
    }

    this.running += 1;
    try {
      while (!isTerminal(ctx.state)) {
        try {
          ctx = await this.step(ctx, trace, log);
        } catch (error) {
          ctx = this.abandon(ctx, error, log);
        }
      }
    } finally {
      this.running -= 1;
    }

    return this.finish(ctx, log);
  }

  private async step(ctx: ExecutionContext, trace: TraceContext, log: Logger): Promise<ExecutionContext> {
    const state = ctx.state;
    const deadline = ctx.deadline_at ?? this.clock.now();

    if (this.clock.now() >= deadline) {
      return this.fail(ctx, trace, new TaskBudgetExceededError(deadline - ctx.started_at), log);
    }

    const handler = this.handlers.get(state);
    if (!handler) {
      return this.fail(ctx, trace, new StepExecutionError(state, `No handler registered for state '${state}'`), log);
    }

    let capabilities: Capability[];
    try {
      capabilities = handler.capabilities(ctx);
    } catch (error) {
      const failure = new StepExecutionError(state, `Handler for '${state}' could not declare its capabilities`);
      return this.fail(ctx, trace, failure, log, error);
    }
    const clearance = await this.clear(capabilities, ctx, deadline);
    if (!clearance.cleared) {
      return this.fail(ctx, trace, clearance.error, log);
    }

    const remaining = deadline - this.clock.now();
    if (remaining <= 0) {
      return this.fail(ctx, trace, new TaskBudgetExceededError(deadline - ctx.started_at), log);
    }

    const stepTimeout = this.stepTimeout(capabilities);
    const budgetBound = remaining < stepTimeout;
    const timeoutMs = Math.min(stepTimeout, remaining);

    const step = openStep(trace, state, this.clock.now());
    const tracker: AttemptTracker = { attempts: 0 };
    const controller = new AbortController();

    let outcome: StepOutcome;
    try {
      outcome = await withTimeout(
        this.invoke(handler, ctx, controller.signal, tracker),
        timeoutMs,
        () =>
          budgetBound ? new TaskBudgetExceededError(deadline - ctx.started_at) : new StepTimeoutError(state, timeoutMs),
      );
    } catch (error) {
      controller.abort();
      const failure =
        error instanceof StepTimeoutError ||
        error instanceof TaskBudgetExceededError ||
        error instanceof StepExecutionError
          ? error
          : new StepExecutionError(state, `Step '${state}' failed`);
      return this.record(ctx, step, TaskState.FAILED, tracker.attempts, log, this.taskError(ctx, failure, error));
    }

    if (!isTaskState(outcome.next) || outcome.next === TaskState.INIT) {
      const failure = new StepExecutionError(state, `Handler for '${state}' returned an invalid next state`, {
        next: outcome.next,
      });
      return this.record(ctx, step, TaskState.FAILED, tracker.attempts, log, this.taskError(ctx, failure));
    }

    for (const result of outcome.context.tool_results.slice(ctx.tool_results.length)) {
      if (!result.success) this.events?.record(COUNTED_EVENTS.TOOL_ERROR);
    }

    return this.record({ ...outcome.context, steps: ctx.steps }, step, outcome.next, tracker.attempts, log);
  }

  private invoke(
    handler: StepHandler,
    ctx: ExecutionContext,
    signal: AbortSignal,
    tracker: AttemptTracker,
  ): Promise<StepOutcome> {
    return runWithRetry(
      handler.retry,
      () =>
        handler.run(ctx, {
          model: this.model,
          tools: this.tools,
          sessions: this.sessions,
          limits: (capability) => this.gate.limits(capability),
          maxToolIterations: this.maxToolIterations,
          signal,
        }),
      tracker,
      signal,
    );
  }

  /**
   * Ask the gate about every capability; wait for approval where required.
   */
  private async clear(capabilities: readonly Capability[], ctx: ExecutionContext, deadline: number): Promise<Clearance> {
    for (const capability of capabilities) {
      const decision = this.gate.check(capability, { trace_id: ctx.trace_id });

      if (decision.outcome === DecisionOutcome.DENIED) {
        return { cleared: false, error: new DeniedError(decision.reason, { capability: describeCapability(capability) }) };
      }
      if (decision.outcome === DecisionOutcome.ALLOWED) {
        continue;
      }

      const subject = describeCapability(capability);
      const { decision: pending } = this.approvals.request({
        kind: 'capability',
        subject,
        reason: decision.reason,
        trace_id: ctx.trace_id,
        details: { state: ctx.state, mode: decision.mode },
        timeoutMs: Math.min(this.approvalTimeoutMs, Math.max(deadline - this.clock.now(), 0)),
      });
      const resolution = await pending;

      if (resolution.outcome === 'timed_out') {
        return { cleared: false, error: new ApprovalTimeoutError(subject) };
      }
      if (resolution.outcome === 'rejected') {
        return {
          cleared: false,
          error: new DeniedError(`Approval for '${subject}' was rejected`, { approver: resolution.approver }),
        };
      }

      // The mode may have changed while waiting: check again.
      const recheck = this.gate.check(capability, { approved: true, trace_id: ctx.trace_id });
      if (recheck.outcome !== DecisionOutcome.ALLOWED) {
        const reason = recheck.outcome === DecisionOutcome.DENIED ? recheck.reason : 'Approval no longer sufficient';
        return { cleared: false, error: new DeniedError(reason, { capability: subject }) };
      }
    }
    return { cleared: true };
  }

  private stepTimeout(capabilities: readonly Capability[]): number {
    const base = this.modes.snapshot().constraints.stepTimeoutMs;
    return capabilities.reduce((timeout, capability) => Math.min(timeout, this.gate.limits(capability).timeout_ms), base);
  }

  /**
   * Transition straight to FAILED without running a handler.
   */
  private fail(
    ctx: ExecutionContext,
    trace: TraceContext,
    error: GovernorError,
    log: Logger,
    cause?: unknown,
  ): ExecutionContext {
    const step = openStep(trace, ctx.state, this.clock.now());
    return this.record(ctx, step, TaskState.FAILED, 0, log, this.taskError(ctx, error, cause));
  }

  /**
   * Last resort when a step could not even be recorded: end in FAILED
   * without appending a step record.
   */
  private abandon(ctx: ExecutionContext, cause: unknown, log: Logger): ExecutionContext {
    const failure = new StepExecutionError(ctx.state, `Step '${ctx.state}' could not be recorded`);
    log.error({ state: ctx.state, error: errorMessage(cause) }, 'Step bookkeeping failed');
    return { ...ctx, state: TaskState.FAILED, error: this.taskError(ctx, failure, cause) };
  }

  private record(
    ctx: ExecutionContext,
    step: OpenStep,
    to: TaskState,
    attempts: number,
    log: Logger,
    error?: TaskError,
  ): ExecutionContext {
    const record = closeStep(step, to, this.clock.now(), attempts);
    const next: ExecutionContext = {
      ...ctx,
      state: to,
      steps: appendStep(ctx.steps, record),
      ...(error && { error }),
    };

    recordStepDuration(step.from_state, to === TaskState.FAILED ? 'failed' : 'ok', record.duration_ms);
    this.telemetry?.emit({
      type: STATE_TRANSITION,
      trace_id: ctx.trace_id,
      sequence: record.sequence,
      from_state: record.from_state,
      to_state: record.to_state,
      duration_ms: record.duration_ms,
      timestamp: record.ended_at,
    });
    log.debug(
      { event: STATE_TRANSITION, sequence: record.sequence, from_state: record.from_state, to_state: to },
      'State transition',
    );
    return next;
  }

  private taskError(ctx: ExecutionContext, error: GovernorError, cause?: unknown): TaskError {
    return {
      code: error.code,
      message: error.message,
      state: ctx.state,
      ...(cause !== undefined && cause !== error && { cause: describeCause(cause) }),
    };
  }

  private finish(ctx: ExecutionContext, log: Logger): ExecutionContext {
    const endedAt = this.clock.now();
    const finished: ExecutionContext = {
      ...ctx,
      ended_at: endedAt,
      metrics_summary: this.summarize(endedAt - ctx.started_at),
    };

    if (finished.state === TaskState.FAILED) {
      const error = finished.error ?? { code: 'UNKNOWN', message: 'Task failed', state: TaskState.FAILED };
      this.events?.record(COUNTED_EVENTS.TASK_FAILURE);
      recordTaskOutcome(TaskState.FAILED, error.code);
      this.telemetry?.emit({
        type: TASK_FAILED,
        trace_id: finished.trace_id,
        error,
        timestamp: endedAt,
      });
      log.warn(
        { event: TASK_FAILED, code: error.code, state: error.state, steps: finished.steps.length },
        'Task failed',
      );
    } else {
      recordTaskOutcome(TaskState.COMPLETED);
      this.telemetry?.emit({
        type: TASK_COMPLETED,
        trace_id: finished.trace_id,
        steps: finished.steps.length,
        duration_ms: endedAt - ctx.started_at,
        timestamp: endedAt,
      });
      log.info(
        { event: TASK_COMPLETED, steps: finished.steps.length, duration_ms: endedAt - ctx.started_at },
        'Task completed',
      );
    }
    return finished;
  }

  private summarize(durationMs: number): MetricsSummary | undefined {
    if (!this.metrics) return undefined;

    const window = this.metrics.window(Math.max(durationMs, 0));
    const summary: MetricsSummary = {};
    for (const metric of SUMMARY_METRICS) {
      const aggregate = window.aggregate(metric);
      if (aggregate) summary[metric] = aggregate;
    }
    return summary;
  }
}
