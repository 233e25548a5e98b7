/**
 * Governor Runtime
 *
 * Wires the control loop and the executor into one process-lifetime unit:
 *
 *   collectors -> MetricSampler -> ModeController -> GovernanceGate -> TaskExecutor
 *
 * Samples and signals flow one way into the controller; the controller's
 * snapshot flows one way into the gate. The runtime owns the background loops
 * (sampling, controller tick) and escalates a crashed sampling loop as fatal.
 */
import logger from '../utils/logger';
import { Clock, systemClock } from '../utils/clock';
import { GovernorConfig } from '../utils/config';
import { ApprovalBroker } from '../control/approval-broker';
import { ModeController } from '../control/mode-controller';
import { ModeSnapshot } from '../control/constraint-set';
import { GovernanceGate } from '../governance/gate';
import { ModelBackend, SessionStore, ToolLayer, InMemorySessionStore } from '../execution/collaborators';
import { TaskExecutor } from '../execution/executor';
import { ToolRegistry } from '../execution/tool-registry';
import { ExecutionContext, TaskRequest } from '../execution/types';
import { deriveSignalThresholds } from '../policy/conditions';
import { GovernancePolicy } from '../policy/schema';
import { eventCountCollector, systemCollectors } from '../sampler/collectors';
import { COUNTED_EVENTS, EventCounter } from '../sampler/event-counter';
import { MetricSampler } from '../sampler/metric-sampler';
import { MetricCollector } from '../sampler/types';
import { TelemetryLog } from '../telemetry/telemetry-log';
import { registerBuiltinTools } from './builtin-tools';

export type RuntimeSettings = Pick<GovernorConfig, 'sampler' | 'controller' | 'executor'>;

export interface GovernorOptions {
  policy: GovernancePolicy;
  settings: RuntimeSettings;
  model: ModelBackend;
  tools?: ToolLayer;
  sessions?: SessionStore;
  /** Replaces the system collectors; event-count collectors are always added */
  collectors?: MetricCollector[];
  clock?: Clock;
}

export interface GovernorHealth {
  status: 'healthy' | 'unhealthy';
  mode: ModeSnapshot['mode'];
  mode_version: number;
  sampler_running: boolean;
  in_flight: number;
  pending_approvals: number;
  error?: string;
}

export class Governor {
  readonly policy: GovernancePolicy;
  readonly telemetry: TelemetryLog;
  readonly events: EventCounter;
  readonly approvals: ApprovalBroker;
  readonly controller: ModeController;
  readonly gate: GovernanceGate;
  readonly sampler: MetricSampler;
  readonly executor: TaskExecutor;

  private readonly settings: RuntimeSettings;
  private readonly subscriptions: Array<() => void> = [];
  private crash?: Error;
  private started = false;

  constructor(options: GovernorOptions) {
    const clock = options.clock ?? systemClock;
    this.policy = options.policy;
    this.settings = options.settings;

    this.telemetry = new TelemetryLog();
    this.events = new EventCounter(options.settings.sampler.eventCountWindowMs, clock);
    this.approvals = new ApprovalBroker({
      defaultTimeoutMs: options.policy.approval.timeout_seconds * 1000,
      clock,
    });
    this.controller = new ModeController({
      policy: options.policy,
      approvals: this.approvals,
      telemetry: this.telemetry,
      clock,
      staleAfterMs: options.settings.controller.staleAfterMs,
    });
    this.gate = new GovernanceGate({
      policy: options.policy,
      modes: this.controller,
      events: this.events,
      clock,
    });

    const collectors = [
      ...(options.collectors ?? systemCollectors()),
      ...Object.values(COUNTED_EVENTS).map((event) => eventCountCollector(this.events, event)),
    ];
    this.sampler = new MetricSampler({
      collectors,
      intervalMs: this.controller.snapshot().constraints.samplingIntervalMs,
      collectorTimeoutMs: options.settings.sampler.collectorTimeoutMs,
      windowCapacity: options.settings.sampler.windowCapacity,
      thresholds: deriveSignalThresholds(options.policy),
      clock,
    });

    const tools = options.tools ?? registerBuiltinTools(new ToolRegistry(), () => this.sampler.latest());
    this.executor = new TaskExecutor({
      gate: this.gate,
      modes: this.controller,
      approvals: this.approvals,
      model: options.model,
      tools,
      sessions: options.sessions ?? new InMemorySessionStore(),
      approvalTimeoutMs: options.policy.approval.timeout_seconds * 1000,
      maxToolIterations: options.settings.executor.maxToolIterations,
      telemetry: this.telemetry,
      events: this.events,
      metrics: this.sampler,
      clock,
    });
  }

  start(): void {
    if (this.started) return;
    this.started = true;

    this.subscriptions.push(
      this.sampler.onSample((sample) => this.controller.observeSample(sample)),
      this.sampler.onSignal((signal) => {
        this.controller.observeSignal(signal);
      }),
      this.sampler.onCrash((error) => {
        this.crash = error;
        logger.fatal({ error: error.message }, 'Sampling loop crashed; governance guarantees are degraded');
      }),
      this.controller.onTransition((snapshot) => this.sampler.setInterval(snapshot.constraints.samplingIntervalMs)),
    );

    this.sampler.start();
    this.controller.startTicking(this.settings.controller.tickMs);
    logger.info({ mode: this.controller.mode }, 'Governor started');
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;

    for (const unsubscribe of this.subscriptions.splice(0)) {
      unsubscribe();
    }
    this.controller.stopTicking();
    this.sampler.stop();
    this.approvals.close();
    logger.info('Governor stopped');
  }

  submit(request: TaskRequest, parentSpanId?: string): Promise<ExecutionContext> {
    return this.executor.execute(request, parentSpanId);
  }

  health(): GovernorHealth {
    const snapshot = this.controller.snapshot();
    return {
      status: this.crash ? 'unhealthy' : 'healthy',
      mode: snapshot.mode,
      mode_version: snapshot.version,
      sampler_running: this.sampler.isRunning,
      in_flight: this.executor.inFlight,
      pending_approvals: this.approvals.pending().length,
      ...(this.crash && { error: this.crash.message }),
    };
  }
}
