/**
 * Agent Governor
 *
 * Public entry point: the runtime, its building blocks and the HTTP surface.
 */
export { Governor } from './runtime/governor';
export type { GovernorOptions, GovernorHealth, RuntimeSettings } from './runtime/governor';
export { registerBuiltinTools } from './runtime/builtin-tools';
export { createApp, startServer } from './api/server';

export { Mode, ALL_MODES, INITIAL_MODE, isTransitionAllowed, allowedTargets, isMode } from './control/modes';
export { deriveConstraintSet, createSnapshot } from './control/constraint-set';
export type { ConstraintSet, ModeSnapshot, ModeSnapshotSource } from './control/constraint-set';
export { ModeController } from './control/mode-controller';
export type { ModeControllerOptions, TransitionRecord } from './control/mode-controller';
export { ApprovalBroker } from './control/approval-broker';
export type { ApprovalRequest, ApprovalResolution, ApprovalKind, ApprovalOutcome } from './control/approval-broker';
export { ModeTransitionError } from './control/errors';

export { GovernanceGate, DecisionOutcome, describeCapability } from './governance/gate';
export type { Capability, Decision, CheckOptions, EffectiveLimits } from './governance/gate';

export { MetricSampler } from './sampler/metric-sampler';
export { MetricWindow } from './sampler/metric-window';
export { EventCounter, COUNTED_EVENTS } from './sampler/event-counter';
export { cpuLoadCollector, memoryUsedCollector, eventCountCollector, systemCollectors } from './sampler/collectors';
export type { MetricSample, MetricCollector, ControlSignal, MetricAggregate } from './sampler/types';

export { loadPolicy, parsePolicy, policyWarnings } from './policy/loader';
export type { GovernancePolicy } from './policy/schema';
export { PolicyError } from './policy/errors';

export { TraceContext } from './telemetry/trace';
export { TelemetryLog } from './telemetry/telemetry-log';
export type { TelemetryEvent, TelemetrySink } from './telemetry/telemetry-log';

export { OpenAICompatibleModelBackend } from './integrations/model-backend/client';

export * from './execution';
export { GovernorError, ConfigurationError, ValidationError, NotFoundError } from './utils/errors';
export { ManualClock, systemClock } from './utils/clock';
export type { Clock } from './utils/clock';
