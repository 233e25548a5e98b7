/**
 * Semantic event names for structured logs and the telemetry log.
 */

// Executor
export const TASK_STARTED = 'task_started';
export const TASK_COMPLETED = 'task_completed';
export const TASK_FAILED = 'task_failed';
export const STATE_TRANSITION = 'state_transition';

// Control loop
export const MODE_TRANSITION = 'mode_transition';
export const MODE_TRANSITION_SKIPPED = 'mode_transition_skipped';
export const CONTROL_SIGNAL = 'control_signal';
export const SENSOR_POLL = 'sensor_poll';
export const COLLECTOR_DEGRADED = 'collector_degraded';

// Governance
export const POLICY_VIOLATION = 'policy_violation';
export const APPROVAL_REQUIRED = 'approval_required';
export const APPROVAL_GRANTED = 'approval_granted';
export const APPROVAL_DENIED = 'approval_denied';
export const APPROVAL_TIMED_OUT = 'approval_timed_out';
