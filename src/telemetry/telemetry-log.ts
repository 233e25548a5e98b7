/**
 * Telemetry Log
 *
 * Append-only stream of structured telemetry events: one per task state
 * transition, one per mode transition, one per finished task. Events are
 * frozen once appended and are also written to the structured logger.
 */
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { Mode } from '../control/modes';
import { MODE_TRANSITION, STATE_TRANSITION, TASK_COMPLETED, TASK_FAILED } from './events';

export interface StateTransitionEvent {
  type: typeof STATE_TRANSITION;
  trace_id: string;
  sequence: number;
  from_state: string;
  to_state: string;
  duration_ms: number;
  timestamp: number;
}

export interface ModeTransitionEvent {
  type: typeof MODE_TRANSITION;
  old_mode: Mode;
  new_mode: Mode;
  trigger_metric?: string;
  trigger_value?: number;
  rule?: string;
  reason: string;
  timestamp: number;
}

export interface TaskFailedEvent {
  type: typeof TASK_FAILED;
  trace_id: string;
  error: {
    code: string;
    message: string;
    state: string;
    cause?: string;
  };
  timestamp: number;
}

export interface TaskCompletedEvent {
  type: typeof TASK_COMPLETED;
  trace_id: string;
  steps: number;
  duration_ms: number;
  timestamp: number;
}

export type TelemetryEvent = StateTransitionEvent | ModeTransitionEvent | TaskFailedEvent | TaskCompletedEvent;

export interface TelemetrySink {
  emit(event: TelemetryEvent): void;
}

type TelemetryListener = (event: TelemetryEvent) => void;

export class TelemetryLog implements TelemetrySink {
  private readonly buffer: TelemetryEvent[] = [];
  private readonly listeners = new Set<TelemetryListener>();
  private readonly capacity: number;

  constructor(capacity = 10000) {
    this.capacity = capacity;
  }

  emit(event: TelemetryEvent): void {
    const frozen = Object.freeze({ ...event });
    this.buffer.push(frozen);
    if (this.buffer.length > this.capacity) {
      this.buffer.shift();
    }

    logger.info({ ...frozen, event: frozen.type }, 'Telemetry event');

    for (const listener of this.listeners) {
      try {
        listener(frozen);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Telemetry subscriber failed');
      }
    }
  }

  events(): TelemetryEvent[] {
    return [...this.buffer];
  }

  stateTransitions(traceId?: string): StateTransitionEvent[] {
    return this.buffer.filter(
      (event): event is StateTransitionEvent =>
        event.type === STATE_TRANSITION && (traceId === undefined || event.trace_id === traceId),
    );
  }

  modeTransitions(): ModeTransitionEvent[] {
    return this.buffer.filter((event): event is ModeTransitionEvent => event.type === MODE_TRANSITION);
  }

  taskFailures(): TaskFailedEvent[] {
    return this.buffer.filter((event): event is TaskFailedEvent => event.type === TASK_FAILED);
  }

  taskCompletions(): TaskCompletedEvent[] {
    return this.buffer.filter((event): event is TaskCompletedEvent => event.type === TASK_COMPLETED);
  }

  subscribe(listener: TelemetryListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }
}
