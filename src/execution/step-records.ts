/**
 * Task Execution - Step Records
 *
 * One immutable record per state transition. Sequence numbers come from the
 * task's TraceContext.
 */
import { TraceContext } from '../telemetry/trace';
import { ExecutionInvariantError } from './errors';
import { StepRecord, TaskState } from './types';

export interface OpenStep {
  sequence: number;
  from_state: TaskState;
  started_at: number;
}

/**
 * Open a step: claims the next sequence number of the trace.
 */
export function openStep(trace: TraceContext, from: TaskState, startedAt: number): OpenStep {
  return {
    sequence: trace.nextSequence(),
    from_state: from,
    started_at: startedAt,
  };
}

/**
 * Close a step into a frozen record.
 */
export function closeStep(step: OpenStep, to: TaskState, endedAt: number, attempts = 1): StepRecord {
  return Object.freeze({
    sequence: step.sequence,
    from_state: step.from_state,
    to_state: to,
    started_at: step.started_at,
    ended_at: endedAt,
    duration_ms: Math.max(endedAt - step.started_at, 0),
    attempts,
  });
}

/**
 * Append a record, enforcing gap-free ordering.
 *
 * @throws ExecutionInvariantError when the sequence does not follow the last record
 */
export function appendStep(steps: readonly StepRecord[], record: StepRecord): StepRecord[] {
  const expected = steps.length === 0 ? 1 : steps[steps.length - 1].sequence + 1;
  if (record.sequence !== expected) {
    throw new ExecutionInvariantError(
      `Step sequence ${record.sequence} does not follow ${expected - 1}`,
      { expected, received: record.sequence },
    );
  }
  return [...steps, record];
}
