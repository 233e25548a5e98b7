/**
 * Task Execution - Error Classes
 *
 * Errors local to one task. They are captured into the task's context and end
 * the task in FAILED; none of them escapes the executor.
 */
import { GovernorError } from '../utils/errors';
import { TaskState } from './types';

/**
 * The governance gate refused a capability.
 */
export class DeniedError extends GovernorError {
  constructor(reason: string, details?: unknown) {
    super(reason, 'CAPABILITY_DENIED', 403, details);
    this.name = 'DeniedError';
  }
}

/**
 * A human-approval wait expired.
 */
export class ApprovalTimeoutError extends GovernorError {
  constructor(subject: string, details?: unknown) {
    super(`Approval for '${subject}' was not granted in time`, 'APPROVAL_TIMEOUT', 408, details);
    this.name = 'ApprovalTimeoutError';
  }
}

export class StepTimeoutError extends GovernorError {
  readonly state: TaskState;

  constructor(state: TaskState, timeoutMs: number) {
    super(`Step '${state}' exceeded its ${timeoutMs}ms timeout`, 'STEP_TIMEOUT', 504, {
      state,
      timeout_ms: timeoutMs,
    });
    this.name = 'StepTimeoutError';
    this.state = state;
  }
}

export class StepExecutionError extends GovernorError {
  readonly state: TaskState;

  constructor(state: TaskState, message: string, details?: unknown) {
    super(message, 'STEP_EXECUTION_ERROR', 500, details);
    this.name = 'StepExecutionError';
    this.state = state;
  }
}

export class TaskBudgetExceededError extends GovernorError {
  constructor(budgetMs: number) {
    super(`Task exceeded its ${budgetMs}ms budget`, 'TASK_BUDGET_EXCEEDED', 504, { budget_ms: budgetMs });
    this.name = 'TaskBudgetExceededError';
  }
}

/**
 * The model backend failed. Transport failures are retryable; rejected
 * requests are not.
 */
export class ModelBackendError extends GovernorError {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean, details?: unknown) {
    super(message, 'MODEL_BACKEND_ERROR', 502, details);
    this.name = 'ModelBackendError';
    this.retryable = retryable;
  }
}

/**
 * True for errors that declare themselves safe to retry.
 */
export function isRetryable(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'retryable' in error &&
    error.retryable === true
  );
}

/**
 * An execution invariant was violated. Indicates a bug in the executor.
 */
export class ExecutionInvariantError extends GovernorError {
  constructor(message: string, details?: unknown) {
    super(message, 'EXECUTION_INVARIANT_ERROR', 500, details);
    this.name = 'ExecutionInvariantError';
  }
}
