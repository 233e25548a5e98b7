/**
 * Task Execution
 *
 * State-machine execution of one task under governance:
 *
 * - Task states, execution context and step records
 * - Step handlers and their capability declarations
 * - Retry policies per state
 * - The executor loop (gate checks, approvals, timeouts, budget)
 * - Collaborator contracts (model backend, tool layer, session store)
 */

// Types
export {
  TaskState,
  TERMINAL_STATES,
  isTerminal,
  isTaskState,
  Channel,
  MessageRole,
  ChatMessage,
  ToolCall,
  ToolResult,
  TaskRequest,
  TaskPlan,
  TaskError,
  StepRecord,
  MetricsSummary,
  ExecutionContext,
  TaskResponse,
} from './types';

// Errors
export {
  DeniedError,
  ApprovalTimeoutError,
  StepTimeoutError,
  StepExecutionError,
  TaskBudgetExceededError,
  ModelBackendError,
  ExecutionInvariantError,
  isRetryable,
} from './errors';

// Context
export { TaskRequestSchema, parseTaskRequest, createExecutionContext, toTaskResponse } from './context';

// Step records
export { openStep, closeStep, appendStep } from './step-records';
export type { OpenStep } from './step-records';

// Collaborators
export { InMemorySessionStore } from './collaborators';
export type {
  ModelBackend,
  ModelCompletion,
  ModelCompletionRequest,
  ToolDescriptor,
  ToolLayer,
  SessionStore,
} from './collaborators';
export { ToolRegistry } from './tool-registry';
export type { ToolFunction } from './tool-registry';

// Handlers and retry
export {
  defaultHandlers,
  fallbackReply,
  initHandler,
  planningHandler,
  modelCallHandler,
  toolExecutionHandler,
  synthesisHandler,
} from './handlers';
export type { StepHandler, StepOutcome, StepDependencies, HandlerRegistry } from './handlers';
export { NO_RETRY, maxAttempts, retryDelay, runWithRetry } from './retry';
export type { RetryPolicy, AttemptTracker } from './retry';

// Executor
export { TaskExecutor, SUMMARY_METRICS } from './executor';
export type { TaskExecutorOptions, MetricWindowSource } from './executor';
