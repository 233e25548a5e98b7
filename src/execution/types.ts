/**
 * Task Execution - Type Definitions
 *
 * The execution context is the whole state of one task. It is JSON-serializable
 * so that it can be handed to telemetry or persisted between requests; step
 * records are append-only and ordered by `sequence`.
 */
import { MetricAggregate } from '../sampler/types';

/**
 * Phases of one task. COMPLETED and FAILED are terminal.
 */
export enum TaskState {
  INIT = 'init',
  PLANNING = 'planning',
  MODEL_CALL = 'model_call',
  TOOL_EXECUTION = 'tool_execution',
  SYNTHESIS = 'synthesis',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export const TERMINAL_STATES: readonly TaskState[] = [TaskState.COMPLETED, TaskState.FAILED];

export function isTerminal(state: TaskState): boolean {
  return TERMINAL_STATES.includes(state);
}

export function isTaskState(value: unknown): value is TaskState {
  return typeof value === 'string' && Object.values(TaskState).some((state) => state === value);
}

/**
 * Where the request came from; picks the default model role.
 */
export type Channel = 'chat' | 'code_task' | 'system_health';

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ChatMessage {
  role: MessageRole;
  content: string;
  /** Set on assistant messages that request tools */
  tool_calls?: ToolCall[];
  /** Set on tool messages: the call they answer */
  tool_call_id?: string;
  name?: string;
}

export interface ToolResult {
  call_id: string;
  name: string;
  success: boolean;
  output?: unknown;
  error?: string;
  duration_ms: number;
}

export interface TaskRequest {
  prompt: string;
  session_id?: string;
  channel?: Channel;
  /** Overrides the channel's default model role */
  model_role?: string;
  system_prompt?: string;
}

export interface TaskPlan {
  model_role: string;
  tools: string[];
}

/**
 * Structured failure stored on the context. Visible through telemetry only.
 */
export interface TaskError {
  code: string;
  message: string;
  state: TaskState;
  cause?: string;
}

/**
 * Audit entry for one state transition. Immutable once written.
 */
export interface StepRecord {
  sequence: number;
  from_state: TaskState;
  to_state: TaskState;
  started_at: number;
  ended_at: number;
  duration_ms: number;
  attempts: number;
}

export type MetricsSummary = Record<string, MetricAggregate>;

export interface ExecutionContext {
  trace_id: string;
  parent_span_id?: string;
  session_id?: string;
  state: TaskState;
  request: TaskRequest;
  messages: ChatMessage[];
  plan?: TaskPlan;
  pending_tool_calls: ToolCall[];
  tool_results: ToolResult[];
  tool_iterations: number;
  output?: string;
  error?: TaskError;
  steps: StepRecord[];
  metrics_summary?: MetricsSummary;
  started_at: number;
  /** Wall-clock deadline fixed from the task budget when execution starts */
  deadline_at?: number;
  ended_at?: number;
}

/**
 * What a caller sees. Failures never carry internal detail.
 */
export interface TaskResponse {
  trace_id: string;
  status: TaskState.COMPLETED | TaskState.FAILED;
  output?: string;
  message?: string;
  steps: number;
}
