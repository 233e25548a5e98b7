/**
 * Task Execution - Context Creation and Responses
 *
 * Validates incoming task requests, creates the execution context for a new
 * task, and renders the caller-facing response for a finished one.
 */
import { z } from 'zod';
import { ValidationError } from '../utils/errors';
import { TraceContext } from '../telemetry/trace';
import { ExecutionContext, TaskRequest, TaskResponse, TaskState } from './types';

export const TaskRequestSchema = z.object({
  prompt: z.string().min(1),
  session_id: z.string().min(1).optional(),
  channel: z.enum(['chat', 'code_task', 'system_health']).optional(),
  model_role: z.string().min(1).optional(),
  system_prompt: z.string().optional(),
});

/**
 * Validate an untrusted task request.
 *
 * @throws ValidationError listing every offending field
 */
export function parseTaskRequest(input: unknown): TaskRequest {
  const result = TaskRequestSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid task request', {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

export function createExecutionContext(
  request: TaskRequest,
  trace: TraceContext,
  now: number,
): ExecutionContext {
  return {
    trace_id: trace.trace_id,
    parent_span_id: trace.parent_span_id,
    session_id: request.session_id,
    state: TaskState.INIT,
    request,
    messages: [],
    pending_tool_calls: [],
    tool_results: [],
    tool_iterations: 0,
    steps: [],
    started_at: now,
  };
}

/**
 * The response returned to the caller. A failure only names the trace;
 * the structured error is published as telemetry.
 */
export function toTaskResponse(ctx: ExecutionContext): TaskResponse {
  if (ctx.state === TaskState.COMPLETED) {
    return {
      trace_id: ctx.trace_id,
      status: TaskState.COMPLETED,
      output: ctx.output ?? '',
      steps: ctx.steps.length,
    };
  }

  return {
    trace_id: ctx.trace_id,
    status: TaskState.FAILED,
    message: `Task failed. Reference trace ${ctx.trace_id} for details.`,
    steps: ctx.steps.length,
  };
}
