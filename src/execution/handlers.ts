/**
 * Step Handlers
 *
 * One handler per non-terminal state. A handler reads the current context and
 * returns the next state together with an updated copy of the context; it
 * never mutates its input, so the executor can discard the result of a step
 * that timed out. Handlers also declare the capabilities their step will use,
 * which the executor clears with the governance gate before running them.
 */
import { Capability, EffectiveLimits } from '../governance/gate';
import { ModelBackend, SessionStore, ToolLayer } from './collaborators';
import { StepExecutionError } from './errors';
import { NO_RETRY, RetryPolicy } from './retry';
import { Channel, ChatMessage, ExecutionContext, TaskState, ToolResult } from './types';

export interface StepDependencies {
  model: ModelBackend;
  tools: ToolLayer;
  sessions: SessionStore;
  limits: (capability: Capability) => EffectiveLimits;
  maxToolIterations: number;
  signal: AbortSignal;
}

export interface StepOutcome {
  next: TaskState;
  context: ExecutionContext;
}

export interface StepHandler {
  state: TaskState;
  retry: RetryPolicy;
  capabilities(ctx: Readonly<ExecutionContext>): Capability[];
  run(ctx: Readonly<ExecutionContext>, deps: StepDependencies): Promise<StepOutcome>;
}

export type HandlerRegistry = ReadonlyMap<TaskState, StepHandler>;

const DEFAULT_ROLE_BY_CHANNEL: Readonly<Record<Channel, string>> = {
  chat: 'standard',
  code_task: 'coding',
  system_health: 'reasoning',
};

const TOOL_RESULTS_IN_FALLBACK = 3;

/**
 * Best-effort reply when the model never produced a final answer after
 * using tools.
 */
export function fallbackReply(results: readonly ToolResult[]): string {
  if (results.length === 0) {
    return 'No final answer could be produced for this request.';
  }

  const lines = ['No final answer could be produced. Latest tool results:'];
  for (const result of results.slice(-TOOL_RESULTS_IN_FALLBACK)) {
    lines.push(
      result.success ? `- ${result.name}: success` : `- ${result.name}: failed (${result.error ?? 'unknown error'})`,
    );
  }
  return lines.join('\n');
}

function renderToolOutput(result: ToolResult): string {
  if (!result.success) {
    return JSON.stringify({ error: result.error ?? 'unknown error' });
  }
  return typeof result.output === 'string' ? result.output : JSON.stringify(result.output ?? null);
}

export const initHandler: StepHandler = {
  state: TaskState.INIT,
  retry: NO_RETRY,
  capabilities: () => [],
  async run(ctx, deps) {
    const history = ctx.session_id ? await deps.sessions.load(ctx.session_id) : undefined;

    const messages: ChatMessage[] = [];
    if (ctx.request.system_prompt && !history?.some((message) => message.role === 'system')) {
      messages.push({ role: 'system', content: ctx.request.system_prompt });
    }
    messages.push(...(history ?? []));
    messages.push({ role: 'user', content: ctx.request.prompt });

    return { next: TaskState.PLANNING, context: { ...ctx, messages } };
  },
};

export const planningHandler: StepHandler = {
  state: TaskState.PLANNING,
  retry: NO_RETRY,
  capabilities: () => [],
  async run(ctx, deps) {
    const role = ctx.request.model_role ?? DEFAULT_ROLE_BY_CHANNEL[ctx.request.channel ?? 'chat'];
    return {
      next: TaskState.MODEL_CALL,
      context: {
        ...ctx,
        plan: { model_role: role, tools: deps.tools.list().map((tool) => tool.name) },
      },
    };
  },
};

export const modelCallHandler: StepHandler = {
  state: TaskState.MODEL_CALL,
  retry: { kind: 'exponential', maxAttempts: 3, baseDelayMs: 250, maxDelayMs: 2000 },
  capabilities: (ctx) => (ctx.plan ? [{ kind: 'model_role', role: ctx.plan.model_role }] : []),
  async run(ctx, deps) {
    const { plan } = ctx;
    if (!plan) {
      throw new StepExecutionError(TaskState.MODEL_CALL, 'No plan available for model call');
    }

    const limits = deps.limits({ kind: 'model_role', role: plan.model_role });
    const toolsAvailable = ctx.tool_iterations < deps.maxToolIterations;
    const completion = await deps.model.complete({
      role: plan.model_role,
      messages: ctx.messages,
      tools: toolsAvailable ? deps.tools.list().filter((tool) => plan.tools.includes(tool.name)) : [],
      max_tokens: limits.max_tokens,
      temperature: limits.temperature,
      trace_id: ctx.trace_id,
      signal: deps.signal,
    });

    const assistant: ChatMessage = {
      role: 'assistant',
      content: completion.content,
      ...(completion.tool_calls.length > 0 && { tool_calls: completion.tool_calls }),
    };
    const messages = [...ctx.messages, assistant];

    if (completion.tool_calls.length === 0) {
      return { next: TaskState.SYNTHESIS, context: { ...ctx, messages, output: completion.content } };
    }

    if (!toolsAvailable) {
      return {
        next: TaskState.SYNTHESIS,
        context: { ...ctx, messages, pending_tool_calls: [], output: fallbackReply(ctx.tool_results) },
      };
    }

    return {
      next: TaskState.TOOL_EXECUTION,
      context: { ...ctx, messages, pending_tool_calls: completion.tool_calls },
    };
  },
};

export const toolExecutionHandler: StepHandler = {
  state: TaskState.TOOL_EXECUTION,
  retry: NO_RETRY,
  capabilities: (ctx) =>
    ctx.pending_tool_calls.map((call): Capability => ({ kind: 'tool', name: call.name, arguments: call.arguments })),
  async run(ctx, deps) {
    const results: ToolResult[] = [];
    for (const call of ctx.pending_tool_calls) {
      results.push(await deps.tools.execute(call, deps.signal));
    }

    const toolMessages = results.map((result): ChatMessage => ({
      role: 'tool',
      content: renderToolOutput(result),
      tool_call_id: result.call_id,
      name: result.name,
    }));

    return {
      next: TaskState.MODEL_CALL,
      context: {
        ...ctx,
        messages: [...ctx.messages, ...toolMessages],
        pending_tool_calls: [],
        tool_results: [...ctx.tool_results, ...results],
        tool_iterations: ctx.tool_iterations + 1,
      },
    };
  },
};

export const synthesisHandler: StepHandler = {
  state: TaskState.SYNTHESIS,
  retry: NO_RETRY,
  capabilities: () => [],
  async run(ctx, deps) {
    const output = ctx.output && ctx.output.length > 0 ? ctx.output : fallbackReply(ctx.tool_results);
    if (ctx.session_id) {
      await deps.sessions.save(ctx.session_id, ctx.messages);
    }
    return { next: TaskState.COMPLETED, context: { ...ctx, output } };
  },
};

export function defaultHandlers(): HandlerRegistry {
  return new Map(
    [initHandler, planningHandler, modelCallHandler, toolExecutionHandler, synthesisHandler].map(
      (handler): [TaskState, StepHandler] => [handler.state, handler],
    ),
  );
}
