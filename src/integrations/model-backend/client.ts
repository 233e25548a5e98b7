/**
 * OpenAI-compatible Model Backend
 *
 * Implements the model collaborator over any server that speaks the
 * `/v1/chat/completions` protocol (hosted APIs, local inference servers).
 * Timeouts and transport failures become retryable ModelBackendErrors;
 * rejected requests do not.
 */
import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import logger from '../../utils/logger';
import { errorMessage } from '../../utils/errors';
import { ModelBackend, ModelCompletion, ModelCompletionRequest, ToolDescriptor } from '../../execution/collaborators';
import { ModelBackendError } from '../../execution/errors';
import { ChatMessage, ToolCall } from '../../execution/types';

export interface OpenAICompatibleModelBackendOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  /** Model used for roles without an entry in `roleModels` */
  model: string;
  roleModels?: Record<string, string>;
  http?: AxiosInstance;
}

interface WireToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

interface WireMessage {
  role: ChatMessage['role'];
  content: string;
  tool_calls?: WireToolCall[];
  tool_call_id?: string;
  name?: string;
}

const CompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({
                  name: z.string(),
                  arguments: z.string().default('{}'),
                }),
              }),
            )
            .optional(),
        }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .optional(),
});

const ToolArgumentsSchema = z.record(z.string(), z.unknown());

const RETRYABLE_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);

export function toWireMessages(messages: readonly ChatMessage[]): WireMessage[] {
  return messages.map((message) => ({
    role: message.role,
    content: message.content,
    ...(message.tool_calls && {
      tool_calls: message.tool_calls.map((call) => ({
        id: call.id,
        type: 'function' as const,
        function: { name: call.name, arguments: JSON.stringify(call.arguments) },
      })),
    }),
    ...(message.tool_call_id !== undefined && { tool_call_id: message.tool_call_id }),
    ...(message.name !== undefined && { name: message.name }),
  }));
}

function toWireTools(tools: readonly ToolDescriptor[]) {
  return tools.map((tool) => ({
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: { type: 'object', additionalProperties: true },
    },
  }));
}

function parseToolArguments(raw: string, toolName: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ModelBackendError(`Model returned malformed arguments for tool '${toolName}'`, false, {
      cause: errorMessage(error),
    });
  }
  const result = ToolArgumentsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ModelBackendError(`Model returned non-object arguments for tool '${toolName}'`, false);
  }
  return result.data;
}

/**
 * Validate a chat completion response body.
 */
export function parseCompletion(data: unknown): ModelCompletion {
  const result = CompletionResponseSchema.safeParse(data);
  if (!result.success) {
    throw new ModelBackendError('Model backend returned an unexpected response', false, {
      issues: result.error.issues.map((issue) => issue.message),
    });
  }

  const { message } = result.data.choices[0];
  const toolCalls: ToolCall[] = (message.tool_calls ?? []).map((call) => ({
    id: call.id,
    name: call.function.name,
    arguments: parseToolArguments(call.function.arguments, call.function.name),
  }));

  return {
    content: message.content ?? '',
    tool_calls: toolCalls,
    ...(result.data.usage && { usage: result.data.usage }),
  };
}

/**
 * Classify a failed request.
 */
export function toModelBackendError(error: unknown): ModelBackendError {
  if (error instanceof ModelBackendError) {
    return error;
  }
  if (axios.isCancel(error)) {
    return new ModelBackendError('Model request was cancelled', false);
  }
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new ModelBackendError('Model request timed out', true, { code: error.code });
    }
    if (error.response) {
      const status = error.response.status;
      return new ModelBackendError(`Model backend responded with status ${status}`, RETRYABLE_STATUS.has(status), {
        status,
      });
    }
    return new ModelBackendError(`Model backend unreachable: ${error.message}`, true, { code: error.code });
  }
  return new ModelBackendError(`Model request failed: ${errorMessage(error)}`, false);
}

export class OpenAICompatibleModelBackend implements ModelBackend {
  private readonly http: AxiosInstance;
  private readonly model: string;
  private readonly roleModels: Record<string, string>;

  constructor(options: OpenAICompatibleModelBackendOptions) {
    this.model = options.model;
    this.roleModels = options.roleModels ?? {};
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': 'agent-governor/0.1',
          ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
        },
      });
  }

  modelFor(role: string): string {
    return Object.hasOwn(this.roleModels, role) ? this.roleModels[role] : this.model;
  }

  async complete(request: ModelCompletionRequest): Promise<ModelCompletion> {
    const model = this.modelFor(request.role);
    const body = {
      model,
      messages: toWireMessages(request.messages),
      ...(request.tools && request.tools.length > 0 && { tools: toWireTools(request.tools) }),
      ...(request.max_tokens !== undefined && { max_tokens: request.max_tokens }),
      ...(request.temperature !== undefined && { temperature: request.temperature }),
    };

    const started = Date.now();
    try {
      const response = await this.http.post<unknown>('/v1/chat/completions', body, {
        signal: request.signal,
        headers: request.trace_id ? { 'x-trace-id': request.trace_id } : undefined,
      });
      const completion = parseCompletion(response.data);

      logger.debug(
        {
          trace_id: request.trace_id,
          role: request.role,
          model,
          duration_ms: Date.now() - started,
          tool_calls: completion.tool_calls.length,
          usage: completion.usage,
        },
        'Model call completed',
      );
      return completion;
    } catch (error) {
      const failure = toModelBackendError(error);
      logger.warn(
        { trace_id: request.trace_id, role: request.role, model, error: failure.message, retryable: failure.retryable },
        'Model call failed',
      );
      throw failure;
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.http.get('/v1/models', { timeout: 5000 });
      return true;
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Model backend health check failed');
      return false;
    }
  }
}
