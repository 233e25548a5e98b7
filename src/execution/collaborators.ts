/**
 * Task Execution - Collaborator Contracts
 *
 * The executor depends only on these narrow interfaces: a model backend that
 * completes a conversation, a tool layer that runs one tool call, and a
 * session store that keeps conversation history between requests.
 */
import { ChatMessage, ToolCall, ToolResult } from './types';

export interface ToolDescriptor {
  name: string;
  description: string;
}

export interface ModelCompletionRequest {
  role: string;
  messages: readonly ChatMessage[];
  tools?: readonly ToolDescriptor[];
  max_tokens?: number;
  temperature?: number;
  trace_id?: string;
  signal?: AbortSignal;
}

export interface ModelCompletion {
  content: string;
  tool_calls: ToolCall[];
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
  };
}

/**
 * Fails with ModelBackendError on timeout or transport failure.
 */
export interface ModelBackend {
  complete(request: ModelCompletionRequest): Promise<ModelCompletion>;
}

/**
 * Runs a single tool call. A tool's own failure is reported in the result,
 * not thrown.
 */
export interface ToolLayer {
  list(): ToolDescriptor[];
  execute(call: ToolCall, signal?: AbortSignal): Promise<ToolResult>;
}

export interface SessionStore {
  load(sessionId: string): Promise<ChatMessage[] | undefined>;
  save(sessionId: string, messages: readonly ChatMessage[]): Promise<void>;
}

/**
 * Process-local session store. Keeps the most recent `maxMessages` per session.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, ChatMessage[]>();
  private readonly maxMessages: number;

  constructor(maxMessages = 200) {
    this.maxMessages = maxMessages;
  }

  async load(sessionId: string): Promise<ChatMessage[] | undefined> {
    const messages = this.sessions.get(sessionId);
    return messages ? messages.map((message) => ({ ...message })) : undefined;
  }

  async save(sessionId: string, messages: readonly ChatMessage[]): Promise<void> {
    this.sessions.set(
      sessionId,
      messages.slice(-this.maxMessages).map((message) => ({ ...message })),
    );
  }

  get size(): number {
    return this.sessions.size;
  }
}
