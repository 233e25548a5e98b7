/**
 * Tool Registry
 *
 * In-process tool layer: named async functions with a description. Errors
 * thrown by a tool become a failed ToolResult.
 */
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { ToolDescriptor, ToolLayer } from './collaborators';
import { ToolCall, ToolResult } from './types';

export type ToolFunction = (args: Record<string, unknown>, signal?: AbortSignal) => unknown;

interface RegisteredTool extends ToolDescriptor {
  run: ToolFunction;
}

export class ToolRegistry implements ToolLayer {
  private readonly tools = new Map<string, RegisteredTool>();

  register(name: string, description: string, run: ToolFunction): this {
    if (this.tools.has(name)) {
      throw new Error(`Tool '${name}' is already registered`);
    }
    this.tools.set(name, { name, description, run });
    return this;
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map(({ name, description }) => ({ name, description }));
  }

  async execute(call: ToolCall, signal?: AbortSignal): Promise<ToolResult> {
    const started = Date.now();
    const tool = this.tools.get(call.name);

    if (!tool) {
      return {
        call_id: call.id,
        name: call.name,
        success: false,
        error: `Tool '${call.name}' is not registered`,
        duration_ms: 0,
      };
    }

    try {
      const output: unknown = await tool.run(call.arguments, signal);
      return { call_id: call.id, name: call.name, success: true, output, duration_ms: Date.now() - started };
    } catch (error) {
      logger.warn({ tool: call.name, call_id: call.id, error: errorMessage(error) }, 'Tool execution failed');
      return {
        call_id: call.id,
        name: call.name,
        success: false,
        error: errorMessage(error),
        duration_ms: Date.now() - started,
      };
    }
  }
}
