// Tool Executor
// Runs tool calls requested by the model; every call yields exactly one result

import type { Logger } from 'pino';
import type { ToolCall } from '../../providers/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolContext, ToolDefinition, ToolOutput, ToolResult } from '../tools/types.js';
import { GENERIC_TOOL_GUIDANCE } from '../tools/prompts.js';
import { ToolExecutionError, UnknownToolError } from './errors.js';

export interface ExecutedToolCall {
  call: ToolCall;
  args: Record<string, unknown> | null;
  result: ToolResult;
  // System message injected before the result; absent for unknown tools
  guidance?: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseToolArguments(call: ToolCall): Record<string, unknown> {
  const raw = call.arguments.trim();
  if (!raw) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ToolExecutionError(call.name, `Invalid JSON arguments for ${call.name}`, { cause: error });
  }

  if (!isPlainObject(parsed)) {
    throw new ToolExecutionError(call.name, `Arguments for ${call.name} must be a JSON object`);
  }
  return parsed;
}

function hasError(output: ToolOutput): boolean {
  return typeof output.error === 'string' && output.error.length > 0;
}

export class ToolExecutor {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly log: Logger,
  ) {}

  async execute(call: ToolCall, context: ToolContext = {}): Promise<ExecutedToolCall> {
    const startTime = Date.now();
    const tool = this.registry.get(call.name);

    if (!tool) {
      const error = new UnknownToolError(call.name);
      this.log.warn({ callId: call.id, tool: call.name }, error.message);
      return {
        call,
        args: null,
        result: {
          callId: call.id,
          name: call.name,
          success: false,
          content: JSON.stringify({ error: error.message }),
          durationMs: Date.now() - startTime,
        },
      };
    }

    let args: Record<string, unknown> | null = null;
    let output: ToolOutput;
    try {
      args = parseToolArguments(call);
      output = await this.run(tool, args, context);
    } catch (error) {
      // Cancellation is not a tool failure; let it unwind the loop
      if (context.signal?.aborted) throw error;

      const failure = error instanceof ToolExecutionError
        ? error
        : new ToolExecutionError(tool.name, error instanceof Error ? error.message : String(error), { cause: error });
      this.log.warn({ callId: call.id, tool: tool.name, err: failure.message }, 'Tool execution failed');
      output = tool.fallback(failure.message);
    }

    const result: ToolResult = {
      callId: call.id,
      name: tool.name,
      success: !hasError(output),
      content: JSON.stringify(output),
      durationMs: Date.now() - startTime,
    };
    this.log.debug({ callId: call.id, tool: tool.name, args, result: result.content, durationMs: result.durationMs }, 'Tool result');

    return { call, args, result, guidance: tool.guidance ?? GENERIC_TOOL_GUIDANCE };
  }

  // Sequential, in the order the model emitted the calls
  async executeAll(calls: ToolCall[], context: ToolContext = {}): Promise<ExecutedToolCall[]> {
    const executed: ExecutedToolCall[] = [];

    for (const call of calls) {
      context.signal?.throwIfAborted();
      executed.push(await this.execute(call, context));
    }

    return executed;
  }

  private async run(tool: ToolDefinition, args: Record<string, unknown>, context: ToolContext): Promise<ToolOutput> {
    const parsed = tool.schema.safeParse(args);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new ToolExecutionError(tool.name, `Invalid arguments for ${tool.name}: ${issues}`);
    }
    return tool.execute(parsed.data, context);
  }
}
