// Tool system types and interfaces
// Defines the schema and interfaces for the weather tools

import type { ZodType, ZodTypeDef } from 'zod';

export type ToolParameterType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface ToolParameter {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum?: string[]; // For enum types
  default?: string | number | boolean;
}

export type ToolOutput = Record<string, unknown>;

export interface ToolContext {
  signal?: AbortSignal;
}

/**
 * A named, schema-described unit of work the model may request.
 * `execute` never rejects for upstream failures; `fallback` builds the
 * error-tagged shape the orchestrator uses when it does anyway.
 */
export interface ToolDefinition<TArgs = unknown, TOutput extends ToolOutput = ToolOutput> {
  name: string;
  description: string;
  parameters: ToolParameter[];
  schema: ZodType<TArgs, ZodTypeDef, unknown>;
  // Injected as a system message right before this tool's result
  guidance?: string;
  execute(args: TArgs, context: ToolContext): Promise<TOutput>;
  fallback(error: string): TOutput;
}

export interface ToolResult {
  callId: string;
  name: string;
  success: boolean;
  content: string; // JSON stringified normalized mapping
  durationMs: number;
}
