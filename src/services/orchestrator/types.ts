// Orchestrator Types

import type { ProviderUsage } from '../../providers/types.js';

export interface ToolCallTrace {
  id: string;
  tool: string;
  args: Record<string, unknown> | null;
  success: boolean;
  durationMs: number;
}

export interface InvokeResult {
  text: string;
  usage: ProviderUsage;
  iterations: number;
  toolCalls: ToolCallTrace[];
  // Turn cap reached before the model produced a final answer
  truncated: boolean;
}

export interface InvokeOptions {
  signal?: AbortSignal;
}

export interface OrchestratorOptions {
  maxTurns?: number;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}
