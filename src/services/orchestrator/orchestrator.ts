// Weather Orchestrator
// Drives the conversation between the user message, the model and the tools
// until the model answers without requesting tools

import type { Logger } from 'pino';
import type { Provider, ProviderMessage, ProviderResponse, ProviderTool, ProviderUsage } from '../../providers/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import { DEGRADED_RESPONSE, SYSTEM_PROMPT } from '../tools/prompts.js';
import { ModelQueryError } from './errors.js';
import { ToolExecutor, type ExecutedToolCall } from './executor.js';
import type { InvokeOptions, InvokeResult, OrchestratorOptions, ToolCallTrace } from './types.js';

export const DEFAULT_MAX_TURNS = 8;

export interface OrchestratorDeps {
  provider: Provider;
  registry: ToolRegistry;
  logger: Logger;
  systemPrompt?: string;
}

export function emptyUsage(): ProviderUsage {
  return { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
}

function addUsage(total: ProviderUsage, usage: ProviderUsage): void {
  total.promptTokens += usage.promptTokens;
  total.completionTokens += usage.completionTokens;
  total.totalTokens += usage.totalTokens;
}

/**
 * Conversation for the next model query. Rebuilt every turn from the system
 * prompt, the original user message, the latest model response and the results
 * of its tool calls, so the grounding instructions always lead the context.
 */
export function buildTurnConversation(
  systemPrompt: string,
  userMessage: string,
  response: ProviderResponse,
  executed: ExecutedToolCall[],
): ProviderMessage[] {
  const messages: ProviderMessage[] = [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: userMessage },
    { role: 'assistant', content: response.content, tool_calls: response.toolCalls },
  ];

  for (const { call, result, guidance } of executed) {
    if (guidance) {
      messages.push({ role: 'system', content: guidance });
    }
    messages.push({
      role: 'tool',
      tool_call_id: call.id,
      name: call.name,
      content: result.content,
    });
  }

  return messages;
}

export class WeatherOrchestrator {
  private readonly provider: Provider;
  private readonly executor: ToolExecutor;
  private readonly tools: ProviderTool[];
  private readonly systemPrompt: string;
  private readonly maxTurns: number;
  private readonly options: OrchestratorOptions;
  private readonly log: Logger;

  constructor({ provider, registry, logger, systemPrompt = SYSTEM_PROMPT }: OrchestratorDeps, options: OrchestratorOptions = {}) {
    this.log = logger.child({ module: 'orchestrator' });
    this.provider = provider;
    this.executor = new ToolExecutor(registry, this.log);
    // The registry is frozen after startup, so the catalog is built once
    this.tools = registry.toProviderFunctions().map((fn): ProviderTool => ({ type: 'function', function: fn }));
    this.systemPrompt = systemPrompt;
    this.maxTurns = Math.max(1, options.maxTurns ?? DEFAULT_MAX_TURNS);
    this.options = options;
  }

  async invoke(userMessage: string, { signal }: InvokeOptions = {}): Promise<InvokeResult> {
    const usage = emptyUsage();
    const toolCalls: ToolCallTrace[] = [];
    let conversation: ProviderMessage[] = [
      { role: 'system', content: this.systemPrompt },
      { role: 'user', content: userMessage },
    ];

    for (let turn = 1; turn <= this.maxTurns; turn++) {
      signal?.throwIfAborted();

      const response = await this.queryModel(conversation, signal);
      addUsage(usage, response.usage);

      this.log.debug(
        { turn, toolCalls: response.toolCalls.map(tc => tc.name), usage: response.usage },
        'Model turn completed',
      );

      if (response.toolCalls.length === 0) {
        this.log.info({ turn, usage }, 'Final answer produced');
        return { text: response.content, usage, iterations: turn, toolCalls, truncated: false };
      }

      const executed = await this.executor.executeAll(response.toolCalls, { signal });
      for (const { call, args, result } of executed) {
        toolCalls.push({
          id: call.id,
          tool: call.name,
          args,
          success: result.success,
          durationMs: result.durationMs,
        });
      }

      conversation = buildTurnConversation(this.systemPrompt, userMessage, response, executed);
    }

    this.log.warn({ maxTurns: this.maxTurns, usage }, 'Turn cap reached without a final answer');
    return { text: DEGRADED_RESPONSE, usage, iterations: this.maxTurns, toolCalls, truncated: true };
  }

  private async queryModel(messages: ProviderMessage[], signal?: AbortSignal): Promise<ProviderResponse> {
    try {
      return await this.provider.sendChat(messages, {
        model: this.options.model,
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
        tools: this.tools,
        tool_choice: 'auto',
        signal,
      });
    } catch (error) {
      if (signal?.aborted) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ModelQueryError(`Model query failed: ${message}`, { cause: error });
    }
  }
}
