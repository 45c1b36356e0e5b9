// OpenAI-compatible Provider
// Chat completions with function calling through the openai SDK. The default
// base URL is Gemini's OpenAI-compatible endpoint; any compatible API works.

import OpenAI from 'openai';
import type { LlmConfig } from '../env.js';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ToolCall } from './types.js';

type ChatMessageParam = OpenAI.Chat.ChatCompletionMessageParam;

// The slice of the SDK this provider calls; `OpenAI#chat.completions` satisfies it
export interface ChatCompletionsApi {
  create(
    body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal },
  ): Promise<OpenAI.Chat.ChatCompletion>;
}

export interface OpenAICompatibleProviderOptions extends LlmConfig {
  timeoutMs?: number;
  completions?: ChatCompletionsApi;
}

export class OpenAICompatibleProvider implements Provider {
  name = 'openai-compatible';
  private completions: ChatCompletionsApi;
  private defaults: LlmConfig;

  constructor({ completions, timeoutMs = 60_000, ...config }: OpenAICompatibleProviderOptions) {
    if (!config.apiKey) {
      throw new Error('LLM API key not configured');
    }
    this.defaults = config;
    // No SDK retries: a failed model query fails the invocation
    this.completions = completions ?? new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
      timeout: timeoutMs,
    }).chat.completions;
  }

  private formatMessages(messages: ProviderMessage[]): ChatMessageParam[] {
    return messages.map((m): ChatMessageParam => {
      switch (m.role) {
        case 'system':
          return { role: 'system', content: m.content };
        case 'user':
          return { role: 'user', content: m.content };
        case 'assistant':
          if (m.tool_calls && m.tool_calls.length > 0) {
            return {
              role: 'assistant',
              content: m.content || null,
              tool_calls: m.tool_calls.map(tc => ({
                id: tc.id,
                type: 'function',
                function: { name: tc.name, arguments: tc.arguments },
              })),
            };
          }
          return { role: 'assistant', content: m.content };
        case 'tool':
          if (!m.tool_call_id) {
            throw new Error('Tool message is missing tool_call_id');
          }
          return { role: 'tool', tool_call_id: m.tool_call_id, content: m.content };
      }
    });
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const completion = await this.completions.create(
      {
        model: options.model || this.defaults.model,
        messages: this.formatMessages(messages),
        max_tokens: options.maxTokens ?? this.defaults.maxTokens,
        temperature: options.temperature ?? this.defaults.temperature,
        ...(options.tools && options.tools.length > 0
          ? { tools: options.tools, tool_choice: options.tool_choice ?? 'auto' }
          : {}),
      },
      { signal: options.signal },
    );

    const choice = completion.choices[0];
    if (!choice) {
      throw new Error('Model returned no choices');
    }

    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map((tc, index) => ({
      // Some compatible endpoints omit call ids
      id: tc.id || `call_${index}`,
      name: tc.function.name,
      arguments: tc.function.arguments || '{}',
    }));

    return {
      content: choice.message.content ?? '',
      toolCalls,
      usage: {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        totalTokens: completion.usage?.total_tokens ?? 0,
      },
      finishReason: choice.finish_reason ?? undefined,
    };
  }
}
