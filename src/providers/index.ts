// Provider factory

import type { LlmConfig } from '../env.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';
import type { Provider } from './types.js';

export function createProvider(config: LlmConfig): Provider {
  return new OpenAICompatibleProvider(config);
}

export { OpenAICompatibleProvider } from './openai-compatible.js';

// Re-export types
export type {
  Provider,
  ProviderMessage,
  ProviderOptions,
  ProviderResponse,
  ProviderTool,
  ProviderUsage,
  ToolCall,
} from './types.js';
