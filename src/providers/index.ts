// Provider factory
// Both supported backends speak the OpenAI chat-completions dialect

import type { Provider } from './types.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';

export interface ProviderConfig {
  provider: string;
  baseUrl: string;
  apiKey: string;
}

const SUPPORTED_PROVIDERS = ['ollama', 'openai'];

export function createProvider(config: ProviderConfig): Provider {
  const name = config.provider.toLowerCase();
  if (!SUPPORTED_PROVIDERS.includes(name)) {
    throw new Error(`Unknown LLM provider "${config.provider}". Supported: ${SUPPORTED_PROVIDERS.join(', ')}`);
  }
  return new OpenAICompatibleProvider({ name, baseUrl: config.baseUrl, apiKey: config.apiKey });
}

export { OpenAICompatibleProvider } from './openai-compatible.js';
export type * from './types.js';
