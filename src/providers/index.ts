// Provider Registry
// Resolves the language model backend named by LLM_PROVIDER

import type { Provider } from './types.js';
import { OllamaProvider } from './ollama.js';
import { OpenAICompatProvider } from './openai-compat.js';
import { env as defaultEnv, isProviderConfigured, type Env, type LlmProviderName } from '../env.js';

// Provider instances (lazy initialization)
const providers: Map<LlmProviderName, Provider> = new Map();

function createProvider(name: LlmProviderName, config: Env): Provider | null {
  if (!isProviderConfigured(name, config)) {
    return null;
  }

  switch (name) {
    case 'ollama':
      return new OllamaProvider({
        baseUrl: config.OLLAMA_GPU_URL,
        numCtx: config.LLM_NUM_CTX,
        timeoutMs: config.LLM_TIMEOUT_MS,
      });
    case 'openai_compat':
      return new OpenAICompatProvider({
        baseUrl: config.OPENAI_COMPAT_BASE_URL,
        apiKey: config.OPENAI_COMPAT_API_KEY,
        timeoutMs: config.LLM_TIMEOUT_MS,
      });
    default:
      return null;
  }
}

export function getProvider(name: LlmProviderName = defaultEnv.LLM_PROVIDER, config: Env = defaultEnv): Provider {
  const cached = providers.get(name);
  if (cached) {
    return cached;
  }

  const provider = createProvider(name, config);
  if (!provider) {
    throw new Error(`Provider "${name}" is not available or not configured`);
  }

  providers.set(name, provider);
  return provider;
}

// Re-export types
export type {
  Provider,
  ProviderMessage,
  ProviderOptions,
  ProviderResponse,
  ProviderTool,
  StreamChunk,
  ToolCall,
} from './types.js';
