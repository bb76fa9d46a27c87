// Environment configuration for the copilot API
// Model endpoints, tool budgets and GPU swap settings all come from environment variables

type EnvSource = Record<string, string | undefined>;

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim() || fallback;

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parseIntAtLeast(value: string | undefined, defaultValue: number, min: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < min) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseList(value: string | undefined, fallback: string[] = []): string[] {
  const items = (value || '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
  return items.length > 0 ? items : fallback;
}

/**
 * Parses `name=ms` pairs, e.g. `blueprint_vision=180000,web_search=15000`.
 * Malformed pairs are reported and skipped.
 */
export function parseTimeoutOverrides(value: string | undefined): Record<string, number> {
  const overrides: Record<string, number> = {};
  for (const pair of parseList(value)) {
    const [name, raw] = pair.split('=', 2).map(s => s.trim());
    const ms = parseInt(raw ?? '', 10);
    if (!name || isNaN(ms) || ms < 1) {
      console.error(`Invalid TOOL_TIMEOUT_OVERRIDES entry "${pair}", ignoring`);
      continue;
    }
    overrides[name] = ms;
  }
  return overrides;
}

export type LlmProviderName = 'ollama' | 'openai_compat';

function parseProvider(value: string | undefined): LlmProviderName {
  const provider = strEnv(value, 'ollama').toLowerCase();
  if (provider === 'ollama' || provider === 'openai_compat') return provider;
  console.error(`Invalid LLM_PROVIDER "${value}", using default ollama`);
  return 'ollama';
}

export function loadEnv(source: EnvSource = process.env) {
  return {
    // Server
    PORT: parsePort(source.PORT, 8000),
    HOST: strEnv(source.HOST, '127.0.0.1'),
    NODE_ENV: strEnv(source.NODE_ENV, 'development'),
    CORS_ORIGINS: parseList(source.CORS_ORIGINS, ['http://localhost:5173', 'http://127.0.0.1:5173']),

    // Language model backend
    LLM_PROVIDER: parseProvider(source.LLM_PROVIDER),
    OLLAMA_GPU_URL: strEnv(source.OLLAMA_GPU_URL, 'http://ollama-gpu:11434'),
    OLLAMA_CPU_URL: strEnv(source.OLLAMA_CPU_URL, 'http://ollama-cpu:11434'),
    OPENAI_COMPAT_BASE_URL: strEnv(source.OPENAI_COMPAT_BASE_URL),
    OPENAI_COMPAT_API_KEY: strEnv(source.OPENAI_COMPAT_API_KEY),
    LLM_TIMEOUT_MS: parseIntAtLeast(source.LLM_TIMEOUT_MS, 120_000, 1, 'LLM_TIMEOUT_MS'),

    // Model assignments per role
    LLM_MODEL: strEnv(source.LLM_MODEL, 'qwen3:30b'),
    VLM_MODEL: strEnv(source.VLM_MODEL, 'qwen3-vl:14b'),
    EMBEDDING_MODEL: strEnv(source.EMBEDDING_MODEL, 'qwen3-embedding'),
    RERANKER_MODEL: strEnv(source.RERANKER_MODEL, 'qwen3-reranker'),
    LLM_NUM_CTX: parseIntAtLeast(source.LLM_NUM_CTX, 16384, 1, 'LLM_NUM_CTX'),
    VLM_NUM_CTX: parseIntAtLeast(source.VLM_NUM_CTX, 16384, 1, 'VLM_NUM_CTX'),

    // Agent loop
    CHAT_MAX_TOOL_ITERATIONS: parseIntAtLeast(source.CHAT_MAX_TOOL_ITERATIONS, 5, 1, 'CHAT_MAX_TOOL_ITERATIONS'),
    TOOL_TIMEOUT_MS: parseIntAtLeast(source.TOOL_TIMEOUT_MS, 120_000, 1, 'TOOL_TIMEOUT_MS'),
    TOOL_TIMEOUT_OVERRIDES: parseTimeoutOverrides(source.TOOL_TIMEOUT_OVERRIDES),
    SKILLS_BASE_URL: strEnv(source.SKILLS_BASE_URL, 'http://skills:8080'),

    // GPU residency
    VRAM_SWAP_TIMEOUT_MS: parseIntAtLeast(source.VRAM_SWAP_TIMEOUT_MS, 90_000, 1, 'VRAM_SWAP_TIMEOUT_MS'),
    GPU_WARMUP_ENABLED: source.GPU_WARMUP_ENABLED !== 'false',

    // Web search (tool registered only when a key is present)
    WEB_SEARCH_API_KEY: strEnv(source.WEB_SEARCH_API_KEY),
    WEB_SEARCH_URL: strEnv(source.WEB_SEARCH_URL, 'https://google.serper.dev/search'),

    // Streaming
    STREAM_BUFFER_SIZE: parseIntAtLeast(source.STREAM_BUFFER_SIZE, 64, 1, 'STREAM_BUFFER_SIZE'),
    TOKEN_CHUNK_SIZE: parseIntAtLeast(source.TOKEN_CHUNK_SIZE, 8, 1, 'TOKEN_CHUNK_SIZE'),

    // Logging
    LOG_LEVEL: strEnv(source.LOG_LEVEL, 'info'),
  };
}

export type Env = ReturnType<typeof loadEnv>;

export const env: Env = loadEnv();

export function isProviderConfigured(provider: LlmProviderName, config: Env = env): boolean {
  switch (provider) {
    case 'ollama':
      return !!config.OLLAMA_GPU_URL;
    case 'openai_compat':
      return !!config.OPENAI_COMPAT_BASE_URL;
    default:
      return false;
  }
}

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '0.0.0.0', '[::1]']);

/** True when tool calls would be routed back into this server, which serves no /skills endpoints. */
export function skillsUrlPointsAtSelf(config: Pick<Env, 'SKILLS_BASE_URL' | 'HOST' | 'PORT'>): boolean {
  let url: URL;
  try {
    url = new URL(config.SKILLS_BASE_URL);
  } catch {
    return false;
  }
  const port = url.port ? parseInt(url.port, 10) : url.protocol === 'https:' ? 443 : 80;
  const sameHost = url.hostname === config.HOST || (LOOPBACK_HOSTS.has(url.hostname) && LOOPBACK_HOSTS.has(config.HOST));
  return sameHost && port === config.PORT;
}

// Log configuration on startup (redact secrets)
export function logConfiguration(config: Env = env) {
  console.log('Copilot API Configuration:');
  console.log(`  Environment: ${config.NODE_ENV}`);
  console.log(`  Server: ${config.HOST}:${config.PORT}`);
  console.log(`  LLM provider: ${config.LLM_PROVIDER} (configured: ${isProviderConfigured(config.LLM_PROVIDER, config)})`);
  console.log(`  Models: llm=${config.LLM_MODEL} vlm=${config.VLM_MODEL} embedding=${config.EMBEDDING_MODEL} reranker=${config.RERANKER_MODEL}`);
  console.log(`  Max tool iterations: ${config.CHAT_MAX_TOOL_ITERATIONS}`);
  console.log(`  Tool timeout: ${config.TOOL_TIMEOUT_MS}ms`);
  console.log(`  Skills: ${config.SKILLS_BASE_URL}`);
  if (skillsUrlPointsAtSelf(config)) {
    console.warn(`⚠️  SKILLS_BASE_URL points at this server (${config.HOST}:${config.PORT}); tool calls will fail`);
  }
  const overrides = Object.entries(config.TOOL_TIMEOUT_OVERRIDES);
  if (overrides.length > 0) {
    console.log(`  Tool timeout overrides: ${overrides.map(([name, ms]) => `${name}=${ms}ms`).join(', ')}`);
  }
  console.log(`  GPU swap timeout: ${config.VRAM_SWAP_TIMEOUT_MS}ms`);
  console.log(`  Web search enabled: ${!!config.WEB_SEARCH_API_KEY}`);
  if (config.OPENAI_COMPAT_API_KEY) {
    console.log('  OpenAI-compatible API key: set');
  }
}
