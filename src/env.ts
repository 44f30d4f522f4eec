// Environment configuration for the agents API and the tool server
// Every setting comes from environment variables; components receive them as explicit options

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseNumber(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

const NODE_ENV = process.env.NODE_ENV || 'development';

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8000),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV,

  // Language model (OpenAI-compatible chat completions, Ollama by default)
  LLM_PROVIDER: strEnv(process.env.LLM_PROVIDER, 'ollama').toLowerCase(),
  LLM_BASE_URL: strEnv(process.env.LLM_BASE_URL, 'http://localhost:11434/v1'),
  LLM_MODEL: strEnv(process.env.LLM_MODEL, 'qwen2.5-coder:7b-instruct-q4_K_M'),
  LLM_API_KEY: strEnv(process.env.LLM_API_KEY, 'ollama'),
  LLM_TEMPERATURE: parseNumber(process.env.LLM_TEMPERATURE, 0, 'LLM_TEMPERATURE'),
  LLM_TIMEOUT_MS: parsePositiveInt(process.env.LLM_TIMEOUT_MS, 120_000, 'LLM_TIMEOUT_MS'),

  // Remote tool endpoint
  MCP_SERVER_URL: strEnv(process.env.MCP_SERVER_URL, 'http://localhost:8080/mcp'),
  MCP_TIMEOUT_MS: parsePositiveInt(process.env.MCP_TIMEOUT_MS, 30_000, 'MCP_TIMEOUT_MS'),
  MCP_USE_FALLBACK: process.env.MCP_USE_FALLBACK !== 'false', // Default true
  MCP_PORT: parsePort(process.env.MCP_PORT, 8080),
  MCP_HOST: process.env.MCP_HOST || '127.0.0.1',
  MCP_READ_ONLY: process.env.MCP_READ_ONLY !== 'false',

  // Data store
  DATABASE_PATH: strEnv(process.env.DATABASE_PATH, './data/ecommerce.db'),

  // Orchestration
  ORCHESTRATOR_MAX_ROUNDS: parsePositiveInt(process.env.ORCHESTRATOR_MAX_ROUNDS, 10, 'ORCHESTRATOR_MAX_ROUNDS'),
  AGENT_MAX_CONSECUTIVE_REPLIES: parsePositiveInt(
    process.env.AGENT_MAX_CONSECUTIVE_REPLIES,
    10,
    'AGENT_MAX_CONSECUTIVE_REPLIES',
  ),
  AGENT_TIMEOUT_MS: parsePositiveInt(process.env.AGENT_TIMEOUT_MS, 120_000, 'AGENT_TIMEOUT_MS'),

  // Code sandbox
  SANDBOX_TIMEOUT_MS: parsePositiveInt(process.env.SANDBOX_TIMEOUT_MS, 5000, 'SANDBOX_TIMEOUT_MS'),
  SANDBOX_MAX_OUTPUT: parsePositiveInt(process.env.SANDBOX_MAX_OUTPUT, 5000, 'SANDBOX_MAX_OUTPUT'),
  SANDBOX_MEMORY_MB: parsePositiveInt(process.env.SANDBOX_MEMORY_MB, 128, 'SANDBOX_MEMORY_MB'),
  SANDBOX_ALLOWED_MODULES: (process.env.SANDBOX_ALLOWED_MODULES ?? 'mathjs')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),
  SANDBOX_PERMISSION_MODEL: process.env.SANDBOX_PERMISSION_MODEL !== 'false',

  // Features
  WEB_SEARCH_ENABLED: process.env.WEB_SEARCH_ENABLED !== 'false',
  TRACING_ENABLED: process.env.TRACING_ENABLED !== 'false',

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || (NODE_ENV === 'test' ? 'silent' : 'info'),
};

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  console.log('Agents API Configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  LLM: ${env.LLM_PROVIDER} ${env.LLM_MODEL} @ ${env.LLM_BASE_URL}`);
  console.log(`  Tool endpoint: ${env.MCP_SERVER_URL} (timeout ${env.MCP_TIMEOUT_MS}ms)`);
  console.log(`  Local fallback: ${env.MCP_USE_FALLBACK}`);
  console.log(`  Database: ${env.DATABASE_PATH}`);
  console.log(`  Max rounds: ${env.ORCHESTRATOR_MAX_ROUNDS}`);
  console.log(`  Sandbox modules: ${env.SANDBOX_ALLOWED_MODULES.join(', ') || 'none'}`);
  if (!env.SANDBOX_PERMISSION_MODEL) {
    console.log('  ⚠️  Sandbox permission model DISABLED - code runs with full file system access');
  }
  console.log(`  Web search enabled: ${env.WEB_SEARCH_ENABLED}`);
  console.log(`  Tracing enabled: ${env.TRACING_ENABLED}`);
}
