// Composition root
// Builds the tool registry, gateway, agents and orchestrator from configuration

import { env } from './env.js';
import { createLogger, type Logger } from './utils/logger.js';
import { createProvider } from './providers/index.js';
import type { Provider } from './providers/types.js';
import { DataStore } from './services/database.js';
import { ToolRegistry } from './services/tools/registry.js';
import { createDatabaseTools } from './services/tools/database-tools.js';
import { calculatorTool } from './services/tools/calculator-tool.js';
import { scrapeWebpageTool, webSearchTool } from './services/tools/web-search-tool.js';
import { createCodeExecTool } from './services/tools/code-exec-tool.js';
import { SandboxExecutor } from './services/sandbox/sandbox-executor.js';
import { ToolGateway } from './services/gateway/tool-gateway.js';
import type { ToolTransport } from './services/gateway/http-transport.js';
import { AgentFactory } from './services/agents/factory.js';
import { createModelSpeakerDecision } from './services/agents/speaker-decision.js';
import { SpeakerSelector } from './services/orchestrator/speaker-selector.js';
import { Orchestrator } from './services/orchestrator/orchestrator.js';
import { createLoggingTracer } from './services/orchestrator/tracing.js';

export type RuntimeConfig = typeof env;

export interface RuntimeDependencies {
  logger?: Logger;
  provider?: Provider;
  transport?: ToolTransport;
}

export interface Runtime {
  config: RuntimeConfig;
  registry: ToolRegistry;
  gateway: ToolGateway;
  orchestrator: Orchestrator;
  close(): void;
}

export interface ToolServerRuntime {
  registry: ToolRegistry;
  gateway: ToolGateway;
  close(): void;
}

// Agents whose tools were not registered are left out
function enabledAgentNames(config: RuntimeConfig): string[] {
  const names = ['sql_specialist', 'data_analyst'];
  if (config.WEB_SEARCH_ENABLED) {
    names.splice(1, 0, 'web_researcher');
  }
  return names;
}

export function createRuntime(config: RuntimeConfig = env, deps: RuntimeDependencies = {}): Runtime {
  const logger = deps.logger ?? createLogger({ level: config.LOG_LEVEL });
  const registry = new ToolRegistry();

  // Local fallbacks always open the database read-only
  const store = new DataStore({ path: config.DATABASE_PATH, readonly: true });
  for (const tool of createDatabaseTools(store, { endpoint: config.MCP_SERVER_URL || undefined })) {
    registry.register(tool);
  }

  registry.register(calculatorTool);

  if (config.WEB_SEARCH_ENABLED) {
    registry.register(webSearchTool);
    registry.register(scrapeWebpageTool);
  }

  const sandbox = new SandboxExecutor({
    allowedModules: config.SANDBOX_ALLOWED_MODULES,
    timeoutMs: config.SANDBOX_TIMEOUT_MS,
    maxOutputLength: config.SANDBOX_MAX_OUTPUT,
    memoryMb: config.SANDBOX_MEMORY_MB,
    permissionModel: config.SANDBOX_PERMISSION_MODEL,
    logger,
  });
  registry.register(createCodeExecTool(sandbox, config.SANDBOX_ALLOWED_MODULES));

  const gateway = new ToolGateway({
    registry,
    logger,
    transport: deps.transport,
    timeoutMs: config.MCP_TIMEOUT_MS,
    localTimeoutMs: Math.max(config.MCP_TIMEOUT_MS, config.SANDBOX_TIMEOUT_MS * 2),
    useFallback: config.MCP_USE_FALLBACK,
  });

  const provider =
    deps.provider ??
    createProvider({ provider: config.LLM_PROVIDER, baseUrl: config.LLM_BASE_URL, apiKey: config.LLM_API_KEY });

  const factory = new AgentFactory({
    registry,
    provider,
    model: config.LLM_MODEL,
    temperature: config.LLM_TEMPERATURE,
    maxConsecutiveTurns: config.AGENT_MAX_CONSECUTIVE_REPLIES,
    logger,
  });

  const selector = new SpeakerSelector({
    decide: createModelSpeakerDecision({ provider, model: config.LLM_MODEL, logger }),
    logger,
    timeoutMs: config.LLM_TIMEOUT_MS,
  });

  const orchestrator = new Orchestrator({
    agents: factory.createDefaultAgents(enabledAgentNames(config)),
    gateway,
    selector,
    logger,
    maxRounds: config.ORCHESTRATOR_MAX_ROUNDS,
    agentTimeoutMs: config.AGENT_TIMEOUT_MS,
    tracer: config.TRACING_ENABLED ? createLoggingTracer(logger) : undefined,
  });

  return {
    config,
    registry,
    gateway,
    orchestrator,
    close: () => store.close(),
  };
}

/** Registry of the tool endpoint server: every tool runs locally */
export function createToolServerRuntime(config: RuntimeConfig = env, logger?: Logger): ToolServerRuntime {
  const log = logger ?? createLogger({ level: config.LOG_LEVEL });
  const registry = new ToolRegistry();

  const store = new DataStore({ path: config.DATABASE_PATH, readonly: config.MCP_READ_ONLY });
  for (const tool of createDatabaseTools(store)) {
    registry.register(tool);
  }
  registry.register(calculatorTool);

  const gateway = new ToolGateway({ registry, logger: log, localTimeoutMs: config.MCP_TIMEOUT_MS });

  return {
    registry,
    gateway,
    close: () => store.close(),
  };
}
