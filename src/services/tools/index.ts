// Tools Module - Main exports

export { ToolRegistry } from './registry.js';
export type { OpenAIFunctionDef, ParameterSchema } from './registry.js';
export { okResult, errorResult } from './types.js';
export type {
  ExecutionResult,
  ExecutionSource,
  JsonValue,
  ToolArguments,
  ToolDefinition,
  ToolHandler,
  ToolParameter,
} from './types.js';
export { calculatorTool } from './calculator-tool.js';
export { createCodeExecTool } from './code-exec-tool.js';
export { createDatabaseTools } from './database-tools.js';
export type { DatabaseToolOptions } from './database-tools.js';
export { scrapeWebpageTool, webSearchTool } from './web-search-tool.js';
