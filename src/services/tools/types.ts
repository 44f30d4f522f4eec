// Tool system types and interfaces
// A tool is a named handler with a described input schema, optionally served by a remote endpoint

import type { ToolErrorKind } from '../../utils/errors.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type ToolArguments = Record<string, unknown>;

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description: string;
  required: boolean;
  enum?: string[]; // For enum types
  default?: JsonValue;
}

export type ExecutionSource = 'remote' | 'fallback' | 'local';

export interface ExecutionResult {
  status: 'ok' | 'error';
  output: string; // Result text, or a readable error message
  errorKind?: ToolErrorKind;
  metadata?: {
    durationMs?: number;
    source?: ExecutionSource;
    [key: string]: JsonValue | undefined;
  };
}

export type ToolHandler = (args: ToolArguments) => Promise<ExecutionResult>;

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameter[];
  /** Local implementation. For remote tools this is the fallback. */
  execute?: ToolHandler;
  /** JSON-RPC endpoint that serves this tool */
  endpoint?: string;
  /** Name of the tool on the remote endpoint, when it differs */
  remoteName?: string;
}

export function okResult(output: string, metadata?: ExecutionResult['metadata']): ExecutionResult {
  return metadata ? { status: 'ok', output, metadata } : { status: 'ok', output };
}

export function errorResult(
  errorKind: ToolErrorKind,
  output: string,
  metadata?: ExecutionResult['metadata'],
): ExecutionResult {
  return metadata ? { status: 'error', output, errorKind, metadata } : { status: 'error', output, errorKind };
}
