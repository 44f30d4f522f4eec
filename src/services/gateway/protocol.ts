// Tool-call wire protocol
// JSON-RPC 2.0 shaped envelopes exchanged with a tool endpoint

import { z } from 'zod';
import type { ToolArguments } from '../tools/types.js';

export const TOOLS_CALL_METHOD = 'tools/call';
export const TOOLS_LIST_METHOD = 'tools/list';

// JSON-RPC error codes used by the tool server
export const RpcErrorCode = {
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  TOOL_FAILED: -32000,
} as const;

export interface ToolCallRequest {
  jsonrpc: '2.0';
  id: number;
  method: typeof TOOLS_CALL_METHOD;
  params: {
    name: string;
    arguments: ToolArguments;
  };
}

export interface TextContent {
  type: 'text';
  text: string;
}

export interface RpcError {
  code: number;
  message: string;
}

export type ToolCallResponse =
  | { jsonrpc: '2.0'; id: number; result: { content: TextContent[] } }
  | { jsonrpc: '2.0'; id: number; error: RpcError };

export const RpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.number().int(),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

export const ToolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
});

const ContentPartSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
});

// Servers written against other stacks send the unused member as null
const ToolCallResponseSchema = z
  .object({
    jsonrpc: z.literal('2.0').optional(),
    id: z.number().int(),
    result: z.object({ content: z.array(ContentPartSchema) }).nullish(),
    error: z.object({ code: z.number().int(), message: z.string() }).nullish(),
  })
  .refine(envelope => (envelope.result == null) !== (envelope.error == null), {
    message: 'envelope must carry exactly one of result or error',
  });

export type ParsedToolResponse =
  | { kind: 'result'; id: number; text: string }
  | { kind: 'error'; id: number; error: RpcError };

export function buildToolCallRequest(id: number, name: string, args: ToolArguments): ToolCallRequest {
  return {
    jsonrpc: '2.0',
    id,
    method: TOOLS_CALL_METHOD,
    params: { name, arguments: args },
  };
}

/**
 * Validate a response body against the envelope shape.
 * Returns a reason string instead of throwing when the body is not a valid envelope.
 */
export function parseToolCallResponse(body: unknown): ParsedToolResponse | string {
  const parsed = ToolCallResponseSchema.safeParse(body);
  if (!parsed.success) {
    return parsed.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
  }

  const { id, result, error } = parsed.data;
  if (error) {
    return { kind: 'error', id, error };
  }

  const text = (result?.content ?? [])
    .filter(part => part.type === 'text' && typeof part.text === 'string')
    .map(part => part.text)
    .join('\n');

  return { kind: 'result', id, text };
}

export function textResponse(id: number, text: string): ToolCallResponse {
  return { jsonrpc: '2.0', id, result: { content: [{ type: 'text', text }] } };
}

export function errorResponse(id: number, code: number, message: string): ToolCallResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}
