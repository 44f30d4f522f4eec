// Tool endpoint routes
// POST /mcp answers tools/call and tools/list envelopes; GET /health reports the server is up

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { ToolGateway } from '../services/gateway/tool-gateway.js';
import type { OpenAIFunctionDef, ToolRegistry } from '../services/tools/registry.js';
import {
  errorResponse,
  RpcErrorCode,
  RpcRequestSchema,
  textResponse,
  ToolCallParamsSchema,
  TOOLS_CALL_METHOD,
  TOOLS_LIST_METHOD,
  type ToolCallResponse,
} from '../services/gateway/protocol.js';

export interface ToolServerOptions {
  registry: ToolRegistry;
  /** Runs the registered handlers with the gateway's timeout and error capture */
  gateway: ToolGateway;
  /** Extra fields for the health response */
  health?: Record<string, string | number | boolean>;
}

export interface ToolListResponse {
  jsonrpc: '2.0';
  id: number;
  result: {
    tools: Array<{ name: string; description: string; inputSchema: OpenAIFunctionDef['parameters'] }>;
  };
}

const RequestIdSchema = z.object({ id: z.number().int() });

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export const toolServerRoutes: FastifyPluginAsync<ToolServerOptions> = async (server, options) => {
  const { registry, gateway } = options;

  server.post('/mcp', async (request): Promise<ToolCallResponse | ToolListResponse> => {
    const envelope = RpcRequestSchema.safeParse(request.body);
    if (!envelope.success) {
      // Echo the id when one was sent, so the caller can still match the reply
      const sent = RequestIdSchema.safeParse(request.body);
      return errorResponse(
        sent.success ? sent.data.id : 0,
        RpcErrorCode.INVALID_REQUEST,
        `Invalid Request: ${describeIssues(envelope.error)}`,
      );
    }

    const { id, method, params } = envelope.data;

    if (method === TOOLS_LIST_METHOD) {
      return {
        jsonrpc: '2.0',
        id,
        result: {
          tools: registry.toOpenAIFunctions().map(fn => ({
            name: fn.name,
            description: fn.description,
            inputSchema: fn.parameters,
          })),
        },
      };
    }

    if (method !== TOOLS_CALL_METHOD) {
      return errorResponse(id, RpcErrorCode.METHOD_NOT_FOUND, `Method not found: ${method}`);
    }

    const call = ToolCallParamsSchema.safeParse(params ?? {});
    if (!call.success) {
      return errorResponse(id, RpcErrorCode.INVALID_PARAMS, `Invalid params: ${describeIssues(call.error)}`);
    }

    const { name, arguments: args } = call.data;
    if (!registry.has(name)) {
      return errorResponse(id, RpcErrorCode.INVALID_PARAMS, `Unknown tool: ${name}`);
    }

    const result = await gateway.call(name, args);
    request.log.info({ tool: name, id, status: result.status, durationMs: result.metadata?.durationMs }, 'Tool call');

    if (result.status === 'ok') {
      return textResponse(id, result.output);
    }
    const code = result.errorKind === 'ValidationError' ? RpcErrorCode.INVALID_PARAMS : RpcErrorCode.TOOL_FAILED;
    return errorResponse(id, code, result.output);
  });

  server.get('/health', async () => {
    return {
      status: 'healthy',
      ...options.health,
      tools: registry.names(),
    };
  });
};
