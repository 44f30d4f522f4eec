// Query routes
// Natural-language questions in, multi-agent conversation results out

import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { z } from 'zod';
import { AppError, formatErrorResponse } from '../utils/errors.js';
import type { Orchestrator } from '../services/orchestrator/orchestrator.js';
import type { ExecuteResult } from '../services/orchestrator/types.js';
import type { ToolGateway } from '../services/gateway/tool-gateway.js';

export interface QueryRouteOptions {
  orchestrator: Orchestrator;
  gateway: ToolGateway;
}

const MAX_QUERY_LENGTH = 10_000;

const QuerySchema = z.object({
  query: z.string().trim().min(1, 'Query is required').max(MAX_QUERY_LENGTH),
});

const ChatSchema = z.object({
  messages: z
    .array(
      z.object({
        role: z.string().default('user'),
        content: z.string().default(''),
      }),
    )
    .min(1, 'No messages provided'),
});

export const NO_ANSWER_MESSAGE = 'No answer was produced.';

function sendError(reply: FastifyReply, error: AppError) {
  return reply.code(error.statusCode).send(formatErrorResponse(error));
}

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'Invalid request body';
}

// The answer, or the system message that ended the conversation
function replyText(result: ExecuteResult): string {
  if (result.output) return result.output;
  const last = result.conversation[result.conversation.length - 1];
  return last?.role === 'system' ? last.content : NO_ANSWER_MESSAGE;
}

export const queryRoutes: FastifyPluginAsync<QueryRouteOptions> = async (server, options) => {
  const { orchestrator, gateway } = options;

  // POST /v1/query - Run a conversation for one question
  server.post('/query', async (request, reply) => {
    const parsed = QuerySchema.safeParse(request.body);
    if (!parsed.success) {
      return sendError(reply, AppError.badRequest(firstIssue(parsed.error)));
    }

    const { query } = parsed.data;
    const result = await orchestrator.execute(query);

    return {
      success: result.terminationReason !== 'error',
      input: query,
      ...result,
    };
  });

  // POST /v1/chat - Chat-style clients; the last user message is the question
  server.post('/chat', async (request, reply) => {
    const parsed = ChatSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendError(reply, AppError.badRequest(firstIssue(parsed.error)));
    }

    const lastUser = [...parsed.data.messages].reverse().find(message => message.role === 'user');
    const query = lastUser?.content.trim() ?? '';
    if (!query) {
      return sendError(reply, AppError.badRequest('Empty message'));
    }

    const result = await orchestrator.execute(query);
    return { type: 'message', content: replyText(result) };
  });

  // GET /v1/schema - Database schema through the tool gateway
  server.get('/schema', async (request, reply) => {
    const result = await gateway.call('get_database_schema', {});
    if (result.status === 'error') {
      request.log.warn({ errorKind: result.errorKind, error: result.output }, 'Schema lookup failed');
      return sendError(reply, AppError.unavailable(result.output));
    }
    return { schema: result.output };
  });
};
