// Agents API
// Port: 8000 (localhost by default)

// Load environment variables from .env file
import 'dotenv/config';

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { env, logConfiguration } from './env.js';
import { PRETTY_TRANSPORT } from './utils/logger.js';
import { createRuntime } from './runtime.js';
import { queryRoutes } from './routes/query.js';
import { healthRoutes } from './routes/health.js';

const VERSION = '1.0.0';

const server = Fastify({
  logger: {
    level: env.LOG_LEVEL,
    transport: env.NODE_ENV === 'production' ? undefined : PRETTY_TRANSPORT,
  },
});

const runtime = createRuntime(env);

// CORS for local chat front ends
await server.register(cors, {
  origin: [
    'http://localhost:3000',
    'http://127.0.0.1:3000',
    'http://localhost:8501',
    'http://127.0.0.1:8501',
  ],
  credentials: true,
});

// API routes
await server.register(healthRoutes, {
  prefix: '/v1',
  gateway: runtime.gateway,
  toolEndpoint: env.MCP_SERVER_URL || undefined,
  version: VERSION,
});
await server.register(queryRoutes, {
  prefix: '/v1',
  orchestrator: runtime.orchestrator,
  gateway: runtime.gateway,
});

// Legacy redirect
server.get('/health', async (request, reply) => {
  return reply.code(301).redirect('/v1/health');
});

server.addHook('onClose', async () => {
  runtime.close();
});

// Start server
try {
  await server.listen({ port: env.PORT, host: env.HOST });
  console.log(`🤖 Agents API listening on http://${env.HOST}:${env.PORT}`);
  console.log(`📊 Health: http://${env.HOST}:${env.PORT}/v1/health`);
  console.log(`👥 Agents: ${runtime.orchestrator.agentNames.join(', ')}`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
