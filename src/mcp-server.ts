// Tool endpoint server
// Serves the database tools and the calculator over the JSON-RPC tool protocol
// Port: 8080 (localhost by default)

// Load environment variables from .env file
import 'dotenv/config';

import Fastify from 'fastify';
import { env } from './env.js';
import { PRETTY_TRANSPORT } from './utils/logger.js';
import { createToolServerRuntime } from './runtime.js';
import { toolServerRoutes } from './mcp/server.js';

const server = Fastify({
  logger: {
    level: env.LOG_LEVEL,
    transport: env.NODE_ENV === 'production' ? undefined : PRETTY_TRANSPORT,
  },
});

const runtime = createToolServerRuntime(env);

await server.register(toolServerRoutes, {
  registry: runtime.registry,
  gateway: runtime.gateway,
  health: { databasePath: env.DATABASE_PATH, readOnly: env.MCP_READ_ONLY },
});

server.addHook('onClose', async () => {
  runtime.close();
});

try {
  await server.listen({ port: env.MCP_PORT, host: env.MCP_HOST });
  console.log(`🛠️  Tool server listening on http://${env.MCP_HOST}:${env.MCP_PORT}/mcp`);
  console.log(`   Tools: ${runtime.registry.names().join(', ')}`);
  console.log(`   Database: ${env.DATABASE_PATH} (read-only: ${env.MCP_READ_ONLY})`);
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
