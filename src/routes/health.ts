import type { FastifyPluginAsync } from 'fastify';
import type { ToolGateway } from '../services/gateway/tool-gateway.js';

export interface HealthRouteOptions {
  gateway: ToolGateway;
  /** Remote tool endpoint to probe; omitted when every tool runs locally */
  toolEndpoint?: string;
  version: string;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (server, options) => {
  // GET /v1/health - 'degraded' while the tool endpoint is unreachable
  server.get('/health', async () => {
    const toolEndpoint = options.toolEndpoint
      ? { url: options.toolEndpoint, reachable: await options.gateway.checkHealth(options.toolEndpoint) }
      : undefined;

    return {
      status: toolEndpoint && !toolEndpoint.reachable ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      version: options.version,
      toolEndpoint,
    };
  });
};
