import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AppContext } from './context.js';

const ServerParamsSchema = z.object({ name: z.string().min(1) });

export async function registerToolRoutes(fastify: FastifyInstance, context: AppContext): Promise<void> {
  // Aggregated catalog the model sees
  fastify.get('/api/tools', async () => {
    return { success: true, data: context.tools.getDefinitions() };
  });

  fastify.get('/api/mcp/servers', async () => {
    return { success: true, data: context.mcp.getServers() };
  });

  // Bring a crashed or timed-out server back without restarting the service
  fastify.post('/api/mcp/servers/:name/restart', async (request) => {
    const { name } = ServerParamsSchema.parse(request.params);
    return { success: true, data: await context.mcp.restartServer(name) };
  });
}
