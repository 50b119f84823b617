import Fastify, { type FastifyBaseLogger, type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import type { ApiResponse } from '@relay-agent/shared';
import { toErrorPayload } from './agent/conversation-manager.js';
import { registerChatRoutes } from './api/chat.js';
import type { AppContext } from './api/context.js';
import { registerConversationRoutes } from './api/conversations.js';
import { registerToolRoutes } from './api/tools.js';
import { AgentError, ErrorCode } from './lib/errors.js';
import { createSilentLogger, type Logger } from './lib/logger.js';

export interface BuildAppOptions {
  logger?: Logger;
}

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.INVALID_REQUEST]: 400,
  [ErrorCode.CONVERSATION_NOT_FOUND]: 404,
  [ErrorCode.SERVER_NOT_FOUND]: 404,
  [ErrorCode.PROVIDER_ERROR]: 502,
  [ErrorCode.CONNECTION_FAILED]: 502,
  [ErrorCode.PROCESS_START_FAILED]: 502,
};

function isFastifyError(error: unknown): error is FastifyError {
  return error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number';
}

/**
 * HTTP status and body for an error thrown by a route.
 */
export function errorResponse(error: unknown): { status: number; body: ApiResponse<never> } {
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        success: false,
        error: { code: ErrorCode.INVALID_REQUEST, message: 'Invalid request', details: error.issues },
      },
    };
  }

  if (error instanceof AgentError) {
    return { status: STATUS_BY_CODE[error.code] ?? 500, body: { success: false, error: toErrorPayload(error) } };
  }

  // Body parsing and routing errors raised by Fastify itself
  if (isFastifyError(error) && error.statusCode !== undefined && error.statusCode < 500) {
    return {
      status: error.statusCode,
      body: { success: false, error: { code: ErrorCode.INVALID_REQUEST, message: error.message } },
    };
  }

  return { status: 500, body: { success: false, error: { code: ErrorCode.INTERNAL_ERROR, message: 'Internal server error' } } };
}

/**
 * Build the Fastify app over already-initialized services.
 */
export async function buildApp(context: AppContext, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = options.logger ?? createSilentLogger();
  const fastify = Fastify({ loggerInstance });

  await fastify.register(cors, {
    origin: true,
  });

  fastify.setErrorHandler((error, request, reply) => {
    const { status, body } = errorResponse(error);
    if (status >= 500) {
      request.log.error({ err: error }, 'Request failed');
    } else {
      request.log.info({ code: body.error?.code, message: body.error?.message }, 'Request rejected');
    }
    return reply.status(status).send(body);
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      success: false,
      error: { code: 'NOT_FOUND', message: `Route ${request.method}:${request.url} not found` },
    });
  });

  // Health check
  fastify.get('/health', async () => {
    const mcpServers = context.mcp.getServers();
    return {
      status: mcpServers.every((server) => server.connected) ? 'ok' : 'degraded',
      mcpServers,
      tools: context.tools.getDefinitions().length,
    };
  });

  await registerConversationRoutes(fastify, context);
  await registerChatRoutes(fastify, context);
  await registerToolRoutes(fastify, context);

  return fastify;
}
