import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ConversationChatRequestSchema, CreateConversationRequestSchema } from '@relay-agent/shared';
import { ConversationNotFoundError } from '../lib/errors.js';
import type { AppContext } from './context.js';
import { sendEventStream } from './sse.js';

const ConversationParamsSchema = z.object({ id: z.string().min(1) });

export async function registerConversationRoutes(fastify: FastifyInstance, context: AppContext): Promise<void> {
  const { conversations } = context;

  // Create conversation
  fastify.post('/api/conversations', async (request, reply) => {
    const body = CreateConversationRequestSchema.parse(request.body ?? {});
    const conversation = await conversations.createConversation(body.title);
    return reply.status(201).send({ success: true, data: conversation });
  });

  // List conversations, most recently updated first
  fastify.get('/api/conversations', async () => {
    const summaries = await conversations.listConversations();
    return { success: true, data: summaries };
  });

  fastify.get('/api/conversations/:id', async (request) => {
    const { id } = ConversationParamsSchema.parse(request.params);
    const conversation = await conversations.getConversation(id);
    if (!conversation) {
      throw new ConversationNotFoundError(id);
    }
    return { success: true, data: conversation };
  });

  fastify.delete('/api/conversations/:id', async (request) => {
    const { id } = ConversationParamsSchema.parse(request.params);
    const deleted = await conversations.deleteConversation(id);
    if (!deleted) {
      throw new ConversationNotFoundError(id);
    }
    return { success: true, data: { deleted } };
  });

  // Chat within an existing conversation
  fastify.post('/api/conversations/:id/chat', async (request, reply) => {
    const { id } = ConversationParamsSchema.parse(request.params);
    const body = ConversationChatRequestSchema.parse(request.body);

    if (!(await conversations.getConversation(id))) {
      throw new ConversationNotFoundError(id);
    }

    if (body.stream) {
      await sendEventStream(request, reply, (signal) => conversations.streamChat(id, body.message.content, signal));
      return reply;
    }

    const result = await conversations.chat(id, body.message.content);
    return { success: true, data: result };
  });
}
