import type { FastifyInstance } from 'fastify';
import { ChatRequestSchema } from '@relay-agent/shared';
import { titleFromMessage } from '../agent/conversation-manager.js';
import { ConversationNotFoundError } from '../lib/errors.js';
import type { AppContext } from './context.js';
import { sendEventStream } from './sse.js';

/**
 * Single-call chat endpoint. Without `conversation_id` a conversation is
 * created and titled from the message.
 */
export async function registerChatRoutes(fastify: FastifyInstance, context: AppContext): Promise<void> {
  const { conversations } = context;

  fastify.post('/api/chat', async (request, reply) => {
    const body = ChatRequestSchema.parse(request.body);

    let conversationId = body.conversation_id;
    if (conversationId) {
      if (!(await conversations.getConversation(conversationId))) {
        throw new ConversationNotFoundError(conversationId);
      }
    } else {
      const conversation = await conversations.createConversation(titleFromMessage(body.message));
      conversationId = conversation.id;
    }

    const id = conversationId;
    if (body.stream) {
      await sendEventStream(request, reply, (signal) => conversations.streamChat(id, body.message, signal));
      return reply;
    }

    const result = await conversations.chat(id, body.message);
    return { success: true, data: result };
  });
}
