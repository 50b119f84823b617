import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ChatStreamEvent } from '@relay-agent/shared';
import { toErrorPayload } from '../agent/conversation-manager.js';

/**
 * Write chat events as a `text/event-stream` response, one `data:` frame per
 * event. A client disconnect aborts the signal handed to `produce`.
 */
export async function sendEventStream(
  request: FastifyRequest,
  reply: FastifyReply,
  produce: (signal: AbortSignal) => AsyncIterable<ChatStreamEvent>,
): Promise<void> {
  const controller = new AbortController();

  reply.hijack();
  reply.raw.writeHead(200, {
    ...reply.getHeaders(),
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
  });

  reply.raw.on('close', () => {
    if (!reply.raw.writableEnded) {
      request.log.info('Client disconnected; cancelling turn');
      controller.abort();
    }
  });

  try {
    for await (const event of produce(controller.signal)) {
      if (controller.signal.aborted) {
        break;
      }
      reply.raw.write(`data: ${JSON.stringify(event)}\n\n`);
    }
  } catch (error) {
    request.log.error({ err: error }, 'Chat stream failed');
    const frame: ChatStreamEvent = { type: 'error', ...toErrorPayload(error) };
    reply.raw.write(`data: ${JSON.stringify(frame)}\n\n`);
  } finally {
    reply.raw.end();
  }
}
