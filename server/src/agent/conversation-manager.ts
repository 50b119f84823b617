import type {
  ChatResult,
  ChatStreamEvent,
  Conversation,
  ConversationSummary,
  Message,
  ToolCallRequest,
  ToolDefinition,
} from '@relay-agent/shared';
import type { Completion, ModelClient } from '../ai/provider.js';
import type { ToolRegistry } from '../mcp/tool-registry.js';
import type { ConversationStore } from '../storage/interface.js';
import { AsyncQueue } from '../lib/async-queue.js';
import {
  AgentError,
  CancelledError,
  ConversationNotFoundError,
  ErrorCode,
  TimeoutError,
  ToolCallParseError,
  UnknownToolError,
  errorMessage,
} from '../lib/errors.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import { KeyedMutex } from './keyed-mutex.js';
import { DEGRADED_ANSWER, SYSTEM_PROMPT, argumentsCorrectionNote } from './prompts.js';
import { redactCardNumbers, sanitizeMessage } from './sanitizer.js';

export const DEFAULT_MAX_ITERATIONS = 8;

const DEFAULT_TITLE = 'New conversation';
const TITLE_LENGTH = 50;

export interface ConversationManagerOptions {
  model: ModelClient;
  tools: ToolRegistry;
  store: ConversationStore;
  logger?: Logger;
  /** Model calls allowed per turn. */
  maxIterations?: number;
  systemPrompt?: string;
}

interface TurnContext {
  streaming: boolean;
  emit: (event: ChatStreamEvent) => void;
  signal?: AbortSignal;
}

/**
 * Derive a conversation title from the first user message.
 */
export function titleFromMessage(content: string): string {
  const flat = redactCardNumbers(content).replace(/\s+/g, ' ').trim();
  if (!flat) {
    return DEFAULT_TITLE;
  }
  return flat.length > TITLE_LENGTH ? `${flat.slice(0, TITLE_LENGTH - 3)}...` : flat;
}

/**
 * Map any error to the `{code, message}` pair sent to clients.
 */
export function toErrorPayload(error: unknown): { code: string; message: string } {
  if (error instanceof AgentError) {
    return { code: error.code, message: error.message };
  }
  return { code: ErrorCode.INTERNAL_ERROR, message: errorMessage(error) };
}

/**
 * Conversation Manager
 * Runs the agent loop for a conversation: ask the model, dispatch the tool
 * calls it requests, feed the results back, repeat until a final answer or
 * the iteration cap. Turns on the same conversation run one at a time.
 */
export class ConversationManager {
  private readonly model: ModelClient;
  private readonly tools: ToolRegistry;
  private readonly store: ConversationStore;
  private readonly logger: Logger;
  private readonly maxIterations: number;
  private readonly systemPrompt: string;
  private readonly locks = new KeyedMutex();

  constructor(options: ConversationManagerOptions) {
    this.model = options.model;
    this.tools = options.tools;
    this.store = options.store;
    this.logger = (options.logger ?? rootLogger).child({ component: 'ConversationManager' });
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
  }

  async createConversation(title: string = DEFAULT_TITLE): Promise<Conversation> {
    const conversation = await this.store.create(title);
    this.logger.info({ conversationId: conversation.id, title }, 'Created conversation');
    return conversation;
  }

  listConversations(): Promise<ConversationSummary[]> {
    return this.store.list();
  }

  getConversation(id: string): Promise<Conversation | null> {
    return this.store.get(id);
  }

  async deleteConversation(id: string): Promise<boolean> {
    return this.locks.run(id, async () => {
      const deleted = await this.store.delete(id);
      if (deleted) {
        this.logger.info({ conversationId: id }, 'Deleted conversation');
      }
      return deleted;
    });
  }

  /**
   * Run one turn and return the final answer.
   */
  async chat(conversationId: string, content: string, signal?: AbortSignal): Promise<ChatResult> {
    return this.locks.run(conversationId, () =>
      this.runTurn(conversationId, content, { streaming: false, emit: () => {}, signal }),
    );
  }

  /**
   * Run one turn, yielding text deltas and tool activity as they happen.
   * The stream ends with `done` or `error`.
   *
   * Stopping iteration (or aborting `signal`) cancels the turn: the model
   * request is aborted and no new model call or dispatch starts, but tool
   * calls already dispatched finish and their round is persisted.
   */
  async *streamChat(conversationId: string, content: string, signal?: AbortSignal): AsyncGenerator<ChatStreamEvent> {
    const queue = new AsyncQueue<ChatStreamEvent>();
    const controller = new AbortController();
    const onAbort = () => controller.abort();

    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    const context: TurnContext = {
      streaming: true,
      signal: controller.signal,
      emit: (event) => {
        if (!controller.signal.aborted) {
          queue.push(event);
        }
      },
    };

    const turn = this.locks.run(conversationId, () => this.runTurn(conversationId, content, context)).then(
      (result) => {
        queue.push({ type: 'done', ...result });
        queue.close();
      },
      (error: unknown) => {
        if (!(error instanceof CancelledError)) {
          this.logger.error({ err: error, conversationId }, 'Turn failed');
        }
        queue.push({ type: 'error', ...toErrorPayload(error) });
        queue.close();
      },
    );

    try {
      for await (const event of queue) {
        yield event;
      }
    } finally {
      controller.abort();
      signal?.removeEventListener('abort', onAbort);
      await turn;
    }
  }

  private async runTurn(conversationId: string, content: string, context: TurnContext): Promise<ChatResult> {
    const { signal } = context;
    this.throwIfAborted(signal);

    const conversation = await this.store.get(conversationId);
    if (!conversation) {
      throw new ConversationNotFoundError(conversationId);
    }

    this.logger.info(
      { conversationId, history: conversation.messages.length, streaming: context.streaming },
      'Starting turn',
    );

    if (conversation.messages.length === 0) {
      conversation.messages.push(this.message('system', this.systemPrompt));
    }
    conversation.messages.push(this.message('user', content));
    await this.persist(conversation);

    const definitions = this.tools.getDefinitions();
    let correction: Message | null = null;

    for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
      this.throwIfAborted(signal);

      const request = correction ? [...conversation.messages, correction] : conversation.messages;
      correction = null;

      let round: Completion;
      try {
        round = await this.callModel(request, definitions, context);
      } catch (error) {
        this.throwIfAborted(signal);
        if (error instanceof ToolCallParseError) {
          this.logger.warn(
            { conversationId, iteration, tool: error.toolName, reason: error.reason },
            'Model produced malformed tool arguments; asking again',
          );
          correction = this.message('user', argumentsCorrectionNote(error.toolName, error.reason));
          continue;
        }
        throw error;
      }

      // A round that finished after cancellation is discarded
      this.throwIfAborted(signal);

      if (round.type === 'final') {
        conversation.messages.push(sanitizeMessage(this.message('assistant', round.text)));
        await this.persist(conversation);
        this.logger.info({ conversationId, iterations: iteration }, 'Turn complete');
        return { conversationId, content: round.text, degraded: false };
      }

      conversation.messages.push({
        role: 'assistant',
        content: round.text || null,
        tool_calls: round.toolCalls,
      });

      this.logger.info(
        { conversationId, iteration, tools: round.toolCalls.map((call) => call.name) },
        'Dispatching tool calls',
      );
      const results = await Promise.all(round.toolCalls.map((call) => this.executeToolCall(call, context)));
      conversation.messages.push(...results);
      await this.persist(conversation);
    }

    this.logger.warn({ conversationId, maxIterations: this.maxIterations }, 'Iteration cap reached');
    conversation.messages.push(this.message('assistant', DEGRADED_ANSWER));
    await this.persist(conversation);
    context.emit({ type: 'text_delta', text: DEGRADED_ANSWER });
    return { conversationId, content: DEGRADED_ANSWER, degraded: true };
  }

  private async callModel(messages: Message[], tools: ToolDefinition[], context: TurnContext): Promise<Completion> {
    if (!context.streaming) {
      return this.model.complete(messages, tools, { signal: context.signal });
    }

    let text = '';
    const toolCalls: ToolCallRequest[] = [];

    for await (const event of this.model.stream(messages, tools, { signal: context.signal })) {
      switch (event.type) {
        case 'text_delta':
          text += event.text;
          context.emit({ type: 'text_delta', text: event.text });
          break;
        case 'tool_call_complete':
          toolCalls.push(event.toolCall);
          break;
        case 'error':
          throw event.error;
        default:
          break;
      }
    }

    return toolCalls.length > 0 ? { type: 'tool_calls', text, toolCalls } : { type: 'final', text };
  }

  /**
   * Dispatch one tool call. Never rejects: failures become the content of
   * the tool message so the model can react to them.
   */
  private async executeToolCall(call: ToolCallRequest, context: TurnContext): Promise<Message> {
    context.emit({ type: 'tool_call', toolCall: call });

    let content: string;
    let isError = false;
    try {
      const result = await this.tools.dispatch(call);
      content = result.content;
    } catch (error) {
      isError = true;
      content = `Error: ${errorMessage(error)}`;

      if (error instanceof TimeoutError) {
        this.logger.warn({ tool: call.name, toolCallId: call.id, timeoutMs: error.timeoutMs }, 'Tool call timed out');
      } else if (error instanceof UnknownToolError) {
        this.logger.warn({ tool: call.name, toolCallId: call.id }, 'Model requested an unknown tool');
      } else {
        this.logger.error({ err: error, tool: call.name, toolCallId: call.id }, 'Tool call failed');
      }
    }

    const message = sanitizeMessage({
      role: 'tool',
      content,
      tool_calls: [],
      tool_call_id: call.id,
      name: call.name,
    });
    context.emit({ type: 'tool_result', toolCallId: call.id, name: call.name, content: message.content ?? '', isError });
    return message;
  }

  private async persist(conversation: Conversation): Promise<void> {
    conversation.messages = conversation.messages.map(sanitizeMessage);
    conversation.updatedAt = new Date().toISOString();
    await this.store.save(conversation);
  }

  private message(role: 'system' | 'user' | 'assistant', content: string): Message {
    return { role, content, tool_calls: [] };
  }

  private throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new CancelledError('Chat turn');
    }
  }
}
