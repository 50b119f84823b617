import Anthropic from '@anthropic-ai/sdk';
import type { FinishReason, Message, StreamEvent, ToolCallRequest, ToolDefinition } from '@relay-agent/shared';
import { AgentError, ModelProviderError, ToolCallParseError, errorMessage } from '../lib/errors.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import type { Completion, ModelClient, ModelProviderConfig, ModelRequestOptions } from './provider.js';
import { isRecord, parseToolArguments } from './tool-arguments.js';

const DEFAULT_MAX_TOKENS = 4096;

/**
 * The parts of a raw message stream event the reader looks at.
 */
export type AnthropicStreamEvent =
  | { type: 'message_start' }
  | {
      type: 'content_block_start';
      index: number;
      content_block: { type: string; id?: string; name?: string; text?: string };
    }
  | { type: 'content_block_delta'; index: number; delta: { type: string; text?: string; partial_json?: string } }
  | { type: 'content_block_stop'; index: number }
  | { type: 'message_delta'; delta: { stop_reason?: string | null } }
  | { type: 'message_stop' };

interface PendingToolUse {
  id: string;
  name: string;
  json: string;
}

/**
 * Convert the conversation to Anthropic's shape. The system prompt moves to
 * its own parameter, tool results become `tool_result` blocks inside a user
 * turn, and adjacent user-side messages are merged so turns alternate.
 */
export function convertMessages(messages: Message[]): {
  system: string | undefined;
  messages: Anthropic.Messages.MessageParam[];
} {
  let system: string | undefined;
  const converted: Anthropic.Messages.MessageParam[] = [];

  const pushUserBlocks = (blocks: Anthropic.Messages.ContentBlockParam[]) => {
    const last = converted[converted.length - 1];
    if (last && last.role === 'user') {
      const existing: Anthropic.Messages.ContentBlockParam[] =
        typeof last.content === 'string' ? [{ type: 'text', text: last.content }] : last.content;
      last.content = [...existing, ...blocks];
      return;
    }
    converted.push({ role: 'user', content: blocks });
  };

  for (const message of messages) {
    switch (message.role) {
      case 'system':
        if (message.content) {
          system = system ? `${system}\n\n${message.content}` : message.content;
        }
        break;
      case 'user':
        pushUserBlocks([{ type: 'text', text: message.content ?? '' }]);
        break;
      case 'tool':
        pushUserBlocks([
          { type: 'tool_result', tool_use_id: message.tool_call_id ?? '', content: message.content ?? '' },
        ]);
        break;
      case 'assistant': {
        const blocks: Anthropic.Messages.ContentBlockParam[] = [];
        if (message.content) {
          blocks.push({ type: 'text', text: message.content });
        }
        for (const call of message.tool_calls) {
          blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
        }
        // An empty assistant turn is rejected by the API; the user turns
        // around it merge instead.
        if (blocks.length > 0) {
          converted.push({ role: 'assistant', content: blocks });
        }
        break;
      }
    }
  }

  return { system, messages: converted };
}

export function toAnthropicTools(tools: ToolDefinition[]): Anthropic.Messages.Tool[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: { ...tool.inputSchema, type: 'object' as const },
  }));
}

function toFinishReason(stopReason: string): FinishReason {
  switch (stopReason) {
    case 'end_turn':
    case 'stop_sequence':
      return 'stop';
    case 'tool_use':
      return 'tool_calls';
    case 'max_tokens':
      return 'length';
    default:
      return 'other';
  }
}

/**
 * Fold a raw message stream into StreamEvents. A tool_use block's
 * `input_json_delta` fragments are concatenated and parsed at its
 * `content_block_stop`.
 */
export async function* readAnthropicStream(events: AsyncIterable<AnthropicStreamEvent>): AsyncGenerator<StreamEvent> {
  const pending = new Map<number, PendingToolUse>();
  let finishReason: FinishReason = 'stop';

  for await (const event of events) {
    switch (event.type) {
      case 'content_block_start': {
        const block = event.content_block;
        if (block.type === 'tool_use') {
          const toolUse = { id: block.id ?? '', name: block.name ?? '', json: '' };
          pending.set(event.index, toolUse);
          yield { type: 'tool_call_start', index: event.index, id: toolUse.id, name: toolUse.name };
        } else if (block.type === 'text' && block.text) {
          yield { type: 'text_delta', text: block.text };
        }
        break;
      }
      case 'content_block_delta': {
        const delta = event.delta;
        if (delta.type === 'text_delta' && delta.text) {
          yield { type: 'text_delta', text: delta.text };
        } else if (delta.type === 'input_json_delta' && delta.partial_json) {
          const toolUse = pending.get(event.index);
          if (toolUse) {
            toolUse.json += delta.partial_json;
            yield { type: 'tool_call_delta', index: event.index, argumentsDelta: delta.partial_json };
          }
        }
        break;
      }
      case 'content_block_stop': {
        const toolUse = pending.get(event.index);
        if (toolUse) {
          pending.delete(event.index);
          const toolCall: ToolCallRequest = {
            id: toolUse.id,
            name: toolUse.name,
            arguments: parseToolArguments(toolUse.id, toolUse.name, toolUse.json),
          };
          yield { type: 'tool_call_complete', index: event.index, toolCall };
        }
        break;
      }
      case 'message_delta':
        if (event.delta.stop_reason) {
          finishReason = toFinishReason(event.delta.stop_reason);
        }
        break;
      case 'message_start':
      case 'message_stop':
        break;
    }
  }

  yield { type: 'turn_complete', finishReason };
}

/**
 * Anthropic Claude LLM Provider
 * Uses Anthropic's Messages API with native tool support
 */
export class AnthropicProvider implements ModelClient {
  readonly provider = 'anthropic';

  private client: Anthropic;
  private config: ModelProviderConfig;
  private logger: Logger;

  constructor(config: ModelProviderConfig, logger: Logger = rootLogger) {
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: config.maxRetries,
    });
    this.config = config;
    this.logger = logger.child({ component: 'AnthropicProvider' });
  }

  async complete(messages: Message[], tools: ToolDefinition[], options: ModelRequestOptions = {}): Promise<Completion> {
    const model = options.model || this.config.defaultModel;
    const { system, messages: converted } = convertMessages(messages);
    this.logger.debug({ model, messages: converted.length, tools: tools.length }, 'Completion request');

    let response: Anthropic.Messages.Message;
    try {
      response = await this.client.messages.create(
        {
          model,
          max_tokens: this.config.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: this.config.temperature,
          system,
          messages: converted,
          tools: tools.length > 0 ? toAnthropicTools(tools) : undefined,
        },
        { signal: options.signal },
      );
    } catch (error) {
      throw this.toProviderError(error);
    }

    let text = '';
    const toolCalls: ToolCallRequest[] = [];

    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      } else if (block.type === 'tool_use') {
        if (!isRecord(block.input)) {
          throw new ToolCallParseError(block.id, block.name, JSON.stringify(block.input), 'arguments must be a JSON object');
        }
        toolCalls.push({ id: block.id, name: block.name, arguments: block.input });
      }
    }

    if (toolCalls.length > 0) {
      this.logger.debug({ tools: toolCalls.map((call) => call.name) }, 'Tool calls requested');
      return { type: 'tool_calls', text, toolCalls };
    }
    return { type: 'final', text };
  }

  async *stream(
    messages: Message[],
    tools: ToolDefinition[],
    options: ModelRequestOptions = {},
  ): AsyncGenerator<StreamEvent> {
    const model = options.model || this.config.defaultModel;
    const { system, messages: converted } = convertMessages(messages);
    this.logger.debug({ model, messages: converted.length, tools: tools.length }, 'Streaming request');

    let events: AsyncIterable<Anthropic.Messages.RawMessageStreamEvent>;
    try {
      events = await this.client.messages.create(
        {
          model,
          max_tokens: this.config.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: this.config.temperature,
          system,
          messages: converted,
          tools: tools.length > 0 ? toAnthropicTools(tools) : undefined,
          stream: true,
        },
        { signal: options.signal },
      );
    } catch (error) {
      yield { type: 'error', error: this.toProviderError(error) };
      return;
    }

    try {
      yield* readAnthropicStream(events);
    } catch (error) {
      yield { type: 'error', error: this.toProviderError(error) };
    }
  }

  private toProviderError(error: unknown): AgentError {
    if (error instanceof AgentError) {
      return error;
    }
    if (error instanceof Anthropic.APIError) {
      return new ModelProviderError(this.provider, error.status ?? null, error.message);
    }
    return new ModelProviderError(this.provider, null, errorMessage(error));
  }
}
