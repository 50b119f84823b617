import OpenAI from 'openai';
import { v4 as uuidv4 } from 'uuid';
import type { FinishReason, Message, StreamEvent, ToolCallRequest, ToolDefinition } from '@relay-agent/shared';
import { AgentError, ModelProviderError, errorMessage } from '../lib/errors.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import type { Completion, ModelClient, ModelProviderConfig, ModelRequestOptions } from './provider.js';
import { parseToolArguments } from './tool-arguments.js';

/**
 * The parts of a streamed chat completion chunk the reader looks at.
 */
export interface OpenAIStreamChunk {
  choices: Array<{
    delta?: {
      content?: string | null;
      tool_calls?: Array<{
        index: number;
        id?: string;
        function?: { name?: string; arguments?: string };
      }>;
    };
    finish_reason?: string | null;
  }>;
}

interface PendingToolCall {
  id: string;
  name: string;
  arguments: string;
}

export function toOpenAIMessages(messages: Message[]): OpenAI.Chat.ChatCompletionMessageParam[] {
  return messages.map((message): OpenAI.Chat.ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content ?? '' };
      case 'user':
        return { role: 'user', content: message.content ?? '' };
      case 'tool':
        return { role: 'tool', tool_call_id: message.tool_call_id ?? '', content: message.content ?? '' };
      case 'assistant':
        return {
          role: 'assistant',
          content: message.content,
          ...(message.tool_calls.length > 0 && {
            tool_calls: message.tool_calls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: JSON.stringify(call.arguments) },
            })),
          }),
        };
    }
  });
}

export function toOpenAITools(tools: ToolDefinition[]): OpenAI.Chat.ChatCompletionTool[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema,
    },
  }));
}

function toFinishReason(reason: string): FinishReason {
  switch (reason) {
    case 'stop':
    case 'tool_calls':
    case 'length':
      return reason;
    default:
      return 'other';
  }
}

/**
 * Fold a chat completion stream into StreamEvents. Tool calls arrive as
 * indexed deltas; their argument fragments are concatenated and parsed once
 * the stream ends.
 */
export async function* readOpenAIStream(chunks: AsyncIterable<OpenAIStreamChunk>): AsyncGenerator<StreamEvent> {
  const pending = new Map<number, PendingToolCall>();
  let finishReason: FinishReason = 'stop';

  for await (const chunk of chunks) {
    const choice = chunk.choices[0];
    if (!choice) continue;

    const delta = choice.delta;
    if (delta?.content) {
      yield { type: 'text_delta', text: delta.content };
    }

    for (const fragment of delta?.tool_calls ?? []) {
      let call = pending.get(fragment.index);
      if (!call) {
        call = { id: fragment.id ?? '', name: fragment.function?.name ?? '', arguments: '' };
        pending.set(fragment.index, call);
        yield { type: 'tool_call_start', index: fragment.index, id: call.id, name: call.name };
      } else {
        if (!call.id && fragment.id) call.id = fragment.id;
        if (!call.name && fragment.function?.name) call.name = fragment.function.name;
      }

      const argumentsDelta = fragment.function?.arguments;
      if (argumentsDelta) {
        call.arguments += argumentsDelta;
        yield { type: 'tool_call_delta', index: fragment.index, argumentsDelta };
      }
    }

    if (choice.finish_reason) {
      finishReason = toFinishReason(choice.finish_reason);
    }
  }

  const ordered = Array.from(pending.entries()).sort(([a], [b]) => a - b);
  for (const [index, call] of ordered) {
    // Gateways may omit ids; ids must stay unique within a conversation
    const id = call.id || `call_${uuidv4()}`;
    const toolCall: ToolCallRequest = {
      id,
      name: call.name,
      arguments: parseToolArguments(id, call.name, call.arguments),
    };
    yield { type: 'tool_call_complete', index, toolCall };
  }

  yield { type: 'turn_complete', finishReason: pending.size > 0 ? 'tool_calls' : finishReason };
}

/**
 * OpenAI LLM Provider
 * Also serves OpenAI-compatible gateways through `baseUrl`.
 */
export class OpenAIProvider implements ModelClient {
  readonly provider = 'openai';

  private client: OpenAI;
  private config: ModelProviderConfig;
  private logger: Logger;

  constructor(config: ModelProviderConfig, logger: Logger = rootLogger) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: config.maxRetries,
    });
    this.config = config;
    this.logger = logger.child({ component: 'OpenAIProvider' });
  }

  async complete(messages: Message[], tools: ToolDefinition[], options: ModelRequestOptions = {}): Promise<Completion> {
    const model = options.model || this.config.defaultModel;
    this.logger.debug({ model, messages: messages.length, tools: tools.length }, 'Completion request');

    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          model,
          messages: toOpenAIMessages(messages),
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
          tools: tools.length > 0 ? toOpenAITools(tools) : undefined,
        },
        { signal: options.signal },
      );
    } catch (error) {
      throw this.toProviderError(error);
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new ModelProviderError(this.provider, null, 'Model returned no choices');
    }

    const text = choice.message.content ?? '';
    const toolCalls = (choice.message.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: parseToolArguments(call.id, call.function.name, call.function.arguments),
    }));

    return toolCalls.length > 0 ? { type: 'tool_calls', text, toolCalls } : { type: 'final', text };
  }

  async *stream(
    messages: Message[],
    tools: ToolDefinition[],
    options: ModelRequestOptions = {},
  ): AsyncGenerator<StreamEvent> {
    const model = options.model || this.config.defaultModel;
    this.logger.debug({ model, messages: messages.length, tools: tools.length }, 'Streaming request');

    let chunks: AsyncIterable<OpenAI.Chat.ChatCompletionChunk>;
    try {
      chunks = await this.client.chat.completions.create(
        {
          model,
          messages: toOpenAIMessages(messages),
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
          tools: tools.length > 0 ? toOpenAITools(tools) : undefined,
          stream: true,
        },
        { signal: options.signal },
      );
    } catch (error) {
      yield { type: 'error', error: this.toProviderError(error) };
      return;
    }

    try {
      yield* readOpenAIStream(chunks);
    } catch (error) {
      yield { type: 'error', error: this.toProviderError(error) };
    }
  }

  private toProviderError(error: unknown): AgentError {
    if (error instanceof AgentError) {
      return error;
    }
    if (error instanceof OpenAI.APIError) {
      return new ModelProviderError(this.provider, error.status ?? null, error.message);
    }
    return new ModelProviderError(this.provider, null, errorMessage(error));
  }
}
