import type { Message, StreamEvent, ToolCallRequest, ToolDefinition } from '@relay-agent/shared';

export interface ModelRequestOptions {
  signal?: AbortSignal;
  model?: string;
}

/**
 * Result of a non-streaming model call.
 */
export type Completion =
  | { type: 'final'; text: string }
  | { type: 'tool_calls'; text: string; toolCalls: ToolCallRequest[] };

/**
 * Model client interface
 * One implementation per vendor; the conversation manager only sees this.
 */
export interface ModelClient {
  readonly provider: string;

  /**
   * Single request, whole answer. Fails with ModelProviderError or
   * ToolCallParseError.
   */
  complete(messages: Message[], tools: ToolDefinition[], options?: ModelRequestOptions): Promise<Completion>;

  /**
   * Streamed request. The generator is finite and not restartable; a failure
   * arrives as a final `error` event.
   */
  stream(messages: Message[], tools: ToolDefinition[], options?: ModelRequestOptions): AsyncGenerator<StreamEvent>;
}

/**
 * Base provider configuration
 */
export interface ModelProviderConfig {
  apiKey: string;
  defaultModel: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  maxRetries?: number;
}
