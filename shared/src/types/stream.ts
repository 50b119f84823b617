// ============================================
// Model Stream Events
// ============================================

import type { ToolCallRequest } from '../schemas/index.js';

export type FinishReason = 'stop' | 'tool_calls' | 'length' | 'other';

/**
 * Incremental unit of a streamed model response. Never persisted; the
 * conversation manager folds these into a Message.
 */
export type StreamEvent =
  | { type: 'text_delta'; text: string }
  | { type: 'tool_call_start'; index: number; id: string; name: string }
  | { type: 'tool_call_delta'; index: number; argumentsDelta: string }
  | { type: 'tool_call_complete'; index: number; toolCall: ToolCallRequest }
  | { type: 'turn_complete'; finishReason: FinishReason }
  | { type: 'error'; error: Error };

// ============================================
// Chat Stream Events (service boundary)
// ============================================

export type ChatStreamEvent =
  | { type: 'text_delta'; text: string }
  | { type: 'tool_call'; toolCall: ToolCallRequest }
  | { type: 'tool_result'; toolCallId: string; name: string; content: string; isError: boolean }
  | { type: 'done'; conversationId: string; content: string; degraded: boolean }
  | { type: 'error'; code: string; message: string };

// ============================================
// API Response Types
// ============================================

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export interface ChatResult {
  conversationId: string;
  content: string;
  degraded: boolean;
}
