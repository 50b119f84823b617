// Schemas
export * from './schemas/index.js';

// Types
export type {
  FinishReason,
  StreamEvent,
  ChatStreamEvent,
  ApiResponse,
  ChatResult,
} from './types/stream.js';
