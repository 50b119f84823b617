import { ToolCallParseError, errorMessage } from '../lib/errors.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the concatenated argument fragments of a streamed tool call.
 * An empty string means the tool takes no arguments.
 */
export function parseToolArguments(toolCallId: string, toolName: string, raw: string): Record<string, unknown> {
  if (raw.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ToolCallParseError(toolCallId, toolName, raw, errorMessage(error));
  }

  if (!isRecord(parsed)) {
    throw new ToolCallParseError(toolCallId, toolName, raw, 'arguments must be a JSON object');
  }
  return parsed;
}
