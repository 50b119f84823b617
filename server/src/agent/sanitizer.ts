import type { Message } from '@relay-agent/shared';

/**
 * 13-19 digits, optionally grouped by single spaces or dashes, not touching
 * other digits on either side.
 */
const CARD_NUMBER_PATTERN = /(?<!\d)\d(?:[ -]?\d){12,18}(?!\d)/g;

const MASK = '*';

/**
 * Replace every digit of a card-shaped number with `*`, keeping separators so
 * the text still reads as "a card number was here". Already-masked text has
 * no digits left in those positions, so a second pass changes nothing.
 */
export function redactCardNumbers(text: string): string {
  return text.replace(CARD_NUMBER_PATTERN, (match) => match.replace(/\d/g, MASK));
}

export function containsCardNumber(text: string): boolean {
  return new RegExp(CARD_NUMBER_PATTERN.source).test(text);
}

function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactCardNumbers(value);
  }
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, inner]) => [key, redactValue(inner)]));
  }
  return value;
}

/**
 * Redact a message's content and the string values of its tool-call
 * arguments. Returns a new message.
 */
export function sanitizeMessage(message: Message): Message {
  return {
    ...message,
    content: message.content === null ? null : redactCardNumbers(message.content),
    tool_calls: message.tool_calls.map((call) => ({
      ...call,
      arguments: Object.fromEntries(
        Object.entries(call.arguments).map(([key, value]) => [key, redactValue(value)]),
      ),
    })),
  };
}
