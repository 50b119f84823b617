import { describe, it, expect } from 'vitest';
import type { Message } from '@relay-agent/shared';
import { containsCardNumber, redactCardNumbers, sanitizeMessage } from '../agent/sanitizer.js';

describe('redactCardNumbers', () => {
  it('masks a spaced card number and keeps the separators', () => {
    expect(redactCardNumbers('card 4111 1111 1111 1111 on file')).toBe('card **** **** **** **** on file');
  });

  it('masks dashed and ungrouped numbers', () => {
    expect(redactCardNumbers('4111-1111-1111-1111')).toBe('****-****-****-****');
    expect(redactCardNumbers('pan=5500000000000004;')).toBe('pan=****************;');
  });

  it('masks every card number in the text', () => {
    expect(redactCardNumbers('a 4111111111111111 b 378282246310005')).toBe(
      'a **************** b ***************',
    );
  });

  it('leaves short and over-long digit runs alone', () => {
    expect(redactCardNumbers('order 123456789012')).toBe('order 123456789012');
    expect(redactCardNumbers('id 12345678901234567890')).toBe('id 12345678901234567890');
  });

  it('leaves phone numbers and dates alone', () => {
    expect(redactCardNumbers('call +1 555-123-4567 on 2026-01-05')).toBe('call +1 555-123-4567 on 2026-01-05');
  });

  it('does not join groups split by double separators', () => {
    expect(redactCardNumbers('4111  1111  1111  1111')).toBe('4111  1111  1111  1111');
  });

  it('is idempotent', () => {
    const once = redactCardNumbers('pay with 4111 1111 1111 1111 today');
    expect(redactCardNumbers(once)).toBe(once);
  });
});

describe('containsCardNumber', () => {
  it('detects card-shaped numbers', () => {
    expect(containsCardNumber('4111111111111111')).toBe(true);
    expect(containsCardNumber('no digits here')).toBe(false);
    expect(containsCardNumber('**** **** **** ****')).toBe(false);
  });

  it('gives the same answer on repeated calls', () => {
    expect(containsCardNumber('x 4111111111111111')).toBe(true);
    expect(containsCardNumber('x 4111111111111111')).toBe(true);
  });
});

describe('sanitizeMessage', () => {
  it('redacts content', () => {
    const message: Message = { role: 'user', content: 'my card is 4111 1111 1111 1111', tool_calls: [] };
    expect(sanitizeMessage(message)).toEqual({ role: 'user', content: 'my card is **** **** **** ****', tool_calls: [] });
  });

  it('keeps null content', () => {
    const message: Message = { role: 'assistant', content: null, tool_calls: [] };
    expect(sanitizeMessage(message).content).toBeNull();
  });

  it('redacts string values nested in tool call arguments', () => {
    const message: Message = {
      role: 'assistant',
      content: null,
      tool_calls: [
        {
          id: 'call-1',
          name: 'update_user',
          arguments: {
            card: '4111111111111111',
            nested: { list: ['4111-1111-1111-1111', 5, true] },
            age: 42,
          },
        },
      ],
    };

    expect(sanitizeMessage(message).tool_calls).toEqual([
      {
        id: 'call-1',
        name: 'update_user',
        arguments: {
          card: '****************',
          nested: { list: ['****-****-****-****', 5, true] },
          age: 42,
        },
      },
    ]);
  });

  it('does not mutate the input', () => {
    const message: Message = { role: 'user', content: '4111111111111111', tool_calls: [] };
    sanitizeMessage(message);
    expect(message.content).toBe('4111111111111111');
  });

  it('keeps tool message fields', () => {
    const message: Message = {
      role: 'tool',
      content: 'card 4111111111111111',
      tool_calls: [],
      tool_call_id: 'call-9',
      name: 'get_user',
    };
    expect(sanitizeMessage(message)).toEqual({
      role: 'tool',
      content: 'card ****************',
      tool_calls: [],
      tool_call_id: 'call-9',
      name: 'get_user',
    });
  });
});
