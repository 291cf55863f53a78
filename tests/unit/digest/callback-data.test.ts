import { describe, expect, it } from 'vitest';
import {
  MAX_CALLBACK_BYTES,
  decodeCallbackData,
  encodeCallbackData,
} from '../../../src/domains/digest/service/callback-data.js';
import { AppError } from '../../../src/utils/errors.js';

describe('callback data', () => {
  it('encodes a compact payload', () => {
    expect(encodeCallbackData('dg_0123456789', 4, 'mark_important')).toBe('dg|dg_0123456789|4|mi');
    expect(encodeCallbackData('dg_0123456789', 0, 'ignore_event')).toBe('dg|dg_0123456789|0|ie');
  });

  it('decodes what it encodes', () => {
    expect(decodeCallbackData(encodeCallbackData('dg_0123456789', 12, 'add_event'))).toEqual({
      sessionId: 'dg_0123456789',
      itemIndex: 12,
      action: 'add_event',
    });
  });

  it('stays under the transport limit for real session ids', () => {
    const data = encodeCallbackData('dg_0123456789', 9999, 'leave_unread');
    expect(Buffer.byteLength(data)).toBeLessThanOrEqual(MAX_CALLBACK_BYTES);
  });

  it('throws when the payload would not fit', () => {
    expect(() => encodeCallbackData('x'.repeat(70), 1, 'next')).toThrow(AppError);
  });

  it('rejects anything that is not a digest button', () => {
    expect(decodeCallbackData(undefined)).toBeNull();
    expect(decodeCallbackData('')).toBeNull();
    expect(decodeCallbackData('xx|dg_1|0|nx')).toBeNull();
    expect(decodeCallbackData('dg|dg_1|0')).toBeNull();
    expect(decodeCallbackData('dg|dg_1|0|nx|extra')).toBeNull();
    expect(decodeCallbackData('dg|dg 1|0|nx')).toBeNull();
    expect(decodeCallbackData('dg|dg_1|-1|nx')).toBeNull();
    expect(decodeCallbackData('dg|dg_1|0|zz')).toBeNull();
  });
});
