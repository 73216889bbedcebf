import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { resolveLogLevel } from '@/services/logger';
import { truncateLists } from '@/services/providers/upstream';
import {
  createErrorResponse,
  createSuccessResponse,
  errorMessage,
  formatFieldErrors,
  toFieldErrors,
} from '@/utils/errorResponse';

describe('resolveLogLevel', () => {
  it('maps level names to tslog levels', () => {
    expect(resolveLogLevel('debug')).toBe(2);
    expect(resolveLogLevel(' WARN ')).toBe(4);
    expect(resolveLogLevel('fatal')).toBe(6);
  });

  it('defaults to info', () => {
    expect(resolveLogLevel(undefined)).toBe(3);
    expect(resolveLogLevel('verbose')).toBe(3);
    expect(resolveLogLevel('constructor')).toBe(3);
    expect(resolveLogLevel('toString')).toBe(3);
  });
});

describe('response envelope', () => {
  it('builds success and error bodies', () => {
    expect(createSuccessResponse({ ok: 1 })).toEqual({ success: true, data: { ok: 1 } });
    expect(createErrorResponse('boom')).toEqual({ success: false, error: 'boom' });
    expect(createErrorResponse('boom', [])).toEqual({ success: false, error: 'boom' });
  });

  it('flattens zod issues into field errors', () => {
    const parsed = z.object({ trip: z.object({ from: z.string() }) }).safeParse({ trip: {} });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    const errors = toFieldErrors(parsed.error);
    expect(errors).toEqual([{ path: 'trip.from', message: 'Required' }]);
    expect(formatFieldErrors(errors)).toBe('trip.from: Required');
  });

  it('stringifies anything thrown', () => {
    expect(errorMessage(new Error('nope'))).toBe('nope');
    expect(errorMessage('plain')).toBe('plain');
  });
});

describe('truncateLists', () => {
  it('caps only the named arrays and leaves the input alone', () => {
    const payload = { a: [1, 2, 3], b: [1, 2, 3], c: 'x' };
    expect(truncateLists(payload, ['a', 'c'], 2)).toEqual({ a: [1, 2], b: [1, 2, 3], c: 'x' });
    expect(payload.a).toEqual([1, 2, 3]);
  });
});
