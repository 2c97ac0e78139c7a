import { describe, it, expect } from 'vitest';
import { resolveRequestId } from '../../../src/shared/http/request-context';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe('resolveRequestId', () => {
  it('reuses an upstream request id', () => {
    expect(resolveRequestId('  abc-123 ')).toBe('abc-123');
  });

  it('generates a UUID when the header is missing, blank, repeated or oversized', () => {
    expect(resolveRequestId(undefined)).toMatch(UUID);
    expect(resolveRequestId('   ')).toMatch(UUID);
    expect(resolveRequestId(['a', 'b'])).toMatch(UUID);
    expect(resolveRequestId('x'.repeat(129))).toMatch(UUID);
  });
});
