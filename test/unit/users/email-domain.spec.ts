import { describe, it, expect } from 'vitest';
import { emailDomain } from '../../../src/modules/users/helpers/email-domain';

describe('emailDomain', () => {
  it('returns the part after the last @', () => {
    expect(emailDomain('alice@example.com')).toBe('example.com');
    expect(emailDomain('"a@b"@example.org')).toBe('example.org');
  });

  it('returns an empty string for unvalidated keys without @', () => {
    expect(emailDomain('legacy')).toBe('');
    expect(emailDomain('')).toBe('');
  });
});
