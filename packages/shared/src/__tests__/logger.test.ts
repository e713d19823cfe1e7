import { describe, it, expect } from 'vitest';
import { redactSecrets } from '../logger';

describe('redactSecrets', () => {
  it('redacts secret-bearing keys regardless of case and separators', () => {
    const result = redactSecrets({
      Authorization: 'token test-secret',
      public_key: 'MIIBIjAN',
      encrypted_access_token: 'eyJhbGciOi',
      login: 'alice',
    });

    expect(result).toEqual({
      Authorization: '[REDACTED]',
      public_key: '[REDACTED]',
      encrypted_access_token: '[REDACTED]',
      login: 'alice',
    });
  });

  it('redacts nested objects and objects inside arrays', () => {
    const result = redactSecrets({
      request: { headers: { authorization: 'token x' }, url: '/users' },
      items: [{ secret: 's' }, 3],
    });

    expect(result).toEqual({
      request: { headers: { authorization: '[REDACTED]' }, url: '/users' },
      items: [{ secret: '[REDACTED]' }, 3],
    });
  });

  it('keeps dates untouched', () => {
    const at = new Date('2026-01-01T00:00:00Z');
    expect(redactSecrets({ at }).at).toBe(at);
  });
});
