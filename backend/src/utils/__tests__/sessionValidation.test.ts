import { describe, expect, it } from 'vitest';
import { validateSessionId } from '../sessionValidation.js';

describe('validateSessionId', () => {
  it('accepts uuid-like tokens', () => {
    expect(validateSessionId('3f1c2a9e-5b7d-4e2f-9a1b-0c8d7e6f5a4b')).toEqual({
      valid: true,
      sessionId: '3f1c2a9e-5b7d-4e2f-9a1b-0c8d7e6f5a4b'
    });
  });

  it('rejects empty ids', () => {
    expect(validateSessionId('')).toMatchObject({ valid: false, error: 'Session ID is required' });
  });

  it.each(['..', '../etc', 'a/b', 'with space', 'x'.repeat(129)])('rejects %s', (sessionId) => {
    expect(validateSessionId(sessionId).valid).toBe(false);
  });
});
