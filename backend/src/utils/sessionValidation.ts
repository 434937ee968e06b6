export interface ValidationResult {
  valid: boolean;
  error?: string;
  sessionId?: string;
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

/**
 * Session ids are opaque tokens. They become directory names, so anything
 * that could be read as a path (separators, dots, empty) is rejected.
 */
export function validateSessionId(sessionId: string): ValidationResult {
  if (!sessionId) {
    return { valid: false, error: 'Session ID is required', sessionId };
  }

  if (!SESSION_ID_PATTERN.test(sessionId)) {
    return { valid: false, error: `Session ID ${JSON.stringify(sessionId)} is not a valid token`, sessionId };
  }

  return { valid: true, sessionId };
}
