/**
 * Error types
 */

export type HoneyportErrorCode =
  // Startup errors
  | 'NO_VALID_PORTS'
  | 'INVALID_CONFIG'
  | 'CONFIG_LOAD_FAILED'
  // Runtime errors
  | 'LISTENER_CLOSED'
  | 'CONNECTION_TIMEOUT'
  | 'ALREADY_REGISTERED';

export class HoneyportError extends Error {
  readonly code: HoneyportErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: HoneyportErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'HoneyportError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Check for a HoneyportError with the given code
 */
export function isHoneyportError(error: unknown, code?: HoneyportErrorCode): error is HoneyportError {
  return error instanceof HoneyportError && (code === undefined || error.code === code);
}

/**
 * Render any thrown value as a log-friendly message
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? `${error.code}: ` : '';
    return `${code}${error.message}`;
  }
  return String(error);
}
