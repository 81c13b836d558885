/**
 * Error Taxonomy
 *
 * Every error raised or returned by this library is a {@link DataGuardError}.
 * The `category` tells callers how to react:
 *
 * - `validation`: the input was rejected before any side effect
 * - `transient`: network or store unavailability; may succeed later
 * - `security`: an injection attempt or disallowed destination was refused
 *
 * Messages never carry the offending payload, only its shape.
 *
 * @packageDocumentation
 */

export type ErrorCategory = 'validation' | 'transient' | 'security';

/**
 * Base error for the data-protection layer
 */
export class DataGuardError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly category: ErrorCategory,
    options?: { cause?: unknown }
  ) {
    super(DataGuardError.sanitizeMessage(message), options);
    this.name = 'DataGuardError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Strips long opaque runs (keys, tokens, base64 blobs) from messages
   */
  private static sanitizeMessage(message: string): string {
    return message.replace(/[A-Za-z0-9+/=_-]{32,}/g, '[REDACTED]');
  }

  override toString(): string {
    return `${this.name}: ${this.message} (code: ${this.code})`;
  }

  toJSON(): object {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
    };
  }
}

/**
 * Malformed input rejected before any side effect
 */
export class ValidationError extends DataGuardError {
  constructor(
    message: string,
    code: string,
    public readonly field?: string
  ) {
    super(message, code, 'validation');
    this.name = 'ValidationError';
  }
}

/**
 * Persistent store read or write failed
 */
export class StorageError extends DataGuardError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, 'STORAGE_UNAVAILABLE', 'transient', { cause });
    this.name = 'StorageError';
  }
}

/**
 * A request was refused for security reasons
 */
export class SecurityViolationError extends DataGuardError {
  constructor(message: string, code: string) {
    super(message, code, 'security');
    this.name = 'SecurityViolationError';
  }
}

/**
 * Codes raised by the outbound gateway
 */
export type GatewayErrorCode = 'NETWORK_ERROR' | 'TIMEOUT' | 'CLIENT_ERROR' | 'INVALID_JSON';

/**
 * Outbound HTTP call failed
 */
export class GatewayError extends DataGuardError {
  constructor(
    message: string,
    public readonly gatewayCode: GatewayErrorCode,
    public readonly attempts: number,
    cause?: unknown
  ) {
    super(
      message,
      gatewayCode,
      gatewayCode === 'NETWORK_ERROR' || gatewayCode === 'TIMEOUT' ? 'transient' : 'validation',
      { cause }
    );
    this.name = 'GatewayError';
  }
}

/**
 * Normalizes an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : 'Unknown error');
}
