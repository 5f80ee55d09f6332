/**
 * Error codes for the ways a debug session can fail
 */
export enum SessionErrorCode {
  HANDSHAKE_FAILED = 'handshake_failed',
  INTERRUPTED_CONNECT = 'interrupted_connect',
  MALFORMED_PAYLOAD = 'malformed_payload',
  TRANSPORT_ERROR = 'transport_error',
  INVOCATION_FAILED = 'invocation_failed',
  INVALID_STATE = 'invalid_state',
  INVALID_CONFIG = 'invalid_config',
}

/**
 * Session error with a taxonomy code and a fatality flag.
 * Fatal errors end the session; the rest are logged and the session keeps serving.
 */
export class SessionError extends Error {
  public readonly code: SessionErrorCode;
  public readonly isFatal: boolean;
  public readonly cause?: Error;

  public constructor(
    message: string,
    code: SessionErrorCode,
    isFatal: boolean = true,
    cause?: Error,
  ) {
    super(message);
    this.name = 'SessionError';
    this.code = code;
    this.isFatal = isFatal;
    this.cause = cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, SessionError.prototype);
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   * @returns JSON object containing error details
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isFatal: this.isFatal,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  public static handshakeFailure(m: string, c?: Error): SessionError {
    return new SessionError(
      `Handshake failed: ${m}`,
      SessionErrorCode.HANDSHAKE_FAILED,
      true,
      c,
    );
  }

  public static interruptedConnect(c?: Error): SessionError {
    return new SessionError(
      'Connection attempt was interrupted',
      SessionErrorCode.INTERRUPTED_CONNECT,
      true,
      c,
    );
  }

  public static malformedPayload(m: string, c?: Error): SessionError {
    return new SessionError(
      `Malformed payload: ${m}`,
      SessionErrorCode.MALFORMED_PAYLOAD,
      false,
      c,
    );
  }

  public static transportError(m: string, c?: Error): SessionError {
    return new SessionError(
      `Transport error: ${m}`,
      SessionErrorCode.TRANSPORT_ERROR,
      true,
      c,
    );
  }

  public static invocationFailure(
    m: string,
    fatal: boolean,
    c?: Error,
  ): SessionError {
    return new SessionError(
      `Invocation failed: ${m}`,
      SessionErrorCode.INVOCATION_FAILED,
      fatal,
      c,
    );
  }

  public static invalidState(m: string): SessionError {
    return new SessionError(
      `Invalid state: ${m}`,
      SessionErrorCode.INVALID_STATE,
      true,
    );
  }

  public static invalidConfig(m: string, c?: Error): SessionError {
    return new SessionError(
      `Invalid configuration: ${m}`,
      SessionErrorCode.INVALID_CONFIG,
      true,
      c,
    );
  }
}

/**
 * Wraps an unknown thrown value in an Error.
 * @param value - Whatever was thrown or rejected with
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
