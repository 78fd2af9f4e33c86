/**
 * Isabelle client error classes.
 *
 * Engine errors mean the protocol itself broke. A server that answers `ERROR`
 * or `FAILED` is not an engine error: those arrive as outcome values.
 */

/** Base error class for all client errors */
export class IsabelleError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IsabelleError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type ConnectionErrorCode =
  | 'CONNECTION_FAILED'
  | 'CONNECTION_TIMEOUT'
  | 'CONNECTION_CLOSED'
  | 'CONNECTION_ABORTED'
  | 'NOT_CONNECTED';

/** Socket open, read or write failure, or an unexpected close */
export class ConnectionError extends IsabelleError {
  declare readonly code: ConnectionErrorCode;

  constructor(message: string, code: ConnectionErrorCode = 'CONNECTION_FAILED', cause?: unknown) {
    super(message, code, cause === undefined ? undefined : { cause });
    this.name = 'ConnectionError';
  }
}

/** The handshake did not return an `OK` line */
export class AuthenticationError extends IsabelleError {
  /** First line the server sent back, if any arrived */
  readonly response?: string;

  constructor(message = 'Authentication failed', response?: string, cause?: unknown) {
    super(message, 'AUTH_FAILED', cause === undefined ? undefined : { cause });
    this.name = 'AuthenticationError';
    this.response = response;
  }
}

/** A classified payload could not be decoded into its expected type */
export class ProtocolError extends IsabelleError {
  /** Raw payload text as received */
  readonly payload: string;
  /** Parser or schema diagnostic */
  readonly diagnostic: string;

  constructor(payload: string, diagnostic: string, cause?: unknown) {
    super(
      `Malformed payload: ${diagnostic}: ${payload}`,
      'PROTOCOL_ERROR',
      cause === undefined ? undefined : { cause }
    );
    this.name = 'ProtocolError';
    this.payload = payload;
    this.diagnostic = diagnostic;
  }
}

/** Invalid client configuration */
export class ValidationError extends IsabelleError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.field = field;
  }
}

/** The server process could not be started or its banner was not understood */
export class ServerLaunchError extends IsabelleError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SERVER_LAUNCH_FAILED', cause === undefined ? undefined : { cause });
    this.name = 'ServerLaunchError';
  }
}

/** True for errors that mean the protocol broke, as opposed to a reported failure */
export function isEngineError(error: unknown): error is IsabelleError {
  return (
    error instanceof ConnectionError ||
    error instanceof AuthenticationError ||
    error instanceof ProtocolError
  );
}

/** All error types exported for instanceof checks */
export const Errors = {
  IsabelleError,
  ConnectionError,
  AuthenticationError,
  ProtocolError,
  ValidationError,
  ServerLaunchError,
};
