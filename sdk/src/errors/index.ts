/**
 * Structured errors for the SDK.
 *
 * Error Class Hierarchy:
 *   AthenaError (base class)
 *   ├── AuthenticationFailedError - bad credentials, expired or revoked tokens
 *   ├── NetworkError - transport failures, timeouts, 5xx responses
 *   ├── NotAuthenticatedError - credential store read before the first login
 *   ├── ServiceError - any other error response from a service
 *   ├── ConfigError - invalid session options
 *   ├── TransportError - chat transport handshake failures
 *   ├── DecodeError - a response body did not match its decoder
 *   └── SessionClosedError - operation on a closed session
 */

/**
 * Error codes for all known error types
 */
export enum ErrorCode {
  AUTH_FAILED = 'AUTH_FAILED',
  NETWORK_ERROR = 'NETWORK_ERROR',
  NOT_AUTHENTICATED = 'NOT_AUTHENTICATED',
  SERVICE_ERROR = 'SERVICE_ERROR',
  CONFIG_INVALID = 'CONFIG_INVALID',
  TRANSPORT_FAILED = 'TRANSPORT_FAILED',
  DECODE_FAILED = 'DECODE_FAILED',
  SESSION_CLOSED = 'SESSION_CLOSED',
}

/**
 * Details of an error body returned by the services:
 * `{ errorCode, errorMessage, numericErrorCode, messageVars }`.
 */
export interface ServiceErrorBody {
  errorCode?: string;
  errorMessage?: string;
  numericErrorCode?: number;
  messageVars?: string[];
  /** Present on the two-factor challenge error */
  challenge?: string;
  metadata?: Record<string, unknown>;
}

export interface AthenaErrorOptions {
  statusCode?: number;
  body?: ServiceErrorBody;
  cause?: unknown;
  isRetryable?: boolean;
}

/**
 * Base error class
 */
export class AthenaError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode?: number;
  public readonly body?: ServiceErrorBody;
  public readonly isRetryable: boolean;
  public readonly timestamp: string;

  constructor(code: ErrorCode, message: string, options: AthenaErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'AthenaError';
    this.code = code;
    this.statusCode = options.statusCode;
    this.body = options.body;
    this.isRetryable = options.isRetryable ?? code === ErrorCode.NETWORK_ERROR;
    this.timestamp = new Date().toISOString();
  }

  /** The service's own error code, e.g. `errors.com.epicgames.account.invalid_account_credentials` */
  get errorCode(): string | undefined {
    return this.body?.errorCode;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      errorCode: this.errorCode,
      isRetryable: this.isRetryable,
      timestamp: this.timestamp,
    };
  }
}

export class AuthenticationFailedError extends AthenaError {
  constructor(message: string, options: AthenaErrorOptions = {}) {
    super(ErrorCode.AUTH_FAILED, message, { ...options, isRetryable: false });
    this.name = 'AuthenticationFailedError';
  }
}

export class NetworkError extends AthenaError {
  constructor(message: string, options: AthenaErrorOptions = {}) {
    super(ErrorCode.NETWORK_ERROR, message, options);
    this.name = 'NetworkError';
  }
}

export class NotAuthenticatedError extends AthenaError {
  constructor(message = 'No session: the credential store was read before the first login') {
    super(ErrorCode.NOT_AUTHENTICATED, message);
    this.name = 'NotAuthenticatedError';
  }
}

export class ServiceError extends AthenaError {
  constructor(message: string, options: AthenaErrorOptions = {}) {
    super(ErrorCode.SERVICE_ERROR, message, options);
    this.name = 'ServiceError';
  }
}

export class ConfigError extends AthenaError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(ErrorCode.CONFIG_INVALID, issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class TransportError extends AthenaError {
  constructor(message: string, options: AthenaErrorOptions = {}) {
    super(ErrorCode.TRANSPORT_FAILED, message, options);
    this.name = 'TransportError';
  }
}

export class DecodeError extends AthenaError {
  constructor(message: string, options: AthenaErrorOptions = {}) {
    super(ErrorCode.DECODE_FAILED, message, options);
    this.name = 'DecodeError';
  }
}

export class SessionClosedError extends AthenaError {
  constructor(message = 'The session has been closed') {
    super(ErrorCode.SESSION_CLOSED, message);
    this.name = 'SessionClosedError';
  }
}

/**
 * Type guard for SDK errors
 */
export function isAthenaError(error: unknown): error is AthenaError {
  return error instanceof AthenaError;
}

/**
 * Error message for logging, whatever was thrown.
 */
export function formatError(error: unknown): string {
  if (error instanceof AthenaError) {
    const parts = [`[${error.code}]`, error.message];
    if (error.errorCode) parts.push(`(${error.errorCode})`);
    return parts.join(' ');
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
