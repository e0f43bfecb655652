/**
 * Error types for the Infoblox client.
 *
 * Configuration and security errors are raised while a client is built; the
 * others are raised per call. None of them is retried by the client.
 */

/**
 * Base error class for Infoblox operations
 */
export abstract class InfobloxError extends Error {
  abstract readonly code: string;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }

  /**
   * Get HTTP status code if applicable
   */
  get httpStatus(): number | undefined {
    return undefined;
  }
}

/**
 * Invalid or missing client configuration
 */
export class ConfigurationError extends InfobloxError {
  readonly code = 'INFOBLOX_CONFIG';

  constructor(message: string) {
    super(`Configuration error: ${message}`);
  }

  static emptyField(field: string): ConfigurationError {
    return new ConfigurationError(`${field} is empty.`);
  }
}

/**
 * Trust store or TLS context could not be initialized
 */
export class SecurityInitError extends InfobloxError {
  readonly code = 'INFOBLOX_SECURITY_INIT';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

/**
 * Categories of structured WAPI failures, derived from the HTTP status.
 */
export enum ApiErrorKind {
  BadRequest = 'bad_request',
  Unauthorized = 'unauthorized',
  Forbidden = 'forbidden',
  NotFound = 'not_found',
  Conflict = 'conflict',
  ServerError = 'server_error',
  Unknown = 'unknown',
}

/**
 * Structured error body returned by WAPI with an application/json content type.
 */
export interface WapiErrorBody {
  /** Summary, e.g. "AdmConDataNotFoundError: Reference ... not found" */
  Error?: string;
  /** Appliance error code, e.g. "Client.Ibap.Data.NotFound" */
  code?: string;
  /** Human readable detail */
  text?: string;
}

/**
 * Failure reported by the appliance with a parseable JSON error body.
 */
export class ApiError extends InfobloxError {
  readonly code = 'INFOBLOX_API';
  readonly kind: ApiErrorKind;
  readonly status: number;
  /** WAPI error code (`code` field of the error body). */
  readonly errorCode?: string;
  /** WAPI error detail (`text` field of the error body). */
  readonly text?: string;

  constructor(
    message: string,
    status: number,
    details: { errorCode?: string; text?: string } = {}
  ) {
    super(message);
    this.status = status;
    this.kind = ApiError.kindFromStatus(status);
    this.errorCode = details.errorCode;
    this.text = details.text;
  }

  get httpStatus(): number {
    return this.status;
  }

  static fromBody(status: number, statusText: string, body: WapiErrorBody): ApiError {
    const message = body.Error || body.text || `Request failed, ${statusText}`;
    return new ApiError(message, status, { errorCode: body.code, text: body.text });
  }

  /**
   * Maps HTTP status code to error kind.
   */
  static kindFromStatus(status: number): ApiErrorKind {
    switch (status) {
      case 400:
        return ApiErrorKind.BadRequest;
      case 401:
        return ApiErrorKind.Unauthorized;
      case 403:
        return ApiErrorKind.Forbidden;
      case 404:
        return ApiErrorKind.NotFound;
      case 409:
        return ApiErrorKind.Conflict;
      default:
        return status >= 500 && status < 600 ? ApiErrorKind.ServerError : ApiErrorKind.Unknown;
    }
  }

  toString(): string {
    let result = `[${this.kind}] ${this.message} (HTTP ${this.status})`;
    if (this.errorCode) {
      result += ` [${this.errorCode}]`;
    }
    return result;
  }
}

/**
 * Network, TLS or timeout failure, or an error response that is not JSON.
 */
export class TransportError extends InfobloxError {
  readonly code = 'INFOBLOX_TRANSPORT';
  readonly status?: number;
  readonly statusText?: string;

  constructor(
    message: string,
    options: { status?: number; statusText?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.statusText = options.statusText;
  }

  get httpStatus(): number | undefined {
    return this.status;
  }

  static fromStatus(status: number, statusText: string): TransportError {
    return new TransportError(`Request failed, ${status} ${statusText}`.trim(), {
      status,
      statusText,
    });
  }

  static timeout(timeoutMs: number, cause?: unknown): TransportError {
    return new TransportError(`Request timeout after ${timeoutMs}ms`, { cause });
  }
}

/**
 * A successful response whose body does not have the expected shape.
 */
export class DeserializationError extends InfobloxError {
  readonly code = 'INFOBLOX_DESERIALIZATION';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

/**
 * Caller supplied a malformed or missing argument. Raised before any request.
 */
export class ValidationError extends InfobloxError {
  readonly code = 'INFOBLOX_VALIDATION';
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.field = field;
  }

  static missing(field: string): ValidationError {
    return new ValidationError(field, `${field} is null`);
  }
}

/**
 * Type guard for InfobloxError.
 */
export function isInfobloxError(error: unknown): error is InfobloxError {
  return error instanceof InfobloxError;
}
