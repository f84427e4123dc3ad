import { StatusCode } from '../http/status.js';

export const ErrorCode = {
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  METHOD_NOT_ALLOWED: 'METHOD_NOT_ALLOWED',
  INVALID_HEADER: 'INVALID_HEADER',
  INVALID_STATUS: 'INVALID_STATUS',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode] | (string & {});

export interface HttpErrorOptions {
  details?: unknown;
  cause?: unknown;
}

/**
 * The normalized failure every responder's error is converted into before it leaves
 * the conversion layer. Rendering it is up to the dispatcher.
 */
export class HttpError extends Error {
  public readonly status: StatusCode;
  public readonly code: ErrorCodeType;
  public readonly details?: unknown;

  constructor(status: StatusCode, code: ErrorCodeType, message: string, options: HttpErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'HttpError';
    this.status = status;
    this.code = code;
    this.details = options.details;
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined ? { details: this.details } : {}),
      },
    };
  }
}

export class InvalidHeaderError extends HttpError {
  constructor(message: string, details?: { name?: string; value?: string }) {
    super(StatusCode.INTERNAL_SERVER_ERROR, ErrorCode.INVALID_HEADER, message, { details });
    this.name = 'InvalidHeaderError';
  }
}

export class InvalidStatusError extends HttpError {
  constructor(status: number) {
    super(StatusCode.INTERNAL_SERVER_ERROR, ErrorCode.INVALID_STATUS, `Invalid status code: ${status}`, { details: { status } });
    this.name = 'InvalidStatusError';
  }
}

export function notFound(message = 'Not found'): HttpError {
  return new HttpError(StatusCode.NOT_FOUND, ErrorCode.NOT_FOUND, message);
}

export function methodNotAllowed(allowed: string[]): HttpError {
  return new HttpError(
    StatusCode.METHOD_NOT_ALLOWED,
    ErrorCode.METHOD_NOT_ALLOWED,
    `Method not allowed. Allowed methods: ${allowed.join(', ')}`,
    { details: { allowed } }
  );
}

export function internalError(message = 'Internal server error', cause?: unknown): HttpError {
  return new HttpError(StatusCode.INTERNAL_SERVER_ERROR, ErrorCode.INTERNAL_ERROR, message, { cause });
}
