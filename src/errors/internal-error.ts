import { StatusCode, isStatusCode, reasonPhrase } from '../http/status.js';
import { Responder } from '../responder/types.js';
import { Ready } from '../responder/future.js';
import { ErrorCode, HttpError } from './http-error.js';
import { intoHttpError, registerErrorConversion } from './registry.js';

/**
 * An error that already knows which status it should be rendered with. Returning one from a
 * handler always resolves to a failure; the error renderer produces the response.
 */
export class InternalError<T = string> extends Error implements Responder<HttpError, Ready<HttpError>> {
  readonly status: StatusCode;
  readonly payload: T;

  constructor(payload: T, status: StatusCode) {
    super(String(payload));
    this.name = 'InternalError';
    this.payload = payload;
    this.status = status;
  }

  respondTo(): Ready<HttpError> {
    return Ready.err(intoHttpError(this));
  }
}

// 'Bad Request' -> 'BAD_REQUEST'
export function codeForStatus(status: StatusCode): string {
  const phrase = reasonPhrase(status);
  return phrase ? phrase.toUpperCase().replace(/[^A-Z0-9]+/g, '_') : ErrorCode.INTERNAL_ERROR;
}

registerErrorConversion(InternalError, (error) => {
  const status = isStatusCode(error.status) ? error.status : StatusCode.INTERNAL_SERVER_ERROR;
  return new HttpError(status, codeForStatus(status), error.message, { cause: error });
});
