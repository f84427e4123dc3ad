import { RequestContext } from '../http/request.js';
import { HttpError } from '../errors/http-error.js';
import { intoHttpError } from '../errors/registry.js';
import { Responder } from './types.js';
import { Ready, ResponseFuture } from './future.js';

export class Ok<T> {
  readonly ok = true;
  constructor(readonly value: T) {}
}

export class Err<E> {
  readonly ok = false;
  constructor(readonly error: E) {}
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return new Ok(value);
}

export function err<E>(error: E): Err<E> {
  return new Err(error);
}

/**
 * Ok delegates to the wrapped responder with its failure normalized; Err short-circuits
 * into a failure without producing a response.
 */
export class ResultResponder<E, X> implements Responder<HttpError, ResponseFuture<E> | Ready<HttpError>> {
  constructor(private readonly result: Result<Responder<E>, X>) {}

  respondTo(req: RequestContext): ResponseFuture<E> | Ready<HttpError> {
    if (this.result.ok) return new ResponseFuture(this.result.value.respondTo(req));
    return Ready.err(intoHttpError(this.result.error));
  }
}
