import { HttpResponse } from '../http/response.js';
import { RequestContext } from '../http/request.js';

export type Outcome<E> =
  | { ok: true; response: HttpResponse }
  | { ok: false; error: E };

/** A response (or failure) that is available now or later. */
export type DeferredOutcome<E> = PromiseLike<Outcome<E>>;

/**
 * Implemented by anything a handler may return. `E` is the failure the conversion can
 * resolve to and `F` the deferred outcome it hands back; both are fixed per implementation.
 * A responder is converted once and not reused afterwards.
 */
export interface Responder<E = unknown, F extends DeferredOutcome<E> = DeferredOutcome<E>> {
  respondTo(req: RequestContext): F;
}

export function isResponder(value: unknown): value is Responder<unknown> {
  return typeof value === 'object' && value !== null && 'respondTo' in value && typeof value.respondTo === 'function';
}

export function success(response: HttpResponse): Outcome<never> {
  return { ok: true, response };
}

export function failure<E>(error: E): Outcome<E> {
  return { ok: false, error };
}
