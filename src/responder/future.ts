import { HttpResponse } from '../http/response.js';
import { HttpError } from '../errors/http-error.js';
import { intoHttpError } from '../errors/registry.js';
import { DeferredOutcome, Outcome, success, failure } from './types.js';

type OnFulfilled<T, R> = ((value: T) => R | PromiseLike<R>) | null | undefined;
type OnRejected<R> = ((reason: unknown) => R | PromiseLike<R>) | null | undefined;

/**
 * An outcome that is already known. Primitive responders return this, so callers may
 * read `outcome` synchronously instead of awaiting.
 */
export class Ready<E> implements DeferredOutcome<E> {
  constructor(readonly outcome: Outcome<E>) {}

  static ok(response: HttpResponse): Ready<never> {
    return new Ready(success(response));
  }

  static err<E>(error: E): Ready<E> {
    return new Ready(failure(error));
  }

  then<R1 = Outcome<E>, R2 = never>(onfulfilled?: OnFulfilled<Outcome<E>, R1>, onrejected?: OnRejected<R2>): PromiseLike<R1 | R2> {
    return Promise.resolve(this.outcome).then(onfulfilled, onrejected);
  }
}

/**
 * Base for outcomes that compose another one. `resolve` runs on first subscription and
 * its result is shared by every later `then`.
 */
export abstract class OutcomeFuture<E> implements DeferredOutcome<E> {
  private settled: Promise<Outcome<E>> | null = null;

  protected abstract resolve(): Promise<Outcome<E>>;

  then<R1 = Outcome<E>, R2 = never>(onfulfilled?: OnFulfilled<Outcome<E>, R1>, onrejected?: OnRejected<R2>): PromiseLike<R1 | R2> {
    if (!this.settled) this.settled = this.resolve();
    return this.settled.then(onfulfilled, onrejected);
  }
}

/** Passes success through and converts the inner failure into an HttpError. */
export class ResponseFuture<E> extends OutcomeFuture<HttpError> {
  constructor(private readonly inner: DeferredOutcome<E>) {
    super();
  }

  protected async resolve(): Promise<Outcome<HttpError>> {
    return normalizeOutcome(await this.inner);
  }
}

export function normalizeOutcome<E>(outcome: Outcome<E>): Outcome<HttpError> {
  return outcome.ok ? outcome : failure(intoHttpError(outcome.error));
}
