import { RequestContext } from '../http/request.js';
import { HttpError } from '../errors/http-error.js';
import { DeferredOutcome, Outcome, Responder } from './types.js';
import { OutcomeFuture, normalizeOutcome } from './future.js';
import { Respondable, toResponder } from './into.js';

export type Branch = 'A' | 'B';

type Held<EA, EB> =
  | { branch: 'A'; responder: Responder<EA> }
  | { branch: 'B'; responder: Responder<EB> };

type InFlight<EA, EB> =
  | { branch: 'A'; future: DeferredOutcome<EA> }
  | { branch: 'B'; future: DeferredOutcome<EB> };

/**
 * One of two responders of different types under a single type.
 *
 * ```ts
 * function register(valid: boolean) {
 *   return valid
 *     ? Either.b(HttpResponse.ok().contentType('text/html').body('Hello!'))
 *     : Either.a(withStatus('Bad data', StatusCode.BAD_REQUEST));
 * }
 * ```
 */
export class Either<EA, EB> implements Responder<HttpError, EitherResponseFuture<EA, EB>> {
  private constructor(private readonly held: Held<EA, EB>) {}

  static a<E>(value: Responder<E>): Either<E, never>;
  static a(value: Respondable): Either<unknown, never>;
  static a(value: Respondable): Either<unknown, never> {
    return new Either<unknown, never>({ branch: 'A', responder: toResponder(value) });
  }

  static b<E>(value: Responder<E>): Either<never, E>;
  static b(value: Respondable): Either<never, unknown>;
  static b(value: Respondable): Either<never, unknown> {
    return new Either<never, unknown>({ branch: 'B', responder: toResponder(value) });
  }

  get branch(): Branch {
    return this.held.branch;
  }

  isA(): boolean {
    return this.held.branch === 'A';
  }

  isB(): boolean {
    return this.held.branch === 'B';
  }

  respondTo(req: RequestContext): EitherResponseFuture<EA, EB> {
    switch (this.held.branch) {
      case 'A':
        return new EitherResponseFuture<EA, EB>({ branch: 'A', future: this.held.responder.respondTo(req) });
      case 'B':
        return new EitherResponseFuture<EA, EB>({ branch: 'B', future: this.held.responder.respondTo(req) });
    }
  }
}

/** The in-flight outcome of whichever branch an Either held; the tag never changes. */
export class EitherResponseFuture<EA, EB> extends OutcomeFuture<HttpError> {
  readonly branch: Branch;

  constructor(private readonly inflight: InFlight<EA, EB>) {
    super();
    this.branch = inflight.branch;
  }

  protected async resolve(): Promise<Outcome<HttpError>> {
    switch (this.inflight.branch) {
      case 'A':
        return normalizeOutcome(await this.inflight.future);
      case 'B':
        return normalizeOutcome(await this.inflight.future);
    }
  }
}
