import { RequestContext, InvalidHeaderPolicy } from '../http/request.js';
import { HeaderMap, HeaderValueInput } from '../http/header.js';
import { StatusCode, isStatusCode } from '../http/status.js';
import { HttpError, InvalidHeaderError, InvalidStatusError } from '../errors/http-error.js';
import { DeferredOutcome, Outcome, Responder, failure, success } from './types.js';
import { OutcomeFuture } from './future.js';

interface Overrides {
  status?: StatusCode;
  headers?: HeaderMap;
  statusError?: InvalidStatusError;
  headerError?: InvalidHeaderError;
}

/**
 * Overrides the status code and headers of whatever the wrapped responder produces.
 * The status override and each header name follow last-write-wins.
 *
 * Malformed input never throws here: it is kept as a pending error and the chain goes on.
 * A later valid status clears an earlier invalid one. Whether a pending error fails the
 * request is decided at resolution time by the request's `invalidHeaders` setting.
 *
 * `withStatus` and `withHeader` mutate this decorator and return it, so two chains started
 * from the same instance share their overrides.
 *
 * ```ts
 * withHeader('hello', 'x-version', '1.2.3').withStatus(StatusCode.CREATED)
 * ```
 */
export class CustomResponder<E> implements Responder<E | HttpError, CustomResponseFuture<E>> {
  private overrides: Overrides = {};

  constructor(private readonly responder: Responder<E>) {}

  withStatus(status: StatusCode): this {
    if (isStatusCode(status)) {
      this.overrides.status = status;
      this.overrides.statusError = undefined;
    } else {
      this.overrides.statusError = new InvalidStatusError(status);
    }
    return this;
  }

  withHeader(name: string, value: HeaderValueInput): this {
    if (!this.overrides.headers) this.overrides.headers = new HeaderMap();
    try {
      this.overrides.headers.insert(name, value);
    } catch (e) {
      if (!(e instanceof InvalidHeaderError)) throw e;
      this.overrides.headerError = e;
    }
    return this;
  }

  get pendingError(): HttpError | undefined {
    return this.overrides.headerError ?? this.overrides.statusError;
  }

  respondTo(req: RequestContext): CustomResponseFuture<E> {
    return new CustomResponseFuture(this.responder.respondTo(req), this.overrides, req.settings.invalidHeaders);
  }
}

export class CustomResponseFuture<E> extends OutcomeFuture<E | HttpError> {
  constructor(
    private readonly inner: DeferredOutcome<E>,
    private readonly overrides: Overrides,
    private readonly policy: InvalidHeaderPolicy
  ) {
    super();
  }

  protected async resolve(): Promise<Outcome<E | HttpError>> {
    const outcome = await this.inner;
    if (!outcome.ok) return outcome;
    const pending = this.overrides.headerError ?? this.overrides.statusError;
    if (pending && this.policy === 'fail') return failure(pending);

    // The wrapped responder may hand back a response it keeps using.
    const response = outcome.response.clone();
    if (this.overrides.status !== undefined) {
      response.status = this.overrides.status;
    }
    if (this.overrides.headers) {
      for (const [name, value] of this.overrides.headers.entries()) response.headers.insert(name, value);
    }
    return success(response);
  }
}
