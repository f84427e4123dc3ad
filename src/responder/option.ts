import { HttpResponse } from '../http/response.js';
import { RequestContext } from '../http/request.js';
import { DeferredOutcome, Responder } from './types.js';
import { Ready } from './future.js';

/**
 * Present: the inner responder's outcome, untouched. Absent: 404 with no body.
 */
export class OptionResponder<E, F extends DeferredOutcome<E> = DeferredOutcome<E>>
  implements Responder<E, F | Ready<never>> {
  constructor(private readonly inner: Responder<E, F> | undefined) {}

  get isSome(): boolean {
    return this.inner !== undefined;
  }

  respondTo(req: RequestContext): F | Ready<never> {
    if (this.inner) return this.inner.respondTo(req);
    return Ready.ok(HttpResponse.notFound().finish());
  }
}
