import { HttpResponse } from '../http/response.js';
import { StatusCode } from '../http/status.js';
import { InternalError } from '../errors/internal-error.js';
import { Route } from '../connectors/http.js';
import { Either } from '../responder/either.js';
import { optional, withHeader, withStatus } from '../responder/into.js';
import { ok, err } from '../responder/result.js';

export class DemoStore {
  private notes = new Map<string, string>();

  constructor(seed: Record<string, string> = {}) {
    for (const [id, text] of Object.entries(seed)) this.notes.set(id, text);
  }

  get(id: string): string | undefined {
    return this.notes.get(id);
  }

  put(id: string, text: string): boolean {
    const created = !this.notes.has(id);
    this.notes.set(id, text);
    return created;
  }

  ids(): string[] {
    return Array.from(this.notes.keys()).sort();
  }
}

export const SERVICE_VERSION = '1.0.0';

export function demoRoutes(store = new DemoStore({ hello: 'Welcome!' })): Route[] {
  return [
    { method: 'GET', path: '/health', handler: () => 'ok' },
    {
      method: 'GET',
      path: '/v1/version',
      handler: () => withHeader(SERVICE_VERSION, 'x-version', SERVICE_VERSION)
    },
    { method: 'GET', path: '/v1/notes', handler: () => store.ids().join('\n') },
    {
      method: 'GET',
      path: '/v1/note',
      handler: (req) => optional(store.get(req.query.get('id') || '') ?? null)
    },
    {
      method: 'GET',
      path: '/v1/note/raw',
      handler: (req) => {
        const text = store.get(req.query.get('id') || '');
        return text === undefined ? null : Buffer.from(text, 'utf8');
      }
    },
    {
      method: 'GET',
      path: '/v1/note/strict',
      handler: (req) => {
        const id = req.query.get('id');
        if (!id) return err(new InternalError('missing id', StatusCode.BAD_REQUEST));
        const text = store.get(id);
        return text === undefined ? err(new InternalError(`note ${id} not found`, StatusCode.NOT_FOUND)) : ok(text);
      }
    },
    {
      method: 'PUT',
      path: '/v1/note',
      handler: (req) => {
        const id = req.query.get('id');
        const text = req.query.get('text');
        if (!id || text === null) return new InternalError('id and text are required', StatusCode.BAD_REQUEST);
        const created = store.put(id, text);
        return [undefined, created ? StatusCode.CREATED : StatusCode.NO_CONTENT] as const;
      }
    },
    {
      method: 'GET',
      path: '/v1/register',
      handler: (req) =>
        req.query.get('valid') === 'true'
          ? Either.b(HttpResponse.ok().contentType('text/html').body('Hello!'))
          : Either.a(withStatus('Bad data', StatusCode.BAD_REQUEST))
    }
  ];
}
