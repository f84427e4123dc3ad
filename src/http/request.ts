import * as http from 'http';

export type InvalidHeaderPolicy = 'fail' | 'drop';

export interface RequestSettings {
  invalidHeaders: InvalidHeaderPolicy;
}

export const defaultRequestSettings: RequestSettings = { invalidHeaders: 'fail' };

export interface RequestContextInit {
  method?: string;
  path?: string;
  query?: URLSearchParams;
  headers?: Record<string, string>;
  ip?: string;
  signal?: AbortSignal;
  settings?: Partial<RequestSettings>;
}

function normalizeHeaders(h: http.IncomingHttpHeaders): Record<string, string> {
  const out: Record<string, string> = {};
  Object.entries(h).forEach(([k, v]) => {
    if (typeof v === 'string') out[k.toLowerCase()] = v;
    else if (Array.isArray(v)) out[k.toLowerCase()] = v.join(', ');
  });
  return out;
}

/**
 * Read-only view of the request handed to every responder.
 */
export class RequestContext {
  readonly method: string;
  readonly path: string;
  readonly query: URLSearchParams;
  readonly headers: Readonly<Record<string, string>>;
  readonly ip: string;
  readonly signal: AbortSignal;
  readonly settings: Readonly<RequestSettings>;

  private constructor(init: RequestContextInit) {
    this.method = (init.method || 'GET').toUpperCase();
    this.path = init.path || '/';
    this.query = init.query || new URLSearchParams();
    this.headers = init.headers || {};
    this.ip = init.ip || 'unknown';
    this.signal = init.signal || new AbortController().signal;
    this.settings = { ...defaultRequestSettings, ...init.settings };
  }

  static create(init: RequestContextInit = {}): RequestContext {
    return new RequestContext(init);
  }

  static fromIncoming(req: http.IncomingMessage, signal: AbortSignal, settings?: Partial<RequestSettings>): RequestContext {
    const url = new URL(req.url || '/', 'http://localhost');
    return new RequestContext({
      method: req.method,
      path: url.pathname,
      query: url.searchParams,
      headers: normalizeHeaders(req.headers),
      ip: req.socket.remoteAddress || 'unknown',
      signal,
      settings,
    });
  }
}
