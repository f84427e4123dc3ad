import * as http from 'http';
import { RequestContext, RequestSettings } from '../http/request.js';
import { HttpResponse } from '../http/response.js';
import { StatusCode } from '../http/status.js';
import { ErrorCode, HttpError, internalError, methodNotAllowed, notFound } from '../errors/http-error.js';
import { intoHttpError } from '../errors/registry.js';
import { errorResponse } from '../errors/render.js';
import { Outcome, failure } from '../responder/types.js';
import { normalizeOutcome } from '../responder/future.js';
import { EitherResponseFuture } from '../responder/either.js';
import { Respondable, toResponder } from '../responder/into.js';
import { JsonlLogger } from '../logging/jsonl.js';
import { ServerConfig } from '../config.js';

export type Handler = (req: RequestContext) => Respondable | Promise<Respondable>;

export interface Route {
  method: string;
  path: string;
  handler: Handler;
}

export interface HttpOptions {
  logger?: JsonlLogger;
  settings?: Partial<RequestSettings>;
}

const BODYLESS = new Set<number>([204, 304]);

/**
 * Converts a handler's return value and drives its outcome to completion once,
 * with the failure normalized.
 */
export async function respond(value: Respondable, req: RequestContext): Promise<Outcome<HttpError>> {
  return normalizeOutcome(await toResponder(value).respondTo(req));
}

export function writeResponse(res: http.ServerResponse, response: HttpResponse): number {
  const headers: http.OutgoingHttpHeaders = response.headers.toRecord();
  const bodyless = BODYLESS.has(response.status) || response.status < 200;
  const bytes = bodyless ? 0 : response.contentLength();
  if (!bodyless) headers['content-length'] = String(bytes);
  res.writeHead(response.status, headers);
  if (bodyless || !response.body) res.end();
  else res.end(response.body);
  return bytes;
}

export function renderFailure(error: HttpError): HttpResponse {
  try {
    return errorResponse(error);
  } catch (e: unknown) {
    // status outside the wire value space
    return errorResponse(internalError(error.message, e));
  }
}

export async function handleRequest(
  routes: Route[],
  req: http.IncomingMessage,
  res: http.ServerResponse,
  options: HttpOptions = {}
): Promise<void> {
  const reqStartTime = process.hrtime.bigint();
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });

  const ctx = RequestContext.fromIncoming(req, controller.signal, options.settings);
  const logger = options.logger;
  const elapsedMs = () => Math.round(Number(process.hrtime.bigint() - reqStartTime) / 1e6);

  let outcome: Outcome<HttpError>;
  let branch: string | undefined;
  let allowed: string[] = [];

  const candidates = routes.filter(r => r.path === ctx.path);
  const route = candidates.find(r => r.method.toUpperCase() === ctx.method);
  if (candidates.length === 0) {
    outcome = failure(notFound(`No route for ${ctx.path}`));
  } else if (!route) {
    allowed = candidates.map(r => r.method.toUpperCase());
    outcome = failure(methodNotAllowed(allowed));
  } else {
    try {
      const value = await route.handler(ctx);
      const future = toResponder(value).respondTo(ctx);
      if (future instanceof EitherResponseFuture) branch = future.branch;
      outcome = normalizeOutcome(await future);
    } catch (e: unknown) {
      console.error(`[HTTP] Handler for ${ctx.method} ${ctx.path} failed:`, e);
      outcome = failure(intoHttpError(e));
    }
  }

  if (controller.signal.aborted) {
    logger?.log({ ts: new Date().toISOString(), event: 'http_request_aborted', ip: ctx.ip, method: ctx.method, path: ctx.path, durMs: elapsedMs(), branch });
    return;
  }

  let response: HttpResponse;
  if (outcome.ok) {
    response = outcome.response;
  } else {
    response = renderFailure(outcome.error);
    if (outcome.error.code === ErrorCode.METHOD_NOT_ALLOWED && allowed.length > 0) {
      response.headers.insert('allow', allowed.join(', '));
    }
  }

  const bytes = writeResponse(res, response);
  logger?.log({
    ts: new Date().toISOString(),
    event: 'http_request_complete',
    ip: ctx.ip,
    method: ctx.method,
    path: ctx.path,
    status: response.status,
    durMs: elapsedMs(),
    bytes,
    ...(outcome.ok ? {} : { error: outcome.error.message, code: String(outcome.error.code) }),
    ...(branch ? { branch } : {})
  });
}

export function createHttpServer(routes: Route[], options: HttpOptions = {}): http.Server {
  return http.createServer((req, res) => {
    handleRequest(routes, req, res, options).catch((e: unknown) => {
      console.error('[HTTP] Unhandled error while responding:', e);
      if (!res.headersSent) res.writeHead(StatusCode.INTERNAL_SERVER_ERROR);
      res.end();
    });
  });
}

export function startHttp(routes: Route[], config: ServerConfig, logger?: JsonlLogger): http.Server {
  const server = createHttpServer(routes, {
    logger: logger || (config.logEnabled ? new JsonlLogger(config.logPath) : undefined),
    settings: { invalidHeaders: config.invalidHeaders }
  });
  server.listen(config.port, config.bind);
  return server;
}
