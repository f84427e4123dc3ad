export { HttpResponse, ResponseBuilder } from './http/response.js';
export type { BodyInput } from './http/response.js';
export { HeaderMap, parseHeaderName, parseHeaderValue } from './http/header.js';
export type { HeaderValueInput } from './http/header.js';
export { StatusCode, isStatusCode, reasonPhrase } from './http/status.js';
export { RequestContext, defaultRequestSettings } from './http/request.js';
export type { InvalidHeaderPolicy, RequestSettings, RequestContextInit } from './http/request.js';

export {
  ErrorCode,
  HttpError,
  InvalidHeaderError,
  InvalidStatusError,
  internalError,
  methodNotAllowed,
  notFound
} from './errors/http-error.js';
export { InternalError, codeForStatus } from './errors/internal-error.js';
export { intoHttpError, registerErrorConversion, listErrorConversions } from './errors/registry.js';
export { errorResponse } from './errors/render.js';

export { isResponder, success, failure } from './responder/types.js';
export type { Responder, Outcome, DeferredOutcome } from './responder/types.js';
export { Ready, OutcomeFuture, ResponseFuture, normalizeOutcome } from './responder/future.js';
export { PrimitiveResponder, registerPrimitive, listPrimitives, TEXT_PLAIN_UTF8, OCTET_STREAM } from './responder/primitives.js';
export type { PrimitiveAdapter } from './responder/primitives.js';
export { OptionResponder } from './responder/option.js';
export { Ok, Err, ok, err, ResultResponder } from './responder/result.js';
export type { Result } from './responder/result.js';
export { CustomResponder, CustomResponseFuture } from './responder/custom.js';
export { Either, EitherResponseFuture } from './responder/either.js';
export type { Branch } from './responder/either.js';
export { toResponder, optional, customize, withStatus, withHeader } from './responder/into.js';
export type { Respondable, CustomPrimitives } from './responder/into.js';

export { respond, handleRequest, writeResponse, renderFailure, createHttpServer, startHttp } from './connectors/http.js';
export type { Handler, Route, HttpOptions } from './connectors/http.js';
export { loadConfig, loadConfigFile, defaultConfig, ConfigError } from './config.js';
export type { ServerConfig } from './config.js';
export { JsonlLogger } from './logging/jsonl.js';
export type { HttpLogEntry } from './logging/jsonl.js';
