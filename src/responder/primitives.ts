import { HttpResponse, ResponseBuilder } from '../http/response.js';
import { StatusCode } from '../http/status.js';
import { Responder } from './types.js';
import { Ready } from './future.js';

export const TEXT_PLAIN_UTF8 = 'text/plain; charset=utf-8';
export const OCTET_STREAM = 'application/octet-stream';

export interface PrimitiveAdapter<T> {
  name: string;
  matches(value: unknown): value is T;
  toResponse(value: T): HttpResponse;
}

interface RegisteredAdapter {
  name: string;
  tryConvert(value: unknown): (() => HttpResponse) | undefined;
}

/** Responder for a value whose response is known without waiting. */
export class PrimitiveResponder implements Responder<never, Ready<never>> {
  constructor(private readonly build: () => HttpResponse) {}

  respondTo(): Ready<never> {
    return Ready.ok(this.build());
  }
}

const adapters: RegisteredAdapter[] = [];

export function registerPrimitive<T>(adapter: PrimitiveAdapter<T>) {
  adapters.push({
    name: adapter.name,
    tryConvert: (value) => (adapter.matches(value) ? () => adapter.toResponse(value) : undefined),
  });
}

export function listPrimitives(): string[] {
  return adapters.map(a => a.name);
}

export function primitiveResponder(value: unknown): PrimitiveResponder | undefined {
  for (const adapter of adapters) {
    const build = adapter.tryConvert(value);
    if (build) return new PrimitiveResponder(build);
  }
  return undefined;
}

const text = (value: string) => HttpResponse.build(StatusCode.OK).contentType(TEXT_PLAIN_UTF8).body(value);
const binary = (value: Uint8Array | ArrayBuffer) => HttpResponse.build(StatusCode.OK).contentType(OCTET_STREAM).body(value);

// Built-in table
registerPrimitive({
  name: 'empty',
  matches: (value): value is undefined => value === undefined,
  toResponse: () => HttpResponse.build(StatusCode.OK).finish(),
});
registerPrimitive({
  name: 'text',
  matches: (value): value is string => typeof value === 'string',
  toResponse: text,
});
registerPrimitive({
  name: 'bytes',
  matches: (value): value is Uint8Array => value instanceof Uint8Array,
  toResponse: binary,
});
registerPrimitive({
  name: 'array-buffer',
  matches: (value): value is ArrayBuffer => value instanceof ArrayBuffer,
  toResponse: binary,
});
registerPrimitive({
  name: 'response',
  matches: (value): value is HttpResponse => value instanceof HttpResponse,
  toResponse: (value) => value.clone(),
});
registerPrimitive({
  name: 'builder',
  matches: (value): value is ResponseBuilder => value instanceof ResponseBuilder,
  toResponse: (value) => value.finish(),
});
