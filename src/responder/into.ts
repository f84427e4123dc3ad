import { HttpResponse, ResponseBuilder } from '../http/response.js';
import { HeaderValueInput } from '../http/header.js';
import { StatusCode } from '../http/status.js';
import { Responder, isResponder } from './types.js';
import { primitiveResponder } from './primitives.js';
import { OptionResponder } from './option.js';
import { Ok, Err, ResultResponder, ok, err } from './result.js';
import { CustomResponder } from './custom.js';

/**
 * Extra shapes registered with `registerPrimitive` can be made acceptable to the
 * type checker by augmenting this interface:
 *
 * ```ts
 * declare module './responder/into.js' {
 *   interface CustomPrimitives { point: Point }
 * }
 * ```
 */
export interface CustomPrimitives {}

export type Respondable =
  | Responder<unknown>
  | HttpResponse
  | ResponseBuilder
  | string
  | Uint8Array
  | ArrayBuffer
  | null
  | undefined
  | void
  | Ok<Respondable>
  | Err<unknown>
  | readonly [Respondable, StatusCode]
  | CustomPrimitives[keyof CustomPrimitives];

function isStatusTuple(value: unknown): value is readonly [Respondable, StatusCode] {
  return Array.isArray(value) && value.length === 2 && typeof value[1] === 'number';
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name || 'object';
  return typeof value;
}

export function toResponder<E>(value: Responder<E>): Responder<E>;
export function toResponder(value: Respondable): Responder<unknown>;
export function toResponder(value: Respondable): Responder<unknown> {
  if (isResponder(value)) return value;
  if (value === null) return new OptionResponder(undefined);
  if (value instanceof Ok) return new ResultResponder(ok(toResponder(value.value)));
  if (value instanceof Err) return new ResultResponder(err(value.error));
  if (isStatusTuple(value)) return new CustomResponder(toResponder(value[0])).withStatus(value[1]);
  const primitive = primitiveResponder(value);
  if (primitive) return primitive;
  throw new TypeError(`Cannot convert ${describe(value)} into a response`);
}

/** `null` and `undefined` are the absent case. */
export function optional(value: Respondable): OptionResponder<unknown> {
  return new OptionResponder(value === null || value === undefined ? undefined : toResponder(value));
}

export function customize<E>(value: Responder<E>): CustomResponder<E>;
export function customize(value: Respondable): CustomResponder<unknown>;
export function customize(value: Respondable): CustomResponder<unknown> {
  return new CustomResponder(toResponder(value));
}

export function withStatus<E>(value: Responder<E>, status: StatusCode): CustomResponder<E>;
export function withStatus(value: Respondable, status: StatusCode): CustomResponder<unknown>;
export function withStatus(value: Respondable, status: StatusCode): CustomResponder<unknown> {
  return customize(value).withStatus(status);
}

export function withHeader<E>(value: Responder<E>, name: string, headerValue: HeaderValueInput): CustomResponder<E>;
export function withHeader(value: Respondable, name: string, headerValue: HeaderValueInput): CustomResponder<unknown>;
export function withHeader(value: Respondable, name: string, headerValue: HeaderValueInput): CustomResponder<unknown> {
  return customize(value).withHeader(name, headerValue);
}
