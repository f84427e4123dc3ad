import { HeaderMap, HeaderValueInput } from './header.js';
import { StatusCode, isStatusCode } from './status.js';
import { InvalidStatusError } from '../errors/http-error.js';

export type BodyInput = string | Uint8Array | ArrayBuffer;

function toBytes(data: BodyInput): Uint8Array {
  if (typeof data === 'string') return Buffer.from(data, 'utf8');
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

export class HttpResponse {
  status: StatusCode;
  headers: HeaderMap;
  body: Uint8Array | null;

  constructor(status: StatusCode = StatusCode.OK, headers = new HeaderMap(), body: Uint8Array | null = null) {
    if (!isStatusCode(status)) throw new InvalidStatusError(status);
    this.status = status;
    this.headers = headers;
    this.body = body;
  }

  static build(status: StatusCode): ResponseBuilder {
    return new ResponseBuilder(status);
  }

  static ok(): ResponseBuilder {
    return new ResponseBuilder(StatusCode.OK);
  }

  static notFound(): ResponseBuilder {
    return new ResponseBuilder(StatusCode.NOT_FOUND);
  }

  /** Copy with its own header map; the body bytes are shared and never written to. */
  clone(): HttpResponse {
    return new HttpResponse(this.status, this.headers.clone(), this.body);
  }

  bodyText(): string {
    return this.body ? Buffer.from(this.body).toString('utf8') : '';
  }

  contentLength(): number {
    return this.body ? this.body.byteLength : 0;
  }
}

/**
 * Accumulates status, headers and body for a single response.
 * Header methods validate eagerly and throw InvalidHeaderError.
 */
export class ResponseBuilder {
  private statusCode: StatusCode;
  private headers = new HeaderMap();

  constructor(status: StatusCode = StatusCode.OK) {
    if (!isStatusCode(status)) throw new InvalidStatusError(status);
    this.statusCode = status;
  }

  status(status: StatusCode): this {
    if (!isStatusCode(status)) throw new InvalidStatusError(status);
    this.statusCode = status;
    return this;
  }

  contentType(value: string): this {
    this.headers.insert('content-type', value);
    return this;
  }

  insertHeader(name: string, value: HeaderValueInput): this {
    this.headers.insert(name, value);
    return this;
  }

  appendHeader(name: string, value: HeaderValueInput): this {
    this.headers.append(name, value);
    return this;
  }

  body(data: BodyInput): HttpResponse {
    return new HttpResponse(this.statusCode, this.headers.clone(), toBytes(data));
  }

  finish(): HttpResponse {
    return new HttpResponse(this.statusCode, this.headers.clone(), null);
  }
}
