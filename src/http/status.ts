import { STATUS_CODES } from 'http';

export type StatusCode = number;

export const StatusCode = {
  OK: 200,
  CREATED: 201,
  ACCEPTED: 202,
  NO_CONTENT: 204,
  MOVED_PERMANENTLY: 301,
  FOUND: 302,
  NOT_MODIFIED: 304,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
  NOT_IMPLEMENTED: 501,
  SERVICE_UNAVAILABLE: 503,
} as const;

// Same value space as the wire: any three-digit code is accepted
export function isStatusCode(value: number): boolean {
  return Number.isInteger(value) && value >= 100 && value <= 999;
}

export function reasonPhrase(status: StatusCode): string | undefined {
  return STATUS_CODES[status];
}
