import { HttpResponse } from '../http/response.js';
import { HttpError } from './http-error.js';

export function errorResponse(error: HttpError): HttpResponse {
  return HttpResponse.build(error.status)
    .contentType('application/json')
    .body(JSON.stringify(error.toJSON()));
}
