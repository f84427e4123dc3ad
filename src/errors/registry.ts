import { HttpError, internalError } from './http-error.js';

type ErrorClass<E> = new (...args: never[]) => E;

interface ErrorConversion {
  name: string;
  tryConvert(error: unknown): HttpError | undefined;
}

const conversions: ErrorConversion[] = [];

/**
 * Registers how instances of `errorClass` become an HttpError.
 * Later registrations take precedence over earlier ones.
 */
export function registerErrorConversion<E>(errorClass: ErrorClass<E>, convert: (error: E) => HttpError) {
  conversions.unshift({
    name: errorClass.name,
    tryConvert: (error) => (error instanceof errorClass ? convert(error) : undefined),
  });
}

export function listErrorConversions(): string[] {
  return conversions.map(c => c.name);
}

export function intoHttpError(error: unknown): HttpError {
  for (const conversion of conversions) {
    const converted = conversion.tryConvert(error);
    if (converted) return converted;
  }
  if (error instanceof HttpError) return error;
  if (error instanceof Error) return internalError(error.message || 'Internal server error', error);
  return internalError(String(error), error);
}
