import { InvalidHeaderError } from '../errors/http-error.js';

// RFC 7230 token
const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
// Visible ASCII, space, tab and obs-text; no CR, LF or NUL
const FIELD_VALUE = /^[\t\x20-\x7e\x80-\xff]*$/;

export type HeaderValueInput = string | number;

export function parseHeaderName(raw: string): string {
  if (!TOKEN.test(raw)) {
    throw new InvalidHeaderError(`Invalid header name: ${JSON.stringify(raw)}`, { name: raw });
  }
  return raw.toLowerCase();
}

export function parseHeaderValue(raw: HeaderValueInput): string {
  const value = typeof raw === 'number' ? String(raw) : raw;
  if (!FIELD_VALUE.test(value)) {
    throw new InvalidHeaderError(`Invalid header value: ${JSON.stringify(value)}`, { value });
  }
  return value;
}

/**
 * Multi-valued header collection keyed by lower-cased name.
 * Names are kept in first-insertion order.
 */
export class HeaderMap {
  private entriesByName = new Map<string, string[]>();

  static from(init: Record<string, HeaderValueInput | HeaderValueInput[]>): HeaderMap {
    const map = new HeaderMap();
    for (const [name, value] of Object.entries(init)) {
      for (const v of Array.isArray(value) ? value : [value]) map.append(name, v);
    }
    return map;
  }

  append(name: string, value: HeaderValueInput): this {
    const key = parseHeaderName(name);
    const parsed = parseHeaderValue(value);
    const existing = this.entriesByName.get(key);
    if (existing) existing.push(parsed);
    else this.entriesByName.set(key, [parsed]);
    return this;
  }

  insert(name: string, value: HeaderValueInput): this {
    this.entriesByName.set(parseHeaderName(name), [parseHeaderValue(value)]);
    return this;
  }

  get(name: string): string | undefined {
    return this.entriesByName.get(name.toLowerCase())?.[0];
  }

  getAll(name: string): string[] {
    return [...(this.entriesByName.get(name.toLowerCase()) || [])];
  }

  has(name: string): boolean {
    return this.entriesByName.has(name.toLowerCase());
  }

  delete(name: string): boolean {
    return this.entriesByName.delete(name.toLowerCase());
  }

  keys(): string[] {
    return Array.from(this.entriesByName.keys());
  }

  get size(): number {
    let total = 0;
    for (const values of this.entriesByName.values()) total += values.length;
    return total;
  }

  *entries(): IterableIterator<[string, string]> {
    for (const [name, values] of this.entriesByName) {
      for (const value of values) yield [name, value];
    }
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries();
  }

  // Shape accepted by ServerResponse.writeHead
  toRecord(): Record<string, string | string[]> {
    const out: Record<string, string | string[]> = {};
    for (const [name, values] of this.entriesByName) {
      out[name] = values.length === 1 ? values[0] : [...values];
    }
    return out;
  }

  clone(): HeaderMap {
    const copy = new HeaderMap();
    for (const [name, values] of this.entriesByName) copy.entriesByName.set(name, [...values]);
    return copy;
  }
}
