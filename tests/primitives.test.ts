import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { HttpResponse } from '../src/http/response.js';
import { RequestContext } from '../src/http/request.js';
import { Ready } from '../src/responder/future.js';
import { PrimitiveResponder, listPrimitives, registerPrimitive, primitiveResponder } from '../src/responder/primitives.js';
import { toResponder } from '../src/responder/into.js';
import { resolve, expectResponse } from './harness.js';

interface Point {
  x: number;
  y: number;
}

declare module '../src/responder/into.js' {
  interface CustomPrimitives {
    point: Point;
  }
}

const req = RequestContext.create();

describe('primitive responders', () => {
  it('empty value resolves to 200 with no body and no content-type', async () => {
    const res = await expectResponse(undefined);
    assert.equal(res.status, 200);
    assert.equal(res.body, null);
    assert.equal(res.headers.get('content-type'), undefined);
  });

  it('text resolves to 200 text/plain with the utf-8 bytes', async () => {
    const res = await expectResponse('test');
    assert.equal(res.status, 200);
    assert.equal(res.headers.get('content-type'), 'text/plain; charset=utf-8');
    assert.equal(res.bodyText(), 'test');
  });

  it('non-ascii text is encoded as utf-8', async () => {
    const res = await expectResponse('héllo');
    assert.deepEqual(Array.from(res.body ?? []), [0x68, 0xc3, 0xa9, 0x6c, 0x6c, 0x6f]);
  });

  it('Buffer resolves to application/octet-stream', async () => {
    const res = await expectResponse(Buffer.from('test'));
    assert.equal(res.status, 200);
    assert.equal(res.headers.get('content-type'), 'application/octet-stream');
    assert.equal(res.bodyText(), 'test');
  });

  it('Uint8Array resolves to application/octet-stream', async () => {
    const res = await expectResponse(new Uint8Array([116, 101, 115, 116]));
    assert.equal(res.headers.get('content-type'), 'application/octet-stream');
    assert.equal(res.bodyText(), 'test');
  });

  it('ArrayBuffer resolves to application/octet-stream', async () => {
    const bytes = new Uint8Array([1, 2, 3]);
    const res = await expectResponse(bytes.buffer);
    assert.equal(res.headers.get('content-type'), 'application/octet-stream');
    assert.deepEqual(Array.from(res.body ?? []), [1, 2, 3]);
  });

  it('a prebuilt response is passed through as a copy', async () => {
    const prebuilt = HttpResponse.build(418).insertHeader('x-kind', 'teapot').body('short and stout');
    const res = await expectResponse(prebuilt);
    assert.notEqual(res, prebuilt);
    assert.equal(res.status, 418);
    assert.equal(res.headers.get('x-kind'), 'teapot');
    assert.equal(res.bodyText(), 'short and stout');
    res.headers.insert('x-kind', 'kettle');
    assert.equal(prebuilt.headers.get('x-kind'), 'teapot');
  });

  it('a response builder is finished', async () => {
    const res = await expectResponse(HttpResponse.build(202).insertHeader('x-job', 'j-1'));
    assert.equal(res.status, 202);
    assert.equal(res.headers.get('x-job'), 'j-1');
    assert.equal(res.body, null);
  });

  it('primitives never suspend: the outcome is readable synchronously', () => {
    const future = toResponder('now').respondTo(req);
    assert.ok(future instanceof Ready);
    assert.equal(future.outcome.ok, true);
  });

  it('rejects values outside the table', () => {
    const parsed = JSON.parse('[1, 2, 3]');
    assert.throws(() => toResponder(parsed), { name: 'TypeError', message: 'Cannot convert Array into a response' });
  });

  it('lists the built-in adapters in lookup order', () => {
    assert.deepEqual(listPrimitives().slice(0, 6), ['empty', 'text', 'bytes', 'array-buffer', 'response', 'builder']);
  });

  it('accepts shapes added through registerPrimitive', async () => {
    registerPrimitive<Point>({
      name: 'point',
      matches: (value): value is Point =>
        typeof value === 'object' && value !== null && 'x' in value && 'y' in value,
      toResponse: (p) => HttpResponse.ok().contentType('text/plain; charset=utf-8').body(`${p.x},${p.y}`)
    });
    assert.ok(primitiveResponder({ x: 1, y: 2 }) instanceof PrimitiveResponder);
    const outcome = await resolve({ x: 3, y: 4 });
    assert.ok(outcome.ok);
    assert.equal(outcome.response.bodyText(), '3,4');
  });
});
