import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { OverpassClient } from '../src/services/pois/overpass.client.js';
import { PoiSourceError } from '../src/lib/errors/analysis-errors.js';
import { jsonResponse, routedFetch, silentLogger, stalledResponse } from './helpers/fakes.js';

const A = 'https://a.overpass.test/api/interpreter';
const B = 'https://b.overpass.test/api/interpreter';

function client(fetchImpl: typeof fetch, timeoutMs = 1000): OverpassClient {
  return new OverpassClient({
    endpoints: [A, B],
    timeoutMs,
    userAgent: 'test-agent',
    logger: silentLogger,
    fetchImpl,
    failoverDelayMs: 0
  });
}

describe('OverpassClient', () => {
  it('sends the query as a form body with the configured user agent', async () => {
    const { fetchImpl, calls } = routedFetch({ [A]: () => jsonResponse({ elements: [] }) });

    const res = await client(fetchImpl).query('[out:json];node;out;');

    assert.deepEqual(res, { elements: [] });
    assert.equal(calls.length, 1);
    assert.equal(calls[0].init?.method, 'POST');
    assert.equal(calls[0].init?.body, 'data=%5Bout%3Ajson%5D%3Bnode%3Bout%3B');
    assert.deepEqual(calls[0].init?.headers, {
      'Content-Type': 'application/x-www-form-urlencoded;charset=UTF-8',
      Accept: 'application/json',
      'User-Agent': 'test-agent'
    });
  });

  it('fails over to the next endpoint when the first is overloaded', async () => {
    const { fetchImpl, calls } = routedFetch({
      [A]: () => new Response('busy', { status: 504 }),
      [B]: () => jsonResponse({ elements: [{ type: 'node' }] })
    });

    const res = await client(fetchImpl).query('q');

    assert.equal(res.elements.length, 1);
    assert.deepEqual(calls.map(c => c.url), [A, B]);
  });

  it('fails over on transport errors', async () => {
    const { fetchImpl, calls } = routedFetch({
      [A]: () => {
        throw new TypeError('fetch failed');
      },
      [B]: () => jsonResponse({ elements: [] })
    });

    await client(fetchImpl).query('q');
    assert.equal(calls.length, 2);
  });

  it('does not fail over on other HTTP errors', async () => {
    const { fetchImpl, calls } = routedFetch({
      [A]: () => new Response('bad query', { status: 400 }),
      [B]: () => jsonResponse({ elements: [] })
    });

    await assert.rejects(client(fetchImpl).query('q'), {
      name: 'PoiSourceError',
      message: 'POI source query failed: Overpass HTTP 400'
    });
    assert.equal(calls.length, 1);
  });

  it('rejects payloads without an elements list', async () => {
    const { fetchImpl } = routedFetch({ [A]: () => jsonResponse({ remark: 'runtime error' }) });

    await assert.rejects(client(fetchImpl).query('q'), {
      name: 'PoiSourceError',
      message: 'POI source returned an unexpected payload'
    });
  });

  it('rejects unparseable bodies', async () => {
    const { fetchImpl } = routedFetch({ [A]: () => new Response('<html>', { status: 200 }) });

    await assert.rejects(client(fetchImpl).query('q'), PoiSourceError);
  });

  it('treats a runtime-error remark as a failed query', async () => {
    const remark = 'runtime error: Query timed out in "query" at line 3 after 301 seconds.';
    const { fetchImpl, calls } = routedFetch({
      [A]: () => jsonResponse({ elements: [], remark }),
      [B]: () => jsonResponse({ elements: [] })
    });

    await assert.rejects(client(fetchImpl).query('q'), {
      name: 'PoiSourceError',
      message: `POI source query failed: ${remark}`
    });
    assert.equal(calls.length, 1);
  });

  it('keeps results that carry an informational remark', async () => {
    const { fetchImpl } = routedFetch({
      [A]: () => jsonResponse({ elements: [{ type: 'node' }], remark: 'area data may be stale' })
    });

    const res = await client(fetchImpl).query('q');
    assert.equal(res.elements.length, 1);
    assert.equal(res.remark, 'area data may be stale');
  });

  it('times out a body that stops streaming and fails over', async () => {
    const { fetchImpl, calls } = routedFetch({
      [A]: (_url, init) => stalledResponse('{"elements":[', init?.signal),
      [B]: (_url, init) => stalledResponse('{"elements":[', init?.signal)
    });

    await assert.rejects(client(fetchImpl, 50).query('q'), {
      name: 'PoiSourceError',
      message: `POI source query failed on all endpoints: Overpass ${B} timed out after 50ms`
    });
    assert.equal(calls.length, 2);
  });

  it('throws PoiSourceError once every endpoint failed', async () => {
    const { fetchImpl, calls } = routedFetch({
      [A]: () => new Response('', { status: 429 }),
      [B]: () => new Response('', { status: 503 })
    });

    await assert.rejects(client(fetchImpl).query('q'), {
      name: 'PoiSourceError',
      message: `POI source query failed on all endpoints: Overpass HTTP 503 (overloaded) @ ${B}`
    });
    assert.equal(calls.length, 2);
  });

  it('requires at least one endpoint', () => {
    assert.throws(
      () => new OverpassClient({ endpoints: [], timeoutMs: 1, userAgent: 'x', logger: silentLogger }),
      /at least one endpoint/
    );
  });
});
