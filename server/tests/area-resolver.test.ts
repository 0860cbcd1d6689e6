import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  AreaResolver,
  boundingBoxFromExtent,
  fallbackBoundingBox
} from '../src/services/area/area-resolver.service.js';
import { GeocodeError } from '../src/lib/errors/analysis-errors.js';
import { jsonResponse, routedFetch, silentLogger, stalledResponse } from './helpers/fakes.js';

const NOMINATIM = 'https://nominatim.test/search';

function resolver(fetchImpl: typeof fetch, timeoutMs = 1000): AreaResolver {
  return new AreaResolver({
    searchUrl: NOMINATIM,
    timeoutMs,
    userAgent: 'test-agent',
    logger: silentLogger,
    fetchImpl
  });
}

describe('fallbackBoundingBox', () => {
  it('builds a ±0.009° square around the point', () => {
    assert.deepEqual(fallbackBoundingBox({ lat: 12.97, lon: 77.59 }), [
      77.59 - 0.009,
      12.97 - 0.009,
      77.59 + 0.009,
      12.97 + 0.009
    ]);
  });
});

describe('boundingBoxFromExtent', () => {
  it('reorders [south, north, west, east] into [west, south, east, north]', () => {
    assert.deepEqual(boundingBoxFromExtent(['12.9', '13.0', '77.5', '77.7']), [77.5, 12.9, 77.7, 13.0]);
  });

  it('rejects missing, short, non-numeric and degenerate extents', () => {
    assert.equal(boundingBoxFromExtent(undefined), null);
    assert.equal(boundingBoxFromExtent(['1', '2', '3']), null);
    assert.equal(boundingBoxFromExtent(['a', '2', '3', '4']), null);
    assert.equal(boundingBoxFromExtent(['2', '2', '3', '4']), null);
    assert.equal(boundingBoxFromExtent(['1', '2', '4', '3']), null);
    assert.equal(boundingBoxFromExtent(['', '2', '3', '4']), null);
    assert.equal(boundingBoxFromExtent(null), null);
  });

  it('accepts numeric extents', () => {
    assert.deepEqual(boundingBoxFromExtent([12.9, 13.0, 77.5, 77.6]), [77.5, 12.9, 77.6, 13.0]);
  });
});

describe('AreaResolver', () => {
  it('queries "<area>, <city>" and uses the reported extent', async () => {
    const { fetchImpl, calls } = routedFetch({
      [NOMINATIM]: () =>
        jsonResponse([
          {
            lat: '12.9352',
            lon: '77.6245',
            display_name: 'Koramangala, Bengaluru, Karnataka, India',
            boundingbox: ['12.9152', '12.9552', '77.6045', '77.6445']
          }
        ])
    });

    const result = await resolver(fetchImpl).resolve('Koramangala', 'Bengaluru');

    assert.deepEqual(result, {
      coordinate: { lat: 12.9352, lon: 77.6245 },
      boundingBox: [77.6045, 12.9152, 77.6445, 12.9552],
      displayName: 'Koramangala, Bengaluru, Karnataka, India'
    });

    const url = new URL(calls[0].url);
    assert.equal(url.searchParams.get('q'), 'Koramangala, Bengaluru');
    assert.equal(url.searchParams.get('format'), 'json');
    assert.equal(url.searchParams.get('limit'), '1');
    assert.deepEqual(calls[0].init?.headers, { Accept: 'application/json', 'User-Agent': 'test-agent' });
  });

  it('synthesizes the fallback square when no extent is reported', async () => {
    const { fetchImpl } = routedFetch({
      [NOMINATIM]: () => jsonResponse([{ lat: '12.97', lon: '77.59' }])
    });

    const result = await resolver(fetchImpl).resolve('MG Road', 'Bengaluru');

    assert.deepEqual(result.coordinate, { lat: 12.97, lon: 77.59 });
    assert.deepEqual(result.boundingBox, [77.59 - 0.009, 12.97 - 0.009, 77.59 + 0.009, 12.97 + 0.009]);
    assert.equal(result.displayName, 'MG Road, Bengaluru');
  });

  it('uses a numeric extent as reported', async () => {
    const { fetchImpl } = routedFetch({
      [NOMINATIM]: () => jsonResponse([{ lat: '12.97', lon: '77.59', boundingbox: [12.9, 13.0, 77.5, 77.6] }])
    });

    const result = await resolver(fetchImpl).resolve('A', 'B');
    assert.deepEqual(result.boundingBox, [77.5, 12.9, 77.6, 13.0]);
  });

  it('falls back to the square when the extent is null or malformed', async () => {
    for (const boundingbox of [null, 'oops', [{}, 1, 2, 3]]) {
      const { fetchImpl } = routedFetch({
        [NOMINATIM]: () => jsonResponse([{ lat: '12.97', lon: '77.59', boundingbox }])
      });

      const result = await resolver(fetchImpl).resolve('A', 'B');
      assert.deepEqual(result.boundingBox, [77.59 - 0.009, 12.97 - 0.009, 77.59 + 0.009, 12.97 + 0.009]);
    }
  });

  it('fails with GeocodeError when nothing matches', async () => {
    const { fetchImpl } = routedFetch({ [NOMINATIM]: () => jsonResponse([]) });

    await assert.rejects(resolver(fetchImpl).resolve('Nowhere', 'Atlantis'), {
      name: 'GeocodeError',
      message: 'Could not geocode area/city: "Nowhere, Atlantis"'
    });
  });

  it('fails with GeocodeError on HTTP errors', async () => {
    const { fetchImpl } = routedFetch({ [NOMINATIM]: () => new Response('', { status: 503 }) });

    await assert.rejects(resolver(fetchImpl).resolve('a', 'b'), {
      name: 'GeocodeError',
      message: 'Geocoding failed: Nominatim HTTP 503'
    });
  });

  it('fails with GeocodeError when the geocoder is unreachable', async () => {
    const { fetchImpl } = routedFetch({});

    await assert.rejects(resolver(fetchImpl).resolve('a', 'b'), (err: unknown) => {
      assert.ok(err instanceof GeocodeError);
      assert.equal(err.statusCode, 500);
      assert.equal(err.stage, 'geocode');
      return true;
    });
  });

  it('fails with GeocodeError when the coordinate is unusable', async () => {
    const { fetchImpl } = routedFetch({
      [NOMINATIM]: () => jsonResponse([{ lat: 'n/a', lon: '77.59' }])
    });

    await assert.rejects(resolver(fetchImpl).resolve('a', 'b'), GeocodeError);
  });

  it('fails with GeocodeError on timeout', async () => {
    const { fetchImpl } = routedFetch({
      [NOMINATIM]: (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    });

    await assert.rejects(resolver(fetchImpl, 20).resolve('a', 'b'), {
      name: 'GeocodeError',
      message: 'Geocoding failed: Nominatim search timed out after 20ms'
    });
  });

  it('fails with GeocodeError when the body stops streaming', async () => {
    const { fetchImpl } = routedFetch({
      [NOMINATIM]: (_url, init) => stalledResponse('[{"lat":', init?.signal)
    });

    await assert.rejects(resolver(fetchImpl, 20).resolve('a', 'b'), {
      name: 'GeocodeError',
      message: 'Geocoding failed: Nominatim search timed out after 20ms'
    });
  });
});
