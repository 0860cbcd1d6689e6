import type { Coordinate } from './poi.types.js';
import { OVERPASS_QUERY_TIMEOUT_S } from '../../config/index.js';

/**
 * Tag families fetched around the area center.
 * railway is restricted to passenger stops; the rest match any value.
 */
const TAG_FILTERS = [
  '["amenity"]',
  '["leisure"]',
  '["shop"]',
  '["office"]',
  '["public_transport"]',
  '["railway"~"^(station|halt|tram_stop)$"]',
  '["healthcare"]',
  '["education"]'
] as const;

/**
 * Build the Overpass QL union query for every POI family within `radiusMeters`.
 * `out center` makes ways/relations report a centroid.
 */
export function buildPoiQuery(center: Coordinate, radiusMeters: number): string {
  const { lat, lon } = center;
  const around = `(around:${radiusMeters},${lat},${lon})`;
  const lines = TAG_FILTERS.map(filter => `  nwr${filter}${around};`);

  return [`[out:json][timeout:${OVERPASS_QUERY_TIMEOUT_S}];`, '(', ...lines, ');', 'out center;'].join('\n');
}
