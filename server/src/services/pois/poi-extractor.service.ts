/**
 * POI Extractor
 * Queries Overpass around a coordinate and groups the elements by raw category.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { OverpassClient } from './overpass.client.js';
import { buildPoiQuery } from './overpass.query.js';
import {
  countPois,
  isValidCoordinate,
  type CategorizedPois,
  type Coordinate,
  type RawPoi
} from './poi.types.js';
import { DEFAULT_POI_RADIUS_METERS } from '../../config/index.js';

const LatLonSchema = z.object({ lat: z.number(), lon: z.number() });

const OverpassElementSchema = z.object({
  type: z.enum(['node', 'way', 'relation']),
  id: z.number().optional(),
  lat: z.number().optional(),
  lon: z.number().optional(),
  center: LatLonSchema.optional(),
  tags: z.record(z.string(), z.string()).optional()
});

export type OverpassElement = z.infer<typeof OverpassElementSchema>;

/**
 * Tag key → raw category builder, in precedence order.
 */
const CATEGORY_PRECEDENCE: ReadonlyArray<readonly [string, (value: string) => string]> = [
  ['amenity', v => v],
  ['shop', v => `shop_${v}`],
  ['leisure', v => `leisure_${v}`],
  ['healthcare', v => `healthcare_${v}`],
  ['building', v => `building_${v}`],
  ['office', v => `office_${v}`],
  ['public_transport', () => 'public_transport'],
  ['railway', v => `railway_${v}`]
];

/**
 * First-match category derivation. Returns null when no recognized key is present.
 */
export function deriveCategory(tags: Record<string, string>): string | null {
  for (const [key, build] of CATEGORY_PRECEDENCE) {
    const value = tags[key];
    if (typeof value === 'string' && value.length > 0) return build(value);
  }
  return null;
}

/**
 * Nodes carry their own point; ways/relations report `center`.
 */
export function elementCoordinate(el: OverpassElement): Coordinate | null {
  if (el.type === 'node') {
    const { lat, lon } = el;
    return lat !== undefined && lon !== undefined && isValidCoordinate(lat, lon) ? { lat, lon } : null;
  }
  if (el.center && isValidCoordinate(el.center.lat, el.center.lon)) {
    return { lat: el.center.lat, lon: el.center.lon };
  }
  return null;
}

/**
 * Normalize raw Overpass elements into categorized POIs.
 * Malformed elements, elements without coordinates and untagged elements are dropped.
 */
export function categorizeElements(elements: readonly unknown[]): CategorizedPois {
  const out: CategorizedPois = new Map();

  for (const raw of elements) {
    const parsed = OverpassElementSchema.safeParse(raw);
    if (!parsed.success) continue;
    const el = parsed.data;

    const coordinate = elementCoordinate(el);
    if (!coordinate) continue;

    const tags = el.tags ?? {};
    const category = deriveCategory(tags);
    if (!category) continue;

    const poi: RawPoi = {
      coordinate,
      category,
      tags,
      kind: el.type === 'node' ? 'node' : 'way-or-relation'
    };

    const bucket = out.get(category);
    if (bucket) bucket.push(poi);
    else out.set(category, [poi]);
  }

  return out;
}

export class PoiExtractor {
  constructor(
    private readonly client: OverpassClient,
    private readonly logger: Logger
  ) {}

  /**
   * @throws PoiSourceError when the upstream query fails outright
   */
  async extract(center: Coordinate, radiusMeters: number = DEFAULT_POI_RADIUS_METERS): Promise<CategorizedPois> {
    const query = buildPoiQuery(center, radiusMeters);
    const response = await this.client.query(query);
    const categorized = categorizeElements(response.elements);

    this.logger.info(
      {
        event: 'pois_extracted',
        radiusMeters,
        elements: response.elements.length,
        retained: countPois(categorized),
        categories: categorized.size
      },
      '[PoiExtractor] Elements categorized'
    );

    return categorized;
  }
}
