/**
 * Area Resolver
 * Forward-geocodes "<area>, <city>" with Nominatim and derives the analysis bounding box.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { BBOX_FALLBACK_HALF_WIDTH_DEG } from '../../config/index.js';
import { withDeadline } from '../../lib/reliability/timeout-guard.js';
import { GeocodeError, errorMessage } from '../../lib/errors/analysis-errors.js';
import { isValidCoordinate, type BoundingBox, type Coordinate } from '../pois/poi.types.js';

/**
 * Nominatim reports coordinates and extents as strings. The extent is left loose;
 * {@link boundingBoxFromExtent} decides whether it is usable.
 */
const NominatimPlaceSchema = z.object({
  lat: z.coerce.number(),
  lon: z.coerce.number(),
  display_name: z.string().optional(),
  boundingbox: z.array(z.union([z.string(), z.number()])).nullish().catch(undefined)
});

const NominatimSearchSchema = z.array(z.unknown());

export type NominatimPlace = z.infer<typeof NominatimPlaceSchema>;

export interface ResolvedArea {
  coordinate: Coordinate;
  boundingBox: BoundingBox;
  displayName: string;
}

export interface AreaResolverOptions {
  searchUrl: string;
  timeoutMs: number;
  userAgent: string;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

/**
 * Square of ±{@link BBOX_FALLBACK_HALF_WIDTH_DEG} around a point.
 */
export function fallbackBoundingBox(center: Coordinate): BoundingBox {
  const d = BBOX_FALLBACK_HALF_WIDTH_DEG;
  return [center.lon - d, center.lat - d, center.lon + d, center.lat + d];
}

/**
 * Reorder Nominatim's `[south, north, west, east]` into `[west, south, east, north]`.
 * Returns null for anything that is not a proper rectangle.
 */
export function boundingBoxFromExtent(extent: ReadonlyArray<string | number> | null | undefined): BoundingBox | null {
  if (!extent || extent.length !== 4) return null;
  const [south, north, west, east] = extent.map(v => (typeof v === 'string' && v.trim() === '' ? NaN : Number(v)));
  if (![south, north, west, east].every(Number.isFinite)) return null;
  if (!(west < east && south < north)) return null;
  return [west, south, east, north];
}

export class AreaResolver {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: AreaResolverOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * @throws GeocodeError when nothing matches or the geocoder cannot be reached
   */
  async resolve(area: string, city: string): Promise<ResolvedArea> {
    const query = `${area}, ${city}`;
    const { logger } = this.options;
    logger.info({ event: 'geocode_start', query }, '[AreaResolver] Geocoding area');

    const place = await this.search(query);

    if (!isValidCoordinate(place.lat, place.lon)) {
      throw new GeocodeError(`Geocoder returned an invalid coordinate for "${query}"`);
    }
    const coordinate: Coordinate = { lat: place.lat, lon: place.lon };

    const extentBox = boundingBoxFromExtent(place.boundingbox);
    const boundingBox = extentBox ?? fallbackBoundingBox(coordinate);

    logger.info(
      { event: 'geocode_ok', query, coordinate, bboxSource: extentBox ? 'extent' : 'fallback' },
      '[AreaResolver] Area resolved'
    );

    return {
      coordinate,
      boundingBox,
      displayName: place.display_name || query
    };
  }

  private async search(query: string): Promise<NominatimPlace> {
    const url = new URL(this.options.searchUrl);
    url.searchParams.set('q', query);
    url.searchParams.set('format', 'json');
    url.searchParams.set('limit', '1');

    let body: unknown;
    try {
      // Deadline covers the body read too
      body = await withDeadline(
        async signal => {
          const res = await this.fetchImpl(url.toString(), {
            headers: { Accept: 'application/json', 'User-Agent': this.options.userAgent },
            signal
          });
          if (!res.ok) throw new Error(`Nominatim HTTP ${res.status}`);
          const json: unknown = await res.json();
          return json;
        },
        this.options.timeoutMs,
        'Nominatim search'
      );
    } catch (err) {
      throw new GeocodeError(`Geocoding failed: ${errorMessage(err)}`, { cause: err });
    }

    const list = NominatimSearchSchema.safeParse(body);
    if (!list.success) {
      throw new GeocodeError('Geocoding failed: unexpected response shape');
    }
    if (list.data.length === 0) {
      throw new GeocodeError(`Could not geocode area/city: "${query}"`);
    }

    const place = NominatimPlaceSchema.safeParse(list.data[0]);
    if (!place.success) {
      throw new GeocodeError(`Geocoder returned an invalid coordinate for "${query}"`);
    }
    return place.data;
  }
}
