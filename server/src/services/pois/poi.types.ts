/**
 * Core geographic and POI types shared across the pipeline.
 */

export interface Coordinate {
  lat: number;
  lon: number;
}

/** `[west, south, east, north]` in degrees. */
export type BoundingBox = [west: number, south: number, east: number, north: number];

export type PoiKind = 'node' | 'way-or-relation';

export interface RawPoi {
  coordinate: Coordinate;
  /** Tag-derived label, e.g. `cafe` or `shop_bakery`. Never empty. */
  category: string;
  tags: Record<string, string>;
  kind: PoiKind;
}

/**
 * Raw category → POIs, in extraction order.
 * A Map keeps first-seen category order, which the legacy palette depends on.
 */
export type CategorizedPois = Map<string, RawPoi[]>;

export function isValidCoordinate(lat: number, lon: number): boolean {
  return (
    Number.isFinite(lat) &&
    Number.isFinite(lon) &&
    lat >= -90 &&
    lat <= 90 &&
    lon >= -180 &&
    lon <= 180
  );
}

export function countPois(pois: CategorizedPois): number {
  let total = 0;
  for (const list of pois.values()) total += list.length;
  return total;
}
