import type { CategorizedPois, PoiKind } from './poi.types.js';

/** Wire shape of a POI, as consumed by the map frontend and embedded in prompts. */
export interface PoiRecord {
  lat: number;
  lon: number;
  tags: Record<string, string>;
  type: PoiKind;
}

export function serializeCategorizedPois(pois: CategorizedPois): Record<string, PoiRecord[]> {
  const out: Record<string, PoiRecord[]> = {};
  for (const [category, list] of pois) {
    out[category] = list.map(p => ({
      lat: p.coordinate.lat,
      lon: p.coordinate.lon,
      tags: p.tags,
      type: p.kind
    }));
  }
  return out;
}
