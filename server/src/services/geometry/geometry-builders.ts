/**
 * Deterministic GeoJSON construction.
 * Pure functions of their inputs; the synthesizer falls back to these.
 */

import { BOUNDARY_STYLE, LEGACY_CATEGORY_PALETTE } from '../../config/index.js';
import { classify } from '../classification/category-classifier.js';
import { getSuperCategoryRule } from '../classification/super-categories.js';
import type { BoundingBox, CategorizedPois, RawPoi } from '../pois/poi.types.js';
import type {
  BoundaryFeature,
  ColorMode,
  GeometryDocument,
  PoiFeature,
  PoiProperties,
  Position
} from './geometry.types.js';

/**
 * Ring SW → NW → NE → SE → SW.
 */
export function boundaryRing(bbox: BoundingBox): Position[] {
  const [west, south, east, north] = bbox;
  return [
    [west, south],
    [west, north],
    [east, north],
    [east, south],
    [west, south]
  ];
}

export function buildBoundaryFeature(area: string, city: string, bbox: BoundingBox): BoundaryFeature {
  return {
    type: 'Feature',
    geometry: { type: 'Polygon', coordinates: [boundaryRing(bbox)] },
    properties: {
      type: 'boundary',
      name: `${area}, ${city}`,
      ...BOUNDARY_STYLE
    }
  };
}

/**
 * Legacy palette: one color per raw category, in first-seen order, cycling.
 */
export function assignCategoryColors(pois: CategorizedPois): Map<string, string> {
  const colors = new Map<string, string>();
  let index = 0;
  for (const category of pois.keys()) {
    colors.set(category, LEGACY_CATEGORY_PALETTE[index % LEGACY_CATEGORY_PALETTE.length]);
    index++;
  }
  return colors;
}

function poiName(poi: RawPoi, category: string): string {
  const name = poi.tags.name;
  return typeof name === 'string' && name.length > 0 ? name : category;
}

function poiProperties(poi: RawPoi, category: string, mode: ColorMode, legacyColor: string): PoiProperties {
  const name = poiName(poi, category);
  if (mode === 'category') {
    return { type: 'poi', category, name, color: legacyColor };
  }
  const rule = getSuperCategoryRule(classify(category));
  return {
    type: 'poi',
    super_category: rule.key,
    display_name: rule.displayName,
    category,
    name,
    color: rule.color
  };
}

/**
 * One point feature per POI, in category then extraction order.
 */
export function buildPoiFeatures(pois: CategorizedPois, mode: ColorMode): PoiFeature[] {
  const legacyColors = mode === 'category' ? assignCategoryColors(pois) : null;
  const features: PoiFeature[] = [];

  for (const [category, list] of pois) {
    const legacyColor = legacyColors?.get(category) ?? '';
    for (const poi of list) {
      features.push({
        type: 'Feature',
        geometry: { type: 'Point', coordinates: [poi.coordinate.lon, poi.coordinate.lat] },
        properties: poiProperties(poi, category, mode, legacyColor)
      });
    }
  }

  return features;
}

export function buildBoundaryDocument(area: string, city: string, bbox: BoundingBox): GeometryDocument {
  return { type: 'FeatureCollection', features: [buildBoundaryFeature(area, city, bbox)] };
}

export function buildPoiDocument(pois: CategorizedPois, mode: ColorMode): GeometryDocument {
  return { type: 'FeatureCollection', features: buildPoiFeatures(pois, mode) };
}

/**
 * Boundary first, then every POI.
 */
export function buildDeterministicDocument(
  area: string,
  city: string,
  pois: CategorizedPois,
  bbox: BoundingBox,
  mode: ColorMode
): GeometryDocument {
  return {
    type: 'FeatureCollection',
    features: [buildBoundaryFeature(area, city, bbox), ...buildPoiFeatures(pois, mode)]
  };
}
