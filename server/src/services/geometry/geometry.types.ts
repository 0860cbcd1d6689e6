/**
 * GeoJSON shapes produced by the synthesizer.
 * The schemas double as the validator for model-generated documents,
 * so both construction paths yield the same types.
 */

import { z } from 'zod';
import { SUPER_CATEGORY_KEYS } from '../classification/super-categories.js';

/** `[lon, lat]` */
export const PositionSchema = z.tuple([z.number(), z.number()]);
export type Position = z.infer<typeof PositionSchema>;

export const BoundaryPropertiesSchema = z.object({
  type: z.literal('boundary'),
  name: z.string(),
  fillColor: z.string(),
  fillOpacity: z.number(),
  strokeColor: z.string(),
  strokeWidth: z.number()
});

export const BoundaryFeatureSchema = z.object({
  type: z.literal('Feature'),
  geometry: z.object({
    type: z.literal('Polygon'),
    coordinates: z.array(z.array(PositionSchema).min(4)).min(1)
  }),
  properties: BoundaryPropertiesSchema
});

export const PoiPropertiesSchema = z.object({
  type: z.literal('poi'),
  category: z.string().min(1),
  name: z.string(),
  color: z.string(),
  super_category: z.enum(SUPER_CATEGORY_KEYS).optional(),
  display_name: z.string().optional()
});

export const PoiFeatureSchema = z.object({
  type: z.literal('Feature'),
  geometry: z.object({
    type: z.literal('Point'),
    coordinates: PositionSchema
  }),
  properties: PoiPropertiesSchema
});

export const GeometryFeatureSchema = z.union([BoundaryFeatureSchema, PoiFeatureSchema]);

export const GeometryDocumentSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(GeometryFeatureSchema)
});

export type BoundaryProperties = z.infer<typeof BoundaryPropertiesSchema>;
export type BoundaryFeature = z.infer<typeof BoundaryFeatureSchema>;
export type PoiProperties = z.infer<typeof PoiPropertiesSchema>;
export type PoiFeature = z.infer<typeof PoiFeatureSchema>;
export type GeometryFeature = z.infer<typeof GeometryFeatureSchema>;
export type GeometryDocument = z.infer<typeof GeometryDocumentSchema>;

/**
 * `category`: legacy palette keyed by raw category.
 * `super-category`: colors from the super-category table.
 */
export type ColorMode = 'category' | 'super-category';

export function isBoundaryFeature(feature: GeometryFeature): feature is BoundaryFeature {
  return feature.properties.type === 'boundary';
}

export function isPoiFeature(feature: GeometryFeature): feature is PoiFeature {
  return feature.properties.type === 'poi';
}
