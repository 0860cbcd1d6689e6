/**
 * Public request/response contracts for the analysis endpoints.
 */

import { z } from 'zod';
import type { BoundingBox } from '../services/pois/poi.types.js';
import type { PoiRecord } from '../services/pois/poi.serialize.js';
import type { ChartEntry } from '../services/aggregation/aggregator.js';
import type { GeometryDocument } from '../services/geometry/geometry.types.js';

const nonEmpty = z.string().trim().min(1);

export const AnalyzeAreaRequestSchema = z.object({
  city: nonEmpty,
  area: nonEmpty
});

export const AreaGeometryRequestSchema = AnalyzeAreaRequestSchema.extend({
  colorMode: z.enum(['category', 'super-category']).default('super-category'),
  enrich: z.boolean().default(true)
});

export type AnalyzeAreaRequest = z.infer<typeof AnalyzeAreaRequestSchema>;
export type AreaGeometryRequest = z.infer<typeof AreaGeometryRequestSchema>;

export interface GeocodeDto {
  lat: number;
  lon: number;
  display_name: string;
}

/** Pie chart libraries key slices by `name`/`value`. */
export interface PieSliceDto {
  name: string;
  value: number;
  color: string;
}

export interface AreaAnalysisResponse {
  summary: string;
  pie_chart_data: PieSliceDto[];
  ai_rating: number;
  geocode: GeocodeDto;
  bbox: BoundingBox;
  geojson: GeometryDocument;
  pois: Record<string, PoiRecord[]>;
}

export interface AreaGeometryResponse {
  geocode: GeocodeDto;
  bbox: BoundingBox;
  geojson: GeometryDocument;
}

export interface ErrorResponse {
  error: string;
  stage: string;
  details?: unknown;
}

export function toPieSlices(entries: readonly ChartEntry[]): PieSliceDto[] {
  return entries.map(e => ({ name: e.label, value: e.count, color: e.color }));
}
