import type { BoundingBox, CategorizedPois } from '../pois/poi.types.js';
import { serializeCategorizedPois } from '../pois/poi.serialize.js';
import { BOUNDARY_STYLE } from '../../config/index.js';
import type { Message } from '../../llm/types.js';
import type { ColorMode } from './geometry.types.js';

export function buildGeometryMessages(
  area: string,
  city: string,
  pois: CategorizedPois,
  bbox: BoundingBox,
  mode: ColorMode
): Message[] {
  const colorRule =
    mode === 'category'
      ? '- color: (assign a unique color to each category)'
      : '- super_category / display_name: the grouping of the category\n- color: (one color per super_category)';

  const prompt = `Create a complete GeoJSON FeatureCollection for ${area}, ${city} that includes:

1. A boundary polygon feature with these properties:
   - type: "boundary"
   - name: "${area}, ${city}"
   - fillColor: "${BOUNDARY_STYLE.fillColor}"
   - fillOpacity: ${BOUNDARY_STYLE.fillOpacity}
   - strokeColor: "${BOUNDARY_STYLE.strokeColor}"
   - strokeWidth: ${BOUNDARY_STYLE.strokeWidth}

2. Point features for each POI in this data:
${JSON.stringify(serializeCategorizedPois(pois), null, 2)}

The boundary should be a simple polygon that covers the bounding box [west, south, east, north] = ${JSON.stringify(bbox)}

Each POI should have these properties:
- type: "poi"
- category: (the POI category)
- name: (the POI name if available, otherwise use the category)
${colorRule}

Use [lon, lat] coordinate order and copy POI coordinates exactly.
Return ONLY valid GeoJSON with no additional text or explanations.`;

  return [
    { role: 'system', content: 'You produce GeoJSON documents for map rendering.' },
    { role: 'user', content: prompt }
  ];
}
