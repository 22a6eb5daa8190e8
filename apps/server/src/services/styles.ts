import type { GeometryType } from '../types/geo';
import type { JsonObject } from '../types/schema';

const COLOR = '#000';

// Mapbox GL layer style used when a view has none configured
export function defaultMapStyle(geometryType: GeometryType): JsonObject {
  switch (geometryType) {
    case 'Point':
    case 'MultiPoint':
      return { type: 'circle', paint: { 'circle-color': COLOR, 'circle-radius': 8 } };
    case 'LineString':
    case 'MultiLineString':
      return { type: 'line', paint: { 'line-color': COLOR, 'line-width': 3 } };
    default:
      return { type: 'fill', paint: { 'fill-color': COLOR, 'fill-opacity': 0.4 } };
  }
}
