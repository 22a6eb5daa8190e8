import type { FlatSchema } from './schema';

export type Position = [number, number] | [number, number, number];
export type LinearRing = Position[]; // closed (first==last)

export type GeometryType =
  | 'Point'
  | 'MultiPoint'
  | 'LineString'
  | 'MultiLineString'
  | 'Polygon'
  | 'MultiPolygon'
  | 'GeometryCollection';

export type Geometry =
  | { type: 'Point'; coordinates: Position }
  | { type: 'MultiPoint'; coordinates: Position[] }
  | { type: 'LineString'; coordinates: Position[] }
  | { type: 'MultiLineString'; coordinates: Position[][] }
  | { type: 'Polygon'; coordinates: LinearRing[] } // outer ring + holes
  | { type: 'MultiPolygon'; coordinates: LinearRing[][] }
  | { type: 'GeometryCollection'; geometries: Geometry[] };

// [minX, minY, maxX, maxY]
export type Extent = [number, number, number, number];

export type FeatureProperties = Record<string, unknown>;

export interface Feature {
  id: string;
  layerId: string;
  identifier: string;
  geometry: Geometry | null;
  properties: FeatureProperties;
}

export interface Layer {
  id: string;
  name: string;
  geometryType: GeometryType;
  schema: FlatSchema | null;
}
