import type { Extent, Geometry, Position } from '../types/geo';

const positionsOf = (geometry: Geometry): Position[] => {
  switch (geometry.type) {
    case 'Point':
      return [geometry.coordinates];
    case 'MultiPoint':
    case 'LineString':
      return geometry.coordinates;
    case 'MultiLineString':
    case 'Polygon':
      return geometry.coordinates.flat();
    case 'MultiPolygon':
      return geometry.coordinates.flat(2);
    case 'GeometryCollection':
      return geometry.geometries.flatMap(positionsOf);
  }
};

export const geometryExtent = (geometry: Geometry): Extent | null => {
  const positions = positionsOf(geometry);
  if (positions.length === 0) return null;
  let [minX, minY] = positions[0];
  let [maxX, maxY] = positions[0];
  for (const [x, y] of positions) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }
  return [minX, minY, maxX, maxY];
};

export const mergeExtents = (a: Extent | null, b: Extent | null): Extent | null => {
  if (!a) return b;
  if (!b) return a;
  return [Math.min(a[0], b[0]), Math.min(a[1], b[1]), Math.max(a[2], b[2]), Math.max(a[3], b[3])];
};

// Bounding box of every non-null geometry, null when none has coordinates
export const collectionExtent = (geometries: Iterable<Geometry | null>): Extent | null => {
  let extent: Extent | null = null;
  for (const geometry of geometries) {
    if (geometry) extent = mergeExtents(extent, geometryExtent(geometry));
  }
  return extent;
};
