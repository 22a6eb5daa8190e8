import { describe, expect, it } from 'vitest';
import { collectionExtent, geometryExtent, mergeExtents } from './geometry';

describe('geometryExtent', () => {
  it('bounds every geometry type', () => {
    expect(geometryExtent({ type: 'Point', coordinates: [2, 3] })).toEqual([2, 3, 2, 3]);
    expect(
      geometryExtent({
        type: 'Polygon',
        coordinates: [[[0, 0], [4, 0], [4, 2], [0, 2], [0, 0]]],
      }),
    ).toEqual([0, 0, 4, 2]);
    expect(
      geometryExtent({
        type: 'GeometryCollection',
        geometries: [
          { type: 'Point', coordinates: [-1, 5] },
          { type: 'LineString', coordinates: [[2, 2], [3, -4]] },
        ],
      }),
    ).toEqual([-1, -4, 3, 5]);
  });

  it('returns null for empty geometries', () => {
    expect(geometryExtent({ type: 'MultiPoint', coordinates: [] })).toBeNull();
  });
});

describe('collectionExtent', () => {
  it('merges non-null geometries', () => {
    expect(
      collectionExtent([{ type: 'Point', coordinates: [1, 2] }, null, { type: 'Point', coordinates: [3, -1] }]),
    ).toEqual([1, -1, 3, 2]);
    expect(collectionExtent([null])).toBeNull();
    expect(mergeExtents(null, [0, 0, 1, 1])).toEqual([0, 0, 1, 1]);
  });
});
