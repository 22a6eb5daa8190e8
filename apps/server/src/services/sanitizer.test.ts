import { describe, expect, it, vi } from 'vitest';
import type { Feature } from '../types/geo';
import type { FlatSchema } from '../types/schema';
import { sanitizeFeatures, sanitizeProperties } from './sanitizer';

const schema: FlatSchema = { properties: { a: { type: 'string' }, b: { type: 'string' } } };

const feature = (identifier: string, properties: Feature['properties']): Feature => ({
  id: identifier,
  layerId: 'layer',
  identifier,
  geometry: null,
  properties,
});

describe('sanitizeProperties', () => {
  it('removes stale keys and null values', () => {
    const properties = { a: 'x', b: null, z: 'orphan' };
    expect(sanitizeProperties(properties, schema)).toEqual(['b', 'z']);
    expect(properties).toEqual({ a: 'x' });
  });

  it('runs each pass on its own', () => {
    const keepNull = { a: 'x', b: null, z: 'orphan' };
    sanitizeProperties(keepNull, schema, { pruneNull: false });
    expect(keepNull).toEqual({ a: 'x', b: null });

    const keepStale = { a: 'x', b: null, z: 'orphan' };
    sanitizeProperties(keepStale, schema, { pruneStale: false });
    expect(keepStale).toEqual({ a: 'x', z: 'orphan' });
  });

  it('strips nothing when the layer has no schema', () => {
    const properties = { a: null, z: 'orphan' };
    expect(sanitizeProperties(properties, null)).toEqual([]);
    expect(sanitizeProperties(properties, { required: [] })).toEqual([]);
    expect(properties).toEqual({ a: null, z: 'orphan' });
  });
});

describe('sanitizeFeatures', () => {
  it('saves only changed features and counts them', async () => {
    const features = [feature('one', { a: 'x', b: null, z: 'orphan' }), feature('two', { a: 'y' })];
    const save = vi.fn(async (_feature: Feature) => {});

    await expect(sanitizeFeatures(features, schema, save)).resolves.toBe(1);
    expect(save).toHaveBeenCalledTimes(1);
    expect(save.mock.calls[0][0].identifier).toBe('one');
    expect(features[0].properties).toEqual({ a: 'x' });
  });

  it('is a no-op the second time', async () => {
    const features = [feature('one', { a: 'x', b: null, z: 'orphan' })];
    const save = vi.fn(async (_feature: Feature) => {});

    await sanitizeFeatures(features, schema, save);
    await expect(sanitizeFeatures(features, schema, save)).resolves.toBe(0);
    expect(save).toHaveBeenCalledTimes(1);
  });

  it('consumes async sequences', async () => {
    async function* stream() {
      yield feature('one', { z: 1 });
      yield feature('two', { a: null });
    }
    await expect(sanitizeFeatures(stream(), schema, async () => {})).resolves.toBe(2);
  });
});
