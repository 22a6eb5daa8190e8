import type { Feature, FeatureProperties } from '../types/geo';
import type { FlatSchema } from '../types/schema';

export interface SanitizeOptions {
  /** drop keys the schema no longer declares */
  pruneStale?: boolean;
  /** drop keys holding null */
  pruneNull?: boolean;
}

/**
 * Removes stale and/or null keys from `properties` in place.
 * Returns the removed keys; a layer without schema strips nothing.
 */
export function sanitizeProperties(
  properties: FeatureProperties,
  schema: FlatSchema | null,
  { pruneStale = true, pruneNull = true }: SanitizeOptions = {},
): string[] {
  if (!schema?.properties) return [];
  const schemaKeys = new Set(Object.keys(schema.properties));
  const removed: string[] = [];

  for (const key of Object.keys(properties)) {
    const stale = pruneStale && !schemaKeys.has(key);
    const empty = pruneNull && properties[key] === null;
    if (stale || empty) {
      delete properties[key];
      removed.push(key);
    }
  }
  return removed;
}

/**
 * Batch pass over a layer's features. Each feature is handled on its own and
 * saved only when its property map changed. Returns the number of saved features.
 */
export async function sanitizeFeatures(
  features: AsyncIterable<Feature> | Iterable<Feature>,
  schema: FlatSchema | null,
  save: (feature: Feature) => Promise<void>,
  options: SanitizeOptions = {},
): Promise<number> {
  let mutated = 0;
  for await (const feature of features) {
    const removed = sanitizeProperties(feature.properties, schema, options);
    if (removed.length === 0) continue;
    console.log(`[SANITIZE] ${feature.identifier}: removed ${removed.join(', ')}`);
    await save(feature);
    mutated += 1;
  }
  return mutated;
}
