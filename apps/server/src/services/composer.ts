import type { FeatureProperties } from '../types/geo';
import {
  ORDER_KEY,
  WILDCARD,
  type FlatSchema,
  type GroupedSchema,
  type PropertyGroup,
  type UiHints,
} from '../types/schema';
import type { DuplicateGroupMembership } from './errors';

export type ComposableGroup = Pick<PropertyGroup, 'slug' | 'label' | 'order' | 'properties'>;

export interface DisplaySection {
  title: string;
  order: number;
  pictogram: string | null;
  properties: Record<string, unknown>;
}

export const DEFAULT_SECTION = '__default__';
const DEFAULT_SECTION_ORDER = 9999;

const byLabel = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/** Ascending `order`, ties broken by label. Never mutates the input. */
export const orderGroups = <G extends Pick<PropertyGroup, 'order' | 'label'>>(groups: readonly G[]): G[] =>
  [...groups].sort((a, b) => a.order - b.order || byLabel(a.label, b.label));

/**
 * Assigns each key to the first group (in display order) that lists it.
 * When `available` is given, keys outside it are dropped.
 */
export const claimGroupKeys = <G extends ComposableGroup>(
  groups: readonly G[],
  available?: ReadonlySet<string>,
): Array<{ group: G; keys: string[] }> => {
  const claimed = new Set<string>();
  return orderGroups(groups).map(group => {
    const keys: string[] = [];
    for (const key of group.properties) {
      if (claimed.has(key) || (available && !available.has(key))) continue;
      claimed.add(key);
      keys.push(key);
    }
    return { group, keys };
  });
};

export const findDuplicateMemberships = (groups: readonly ComposableGroup[]): DuplicateGroupMembership[] => {
  const owners = new Map<string, string[]>();
  for (const group of orderGroups(groups)) {
    for (const key of new Set(group.properties)) {
      owners.set(key, [...(owners.get(key) ?? []), group.slug]);
    }
  }
  return [...owners.entries()]
    .filter(([, slugs]) => slugs.length > 1)
    .map(([key, slugs]) => ({ kind: 'DuplicateGroupMembership' as const, key, groups: slugs }));
};

export const propertyTitle = (schema: FlatSchema | null, key: string): string =>
  schema?.properties?.[key]?.title ?? key;

/**
 * Nests grouped properties under one synthetic object per group, keyed by slug.
 * Grouped keys move from the top-level `required` list into their group's own list;
 * ungrouped keys follow the groups in their original order. An ungrouped key equal
 * to a group slug is left out: the group entry owns that name.
 */
export function composeSchema(flatSchema: FlatSchema | null, groups: readonly ComposableGroup[]): GroupedSchema {
  if (!flatSchema) return { properties: {} };
  const source = structuredClone(flatSchema);
  const flatProperties = source.properties ?? {};
  if (groups.length === 0) {
    return { ...source, properties: flatProperties };
  }

  const required = source.required;
  const properties: GroupedSchema['properties'] = {};
  const claimed = new Set<string>();

  for (const { group, keys } of claimGroupKeys(groups, new Set(Object.keys(flatProperties)))) {
    keys.forEach(key => claimed.add(key));
    properties[group.slug] = {
      type: 'object',
      title: group.label,
      required: keys.filter(key => required?.includes(key)),
      properties: Object.fromEntries(keys.map(key => [key, flatProperties[key]] as const)),
    };
  }

  const slugs = new Set(Object.keys(properties));
  const topLevel = (key: string) => !claimed.has(key) && !slugs.has(key);
  for (const [key, descriptor] of Object.entries(flatProperties)) {
    if (topLevel(key)) properties[key] = descriptor;
  }

  const grouped: GroupedSchema = { ...source, properties };
  if (required) grouped.required = required.filter(topLevel);
  return grouped;
}

const readOrder = (hints: UiHints): string[] | null => {
  const order = hints[ORDER_KEY];
  return Array.isArray(order) ? order.filter((key): key is string => typeof key === 'string') : null;
};

/**
 * Applies the same regrouping to the ui schema. Each group gets its own `ui:order`
 * ending with the wildcard; the top-level order lists group slugs then the wildcard.
 */
export function composeUiHints(flatHints: UiHints, groups: readonly ComposableGroup[]): UiHints {
  const hints = structuredClone(flatHints);
  if (groups.length === 0) return hints;

  const rootOrder = readOrder(hints) ?? [];
  const claims = claimGroupKeys(groups);
  const groupEntries: UiHints = {};

  for (const { group, keys } of claims) {
    const groupHints: UiHints = {};
    const groupOrder: string[] = [];

    for (const key of keys) {
      if (Object.hasOwn(hints, key)) {
        groupHints[key] = hints[key];
        delete hints[key];
      }
      const position = rootOrder.indexOf(key);
      if (position >= 0) {
        rootOrder.splice(position, 1);
        groupOrder.push(key);
      }
    }

    groupOrder.push(WILDCARD);
    groupEntries[group.slug] = { [ORDER_KEY]: groupOrder, ...groupHints };
  }

  // Group entries replace any flat hint stored under the same name
  Object.assign(hints, groupEntries);

  hints[ORDER_KEY] = [...claims.map(({ group }) => group.slug), WILDCARD];
  return hints;
}

/** Feature properties nested by group slug; every group key is present, null when unset. */
export function groupFeatureProperties(
  properties: FeatureProperties,
  groups: readonly ComposableGroup[],
): Record<string, unknown> {
  const remaining = { ...properties };
  const grouped: Record<string, unknown> = {};

  for (const { group, keys } of claimGroupKeys(groups)) {
    const values: Record<string, unknown> = {};
    for (const key of keys) {
      values[key] = remaining[key] ?? null;
      delete remaining[key];
    }
    grouped[group.slug] = values;
  }

  for (const [key, value] of Object.entries(remaining)) {
    if (!Object.hasOwn(grouped, key)) grouped[key] = value;
  }
  return grouped;
}

export function buildDisplayProperties(
  properties: FeatureProperties,
  schema: FlatSchema | null,
  groups: ReadonlyArray<ComposableGroup & Pick<PropertyGroup, 'pictogram'>>,
  render: (key: string, value: unknown) => unknown = (_key, value) => value,
): Record<string, DisplaySection> {
  const sections: Record<string, DisplaySection> = {};
  const claimed = new Set<string>();
  const display = (keys: string[]) =>
    Object.fromEntries(keys.map(key => [propertyTitle(schema, key), render(key, properties[key] ?? null)] as const));

  for (const { group, keys } of claimGroupKeys(groups)) {
    keys.forEach(key => claimed.add(key));
    sections[group.slug] = {
      title: group.label,
      order: group.order,
      pictogram: group.pictogram,
      properties: display(keys),
    };
  }

  const remaining = Object.keys(schema?.properties ?? {}).filter(key => !claimed.has(key));
  if (remaining.length > 0) {
    sections[DEFAULT_SECTION] = { title: '', order: DEFAULT_SECTION_ORDER, pictogram: null, properties: display(remaining) };
  }
  return sections;
}
