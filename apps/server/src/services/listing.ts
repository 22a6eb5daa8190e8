import type { FlatSchema, PropertyDescriptor, UiHints, View } from '../types/schema';

export const DEFAULT_LIST_SIZE = 8;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isObjectArray = (descriptor: PropertyDescriptor) =>
  descriptor.type === 'array' && descriptor.items?.type === 'object';

const isLongText = (hint: unknown) =>
  isRecord(hint) && (hint['ui:widget'] === 'textarea' || hint['ui:field'] === 'rte');

/**
 * Properties that fit in a feature table: no embedded files (data-url),
 * no arrays of objects and no textarea / rich text fields.
 */
export function listEligibleProperties(schema: FlatSchema | null, uiHints: UiHints): string[] {
  return Object.entries(schema?.properties ?? {})
    .filter(([key, descriptor]) =>
      descriptor.format !== 'data-url' && !isObjectArray(descriptor) && !isLongText(uiHints[key]))
    .map(([key]) => key);
}

export function defaultListProperties(
  view: Pick<View, 'defaultListProperties' | 'uiHints'>,
  schema: FlatSchema | null,
): string[] {
  if (view.defaultListProperties.length > 0) return [...view.defaultListProperties];
  return listEligibleProperties(schema, view.uiHints).slice(0, DEFAULT_LIST_SIZE);
}
