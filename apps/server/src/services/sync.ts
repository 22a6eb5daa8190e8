import type { FlatSchema, PropertyDefinition, UiHints } from '../types/schema';

const byOrder = (a: PropertyDefinition, b: PropertyDefinition) =>
  a.order - b.order || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0);

// Layer schema rebuilt from the view's property definitions
export function syncLayerSchema(definitions: readonly PropertyDefinition[]): FlatSchema {
  const sorted = [...definitions].sort(byOrder);
  return {
    properties: Object.fromEntries(sorted.map(definition => [definition.key, definition.jsonSchema] as const)),
    required: sorted.filter(definition => definition.required).map(definition => definition.key),
  };
}

export function syncUiHints(definitions: readonly PropertyDefinition[]): UiHints {
  return Object.fromEntries(
    [...definitions]
      .sort(byOrder)
      .filter(definition => Object.keys(definition.uiSchema).length > 0)
      .map(definition => [definition.key, definition.uiSchema] as const),
  );
}
