export type JsonObject = Record<string, unknown>;

// JSON Schema fragment describing one feature property
export interface PropertyDescriptor {
  type?: string;
  format?: string;
  title?: string;
  items?: PropertyDescriptor;
  [key: string]: unknown;
}

export interface FlatSchema {
  type?: string;
  title?: string;
  properties?: Record<string, PropertyDescriptor>;
  required?: string[];
}

// Synthetic sub-object holding one group's properties
export interface GroupSchema {
  type: 'object';
  title: string;
  required: string[];
  properties: Record<string, PropertyDescriptor>;
}

export type GroupedSchema = Omit<FlatSchema, 'properties'> & {
  properties: Record<string, PropertyDescriptor | GroupSchema>;
};

export const ORDER_KEY = 'ui:order';
export const WILDCARD = '*';

// react-jsonschema-form ui schema: per-key hint objects plus an optional ui:order list
export type UiHints = Record<string, unknown>;

export interface PropertyGroup {
  viewId: string;
  label: string;
  slug: string;
  order: number;
  pictogram: string | null;
  properties: string[];
}

export interface RenderingRule {
  viewId: string;
  property: string;
  widget: string;
  args: JsonObject;
}

export interface View {
  id: string;
  layerId: string;
  name: string;
  order: number;
  menuGroupId: string | null;
  pictogram: string | null;
  mapStyle: JsonObject;
  uiHints: UiHints;
  settings: JsonObject;
  defaultListProperties: string[];
  titleProperty: string | null;
  visible: boolean;
}

export interface MenuGroup {
  id: string;
  name: string;
  order: number;
  pictogram: string | null;
}

export interface PropertyDefinition {
  key: string;
  jsonSchema: PropertyDescriptor;
  uiSchema: JsonObject;
  required: boolean;
  order: number;
}
