import { z } from 'zod';
import type { Geometry, Position } from './types/geo';
import type { PropertyDescriptor } from './types/schema';

const position: z.ZodType<Position> = z.union([
  z.tuple([z.number(), z.number()]),
  z.tuple([z.number(), z.number(), z.number()]),
]);

export const geometrySchema: z.ZodType<Geometry, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal('Point'), coordinates: position }),
    z.object({ type: z.literal('MultiPoint'), coordinates: z.array(position) }),
    z.object({ type: z.literal('LineString'), coordinates: z.array(position) }),
    z.object({ type: z.literal('MultiLineString'), coordinates: z.array(z.array(position)) }),
    z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(position)) }),
    z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(z.array(position))) }),
    z.object({ type: z.literal('GeometryCollection'), geometries: z.array(geometrySchema) }),
  ]),
);

export const propertyDescriptorSchema: z.ZodType<PropertyDescriptor, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      type: z.string().optional(),
      format: z.string().optional(),
      title: z.string().optional(),
      items: propertyDescriptorSchema.optional(),
    })
    .passthrough(),
);

export const flatSchemaSchema = z.object({
  type: z.string().optional(),
  title: z.string().optional(),
  properties: z.record(propertyDescriptorSchema).optional(),
  required: z.array(z.string()).optional(),
});

const jsonObject = z.record(z.unknown());
const key = z.string().min(1);

export const geometryTypeSchema = z.enum([
  'Point',
  'MultiPoint',
  'LineString',
  'MultiLineString',
  'Polygon',
  'MultiPolygon',
  'GeometryCollection',
]);

export const viewInputSchema = z.object({
  layerId: key,
  name: z.string().min(1).max(100),
  order: z.number().int().min(0),
  menuGroupId: z.string().nullable().default(null),
  pictogram: z.string().nullable().default(null),
  mapStyle: jsonObject.default({}),
  uiHints: jsonObject.default({}),
  settings: jsonObject.default({}),
  defaultListProperties: z.array(key).default([]),
  titleProperty: key.nullable().default(null),
  visible: z.boolean().default(true),
});

export const viewPatchSchema = viewInputSchema.omit({ layerId: true }).partial().strict();

export const groupInputSchema = z.object({
  label: z.string().min(1).max(50),
  order: z.number().int().min(0).default(0),
  pictogram: z.string().nullable().default(null),
  properties: z.array(key).default([]),
});

export const groupPatchSchema = groupInputSchema.partial().strict();

export const renderingInputSchema = z.object({
  property: key,
  widget: key,
  args: jsonObject.default({}),
});

export const renderingPatchSchema = renderingInputSchema.partial().strict();

export const propertyDefinitionSchema = z.object({
  key,
  jsonSchema: propertyDescriptorSchema,
  uiSchema: jsonObject.default({}),
  required: z.boolean().default(false),
  order: z.number().int().default(0),
});

export const syncPropertiesSchema = z.object({ properties: z.array(propertyDefinitionSchema) });

export const sanitizeOptionsSchema = z.object({
  pruneStale: z.boolean().default(true),
  pruneNull: z.boolean().default(true),
});

export const snapshotSchema = z.object({
  layers: z.array(
    z.object({
      id: key,
      name: z.string(),
      geometryType: geometryTypeSchema,
      schema: flatSchemaSchema.nullable().default(null),
    }),
  ),
  menuGroups: z
    .array(z.object({ id: key, name: z.string(), order: z.number().int(), pictogram: z.string().nullable().default(null) }))
    .default([]),
  views: z.array(viewInputSchema.extend({ id: key })).default([]),
  groups: z.array(groupInputSchema.extend({ viewId: key })).default([]),
  renderings: z.array(renderingInputSchema.extend({ viewId: key })).default([]),
  features: z
    .array(
      z.object({
        id: key,
        layerId: key,
        identifier: key,
        geometry: geometrySchema.nullable().default(null),
        properties: jsonObject.default({}),
      }),
    )
    .default([]),
});

export type Snapshot = z.infer<typeof snapshotSchema>;
export type ViewInput = z.infer<typeof viewInputSchema>;
export type ViewPatch = z.infer<typeof viewPatchSchema>;
export type GroupInput = z.infer<typeof groupInputSchema>;
export type GroupPatch = z.infer<typeof groupPatchSchema>;
export type RenderingInput = z.infer<typeof renderingInputSchema>;
export type RenderingPatch = z.infer<typeof renderingPatchSchema>;
