import type { Feature, Layer } from '../types/geo';
import type { FlatSchema, MenuGroup, PropertyGroup, RenderingRule, UiHints, View } from '../types/schema';

export interface LayerStore {
  get(layerId: string): Promise<Layer | null>;
}

export interface SchemaStore {
  read(layerId: string): Promise<FlatSchema | null>;
  write(layerId: string, schema: FlatSchema): Promise<void>;
}

export interface UiHintStore {
  read(viewId: string): Promise<UiHints>;
  write(viewId: string, hints: UiHints): Promise<void>;
}

export interface ViewStore {
  list(): Promise<View[]>;
  get(viewId: string): Promise<View | null>;
  findByLayer(layerId: string): Promise<View | null>;
  save(view: View): Promise<void>;
  remove(viewId: string): Promise<void>;
}

export interface MenuGroupStore {
  list(): Promise<MenuGroup[]>;
}

export interface GroupStore {
  list(viewId: string): Promise<PropertyGroup[]>;
  /** inserts, or replaces the group stored under `previousSlug` */
  save(group: PropertyGroup, previousSlug?: string): Promise<void>;
  remove(viewId: string, slug: string): Promise<void>;
  removeAll(viewId: string): Promise<void>;
}

export interface RenderingRuleStore {
  list(viewId: string): Promise<RenderingRule[]>;
  save(rule: RenderingRule, previousProperty?: string): Promise<void>;
  remove(viewId: string, property: string): Promise<void>;
  removeAll(viewId: string): Promise<void>;
}

export interface FeatureStore {
  iterate(layerId: string): AsyncIterable<Feature>;
  get(layerId: string, identifier: string): Promise<Feature | null>;
  save(feature: Feature): Promise<void>;
}

export interface Stores {
  layers: LayerStore;
  schemas: SchemaStore;
  uiHints: UiHintStore;
  views: ViewStore;
  menuGroups: MenuGroupStore;
  groups: GroupStore;
  renderings: RenderingRuleStore;
  features: FeatureStore;
}
