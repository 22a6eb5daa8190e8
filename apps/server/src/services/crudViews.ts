import { randomUUID } from 'node:crypto';
import type { AppConfig } from '../config';
import type { GroupInput, GroupPatch, RenderingInput, RenderingPatch, ViewInput, ViewPatch } from '../schemas';
import type { Stores } from '../stores/types';
import type { Extent, Feature, Layer } from '../types/geo';
import type {
  FlatSchema,
  GroupedSchema,
  JsonObject,
  MenuGroup,
  PropertyDefinition,
  PropertyGroup,
  RenderingRule,
  UiHints,
  View,
} from '../types/schema';
import { collectionExtent, geometryExtent } from '../utils/geometry';
import {
  buildDisplayProperties,
  composeSchema,
  composeUiHints,
  groupFeatureProperties,
  type DisplaySection,
} from './composer';
import { ConfigurationError, NotFoundError } from './errors';
import { GroupRegistry, type GroupWriteResult } from './groups';
import { defaultListProperties, listEligibleProperties } from './listing';
import { RenderingRuleRegistry } from './renderings';
import { sanitizeFeatures, type SanitizeOptions } from './sanitizer';
import { defaultMapStyle } from './styles';
import { syncLayerSchema, syncUiHints } from './sync';
import { propertyKeys, validateView } from './validator';
import type { WidgetRegistry } from './widgets';

export interface SerializedView {
  id: string;
  name: string;
  order: number;
  pictogram: string | null;
  mapStyle: JsonObject;
  formSchema: GroupedSchema;
  uiSchema: UiHints;
  settings: JsonObject;
  layer: Pick<Layer, 'id' | 'name' | 'geometryType'>;
  featureEndpoint: string;
  featureListProperties: string[];
  featureListDefaultProperties: string[];
  featureTitleProperty: string | null;
  extent: Extent;
}

export interface MenuSection {
  id: string | null;
  name: string;
  order: number | null;
  pictogram: string | null;
  views: SerializedView[];
}

export interface FeatureListItem {
  identifier: string;
  title: string;
  properties: Record<string, unknown>;
  detailUrl: string;
  extent: Extent | null;
}

export interface FeatureDetail {
  identifier: string;
  title: string;
  geometry: Feature['geometry'];
  properties: Record<string, unknown>;
  displayProperties: Record<string, DisplaySection>;
}

export const UNCLASSIFIED = 'Unclassified';

const featuresEndpoint = (layerId: string) => `/api/layers/${encodeURIComponent(layerId)}/features`;

/**
 * Entry point for everything the HTTP layer, the Lambda handler and the
 * scripts do with views. Derived documents are recomputed on every call.
 */
export class CrudViewService {
  readonly groups: GroupRegistry;
  readonly renderings: RenderingRuleRegistry;

  constructor(
    private stores: Stores,
    readonly widgets: WidgetRegistry,
    private config: Pick<AppConfig, 'defaultExtent' | 'settings'>,
  ) {
    const keysOf = (viewId: string) => this.propertyKeys(viewId);
    this.groups = new GroupRegistry(stores.groups, keysOf);
    this.renderings = new RenderingRuleRegistry(stores.renderings, widgets, keysOf);
  }

  // ---- derived documents ----

  async getGroupedSchema(viewId: string): Promise<GroupedSchema> {
    const view = await this.requireView(viewId);
    return composeSchema(await this.stores.schemas.read(view.layerId), await this.groups.list(viewId));
  }

  async getGroupedUiHints(viewId: string): Promise<UiHints> {
    await this.requireView(viewId);
    return composeUiHints(await this.stores.uiHints.read(viewId), await this.groups.list(viewId));
  }

  async getListEligibleProperties(viewId: string): Promise<string[]> {
    const view = await this.requireView(viewId);
    return listEligibleProperties(await this.stores.schemas.read(view.layerId), view.uiHints);
  }

  async getDefaultListProperties(viewId: string): Promise<string[]> {
    const view = await this.requireView(viewId);
    return defaultListProperties(view, await this.stores.schemas.read(view.layerId));
  }

  async propertyKeys(viewId: string): Promise<string[]> {
    const view = await this.requireView(viewId);
    return propertyKeys(await this.stores.schemas.read(view.layerId));
  }

  // ---- views ----

  async listViews(): Promise<SerializedView[]> {
    const views = (await this.stores.views.list()).sort((a, b) => a.order - b.order);
    return Promise.all(views.map(view => this.serialize(view)));
  }

  async getView(viewId: string): Promise<SerializedView> {
    return this.serialize(await this.requireView(viewId));
  }

  async createView(input: ViewInput): Promise<SerializedView> {
    await this.requireLayer(input.layerId);
    if (await this.stores.views.findByLayer(input.layerId)) {
      throw new ConfigurationError([{ kind: 'DuplicateView', message: `Layer ${input.layerId} already has a view` }]);
    }
    const view: View = { id: randomUUID(), ...input };
    await this.commitView(view);
    return this.serialize(view);
  }

  async updateView(viewId: string, patch: ViewPatch): Promise<SerializedView> {
    const existing = await this.requireView(viewId);
    const keep = <T>(value: T | undefined, current: T): T => (value === undefined ? current : value);
    const view: View = {
      ...existing,
      name: keep(patch.name, existing.name),
      order: keep(patch.order, existing.order),
      menuGroupId: keep(patch.menuGroupId, existing.menuGroupId),
      pictogram: keep(patch.pictogram, existing.pictogram),
      mapStyle: keep(patch.mapStyle, existing.mapStyle),
      uiHints: keep(patch.uiHints, existing.uiHints),
      settings: keep(patch.settings, existing.settings),
      defaultListProperties: keep(patch.defaultListProperties, existing.defaultListProperties),
      titleProperty: keep(patch.titleProperty, existing.titleProperty),
      visible: keep(patch.visible, existing.visible),
    };
    await this.commitView(view);
    return this.serialize(view);
  }

  /** Removes the view with its property groups and rendering rules. */
  async deleteView(viewId: string): Promise<void> {
    await this.requireView(viewId);
    await this.stores.groups.removeAll(viewId);
    await this.stores.renderings.removeAll(viewId);
    await this.stores.views.remove(viewId);
    console.log(`[VIEWS] Deleted ${viewId}`);
  }

  // ---- property groups and rendering rules ----

  async listGroups(viewId: string): Promise<PropertyGroup[]> {
    await this.requireView(viewId);
    return this.groups.list(viewId);
  }

  async createGroup(viewId: string, input: GroupInput): Promise<GroupWriteResult> {
    await this.requireView(viewId);
    return this.groups.create(viewId, input);
  }

  async updateGroup(viewId: string, slug: string, patch: GroupPatch): Promise<GroupWriteResult> {
    await this.requireView(viewId);
    return this.groups.update(viewId, slug, patch);
  }

  async deleteGroup(viewId: string, slug: string): Promise<void> {
    await this.requireView(viewId);
    await this.groups.remove(viewId, slug);
  }

  async listRenderings(viewId: string): Promise<RenderingRule[]> {
    await this.requireView(viewId);
    return this.renderings.list(viewId);
  }

  async createRendering(viewId: string, input: RenderingInput): Promise<RenderingRule> {
    await this.requireView(viewId);
    return this.renderings.create(viewId, input);
  }

  async updateRendering(viewId: string, property: string, patch: RenderingPatch): Promise<RenderingRule> {
    await this.requireView(viewId);
    return this.renderings.update(viewId, property, patch);
  }

  async deleteRendering(viewId: string, property: string): Promise<void> {
    await this.requireView(viewId);
    await this.renderings.remove(viewId, property);
  }

  // ---- schema maintenance ----

  /**
   * Rewrites the layer schema and the view's ui hints from property definitions,
   * then prunes feature properties when `sanitize` is set.
   */
  async syncProperties(
    viewId: string,
    definitions: readonly PropertyDefinition[],
    { sanitize = false }: { sanitize?: boolean } = {},
  ): Promise<{ schema: FlatSchema; uiHints: UiHints; sanitized: number }> {
    const view = await this.requireView(viewId);
    const groups = await this.groups.list(viewId);
    const conflicts = definitions
      .map(definition => definition.key)
      .filter(key => groups.some(group => group.slug === key && !group.properties.includes(key)));
    if (conflicts.length > 0) {
      throw new ConfigurationError(
        conflicts.map(key => ({
          kind: 'SlugConflict' as const,
          keys: [key],
          message: `Property ${key} collides with the slug of a group that does not list it`,
        })),
      );
    }
    const schema = syncLayerSchema(definitions);
    const uiHints = syncUiHints(definitions);
    await this.stores.schemas.write(view.layerId, schema);
    await this.stores.uiHints.write(viewId, uiHints);
    console.log(`[VIEWS] Synced ${definitions.length} properties for ${viewId}`);
    const sanitized = sanitize ? await this.sanitize(viewId) : 0;
    return { schema, uiHints, sanitized };
  }

  async sanitize(viewId: string, options: SanitizeOptions = {}): Promise<number> {
    const view = await this.requireView(viewId);
    const schema = await this.stores.schemas.read(view.layerId);
    const count = await sanitizeFeatures(
      this.stores.features.iterate(view.layerId),
      schema,
      feature => this.stores.features.save(feature),
      options,
    );
    console.log(`[SANITIZE] ${count} features updated on layer ${view.layerId}`);
    return count;
  }

  // ---- menu and settings ----

  async getMenu(): Promise<MenuSection[]> {
    const visible = await this.visibleViews();
    const serialized = await Promise.all(visible.map(view => this.serialize(view)));
    const sectionViews = (menuGroupId: string | null) =>
      serialized.filter((_view, index) => visible[index].menuGroupId === menuGroupId);

    const menuGroups: MenuGroup[] = (await this.stores.menuGroups.list()).sort((a, b) => a.order - b.order);
    return [
      ...menuGroups.map(group => ({ ...group, views: sectionViews(group.id) })),
      { id: null, name: UNCLASSIFIED, order: null, pictogram: null, views: sectionViews(null) },
    ];
  }

  async getSettings(): Promise<{ menu: MenuSection[]; config: JsonObject }> {
    return { menu: await this.getMenu(), config: { ...this.config.settings } };
  }

  // ---- features ----

  async listFeatures(layerId: string): Promise<FeatureListItem[]> {
    const view = await this.requireLayerView(layerId);
    const listed = await this.getDefaultListProperties(view.id);
    const items: FeatureListItem[] = [];
    for await (const feature of this.stores.features.iterate(layerId)) {
      items.push({
        identifier: feature.identifier,
        title: this.featureTitle(view, feature),
        properties: Object.fromEntries(listed.map(key => [key, feature.properties[key] ?? null] as const)),
        detailUrl: `${featuresEndpoint(layerId)}/${encodeURIComponent(feature.identifier)}`,
        extent: feature.geometry ? geometryExtent(feature.geometry) : null,
      });
    }
    return items;
  }

  async getFeature(layerId: string, identifier: string): Promise<FeatureDetail> {
    const view = await this.requireLayerView(layerId);
    const feature = await this.stores.features.get(layerId, identifier);
    if (!feature) throw new NotFoundError('Feature', `${layerId}/${identifier}`);

    const schema = await this.stores.schemas.read(layerId);
    const groups = await this.groups.list(view.id);
    const rules = await this.renderings.list(view.id);
    return {
      identifier: feature.identifier,
      title: this.featureTitle(view, feature),
      geometry: feature.geometry,
      properties: groupFeatureProperties(feature.properties, groups),
      displayProperties: buildDisplayProperties(feature.properties, schema, groups, (key, value) =>
        this.renderings.render(rules, key, value),
      ),
    };
  }

  async getExtent(layerId: string): Promise<Extent> {
    const geometries: Feature['geometry'][] = [];
    for await (const feature of this.stores.features.iterate(layerId)) geometries.push(feature.geometry);
    return collectionExtent(geometries) ?? this.config.defaultExtent;
  }

  // ---- internals ----

  private async serialize(view: View): Promise<SerializedView> {
    const layer = await this.requireLayer(view.layerId);
    return {
      id: view.id,
      name: view.name,
      order: view.order,
      pictogram: view.pictogram,
      mapStyle: Object.keys(view.mapStyle).length > 0 ? view.mapStyle : defaultMapStyle(layer.geometryType),
      formSchema: await this.getGroupedSchema(view.id),
      uiSchema: await this.getGroupedUiHints(view.id),
      settings: view.settings,
      layer: { id: layer.id, name: layer.name, geometryType: layer.geometryType },
      featureEndpoint: featuresEndpoint(layer.id),
      featureListProperties: listEligibleProperties(layer.schema, view.uiHints),
      featureListDefaultProperties: defaultListProperties(view, layer.schema),
      featureTitleProperty: view.titleProperty,
      extent: await this.getExtent(layer.id),
    };
  }

  private async visibleViews(): Promise<View[]> {
    return (await this.stores.views.list()).filter(view => view.visible).sort((a, b) => a.order - b.order);
  }

  private featureTitle(view: View, feature: Feature): string {
    const value = view.titleProperty ? feature.properties[view.titleProperty] : undefined;
    return value === undefined || value === null ? feature.identifier : String(value);
  }

  private async commitView(view: View): Promise<void> {
    const validation = validateView(view, propertyKeys(await this.stores.schemas.read(view.layerId)));
    if (!validation.ok) throw new ConfigurationError(validation.issues);
    await this.stores.views.save(view);
    console.log(`[VIEWS] Saved ${view.id} (${view.name})`);
  }

  private async requireView(viewId: string): Promise<View> {
    const view = await this.stores.views.get(viewId);
    if (!view) throw new NotFoundError('View', viewId);
    return view;
  }

  private async requireLayerView(layerId: string): Promise<View> {
    const view = await this.stores.views.findByLayer(layerId);
    if (!view) throw new NotFoundError('View for layer', layerId);
    return view;
  }

  private async requireLayer(layerId: string): Promise<Layer> {
    const layer = await this.stores.layers.get(layerId);
    if (!layer) throw new NotFoundError('Layer', layerId);
    return layer;
  }
}
