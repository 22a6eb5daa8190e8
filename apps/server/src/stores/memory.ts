import fs from 'node:fs';
import { snapshotSchema, type Snapshot } from '../schemas';
import type { Feature, Layer } from '../types/geo';
import type { MenuGroup, PropertyGroup, RenderingRule, View } from '../types/schema';
import { slugify } from '../utils/slug';
import type {
  FeatureStore,
  GroupStore,
  LayerStore,
  MenuGroupStore,
  RenderingRuleStore,
  SchemaStore,
  Stores,
  UiHintStore,
  ViewStore,
} from './types';

const copy = <T>(value: T): T => structuredClone(value);

/**
 * In-process implementation of every store, used by the dev server, the
 * sanitize script and the tests. Reads hand out copies, writes store copies.
 */
export class MemoryStore implements Stores {
  private layerMap = new Map<string, Layer>();
  private viewMap = new Map<string, View>();
  private featureMap = new Map<string, Feature>();
  private menuGroupList: MenuGroup[] = [];
  private groupList: PropertyGroup[] = [];
  private ruleList: RenderingRule[] = [];

  static fromSnapshot(input: unknown): MemoryStore {
    const snapshot: Snapshot = snapshotSchema.parse(input);
    const store = new MemoryStore();
    snapshot.layers.forEach(layer => store.layerMap.set(layer.id, layer));
    snapshot.views.forEach(view => store.viewMap.set(view.id, view));
    snapshot.features.forEach(feature => store.featureMap.set(feature.id, feature));
    store.menuGroupList = snapshot.menuGroups;
    store.groupList = snapshot.groups.map(group => ({ ...group, slug: slugify(group.label) }));
    store.ruleList = snapshot.renderings;
    return store;
  }

  static fromFile(filePath: string): MemoryStore {
    console.log(`[STORE] Loading snapshot from ${filePath}`);
    return MemoryStore.fromSnapshot(JSON.parse(fs.readFileSync(filePath, 'utf8')));
  }

  toSnapshot(): Snapshot {
    return copy({
      layers: [...this.layerMap.values()],
      menuGroups: this.menuGroupList,
      views: [...this.viewMap.values()],
      groups: this.groupList.map(({ slug: _slug, ...group }) => group),
      renderings: this.ruleList,
      features: [...this.featureMap.values()],
    });
  }

  addLayer(layer: Layer): void {
    this.layerMap.set(layer.id, copy(layer));
  }

  readonly layers: LayerStore = {
    get: async layerId => copy(this.layerMap.get(layerId) ?? null),
  };

  readonly schemas: SchemaStore = {
    read: async layerId => copy(this.layerMap.get(layerId)?.schema ?? null),
    write: async (layerId, schema) => {
      const layer = this.layerMap.get(layerId);
      if (!layer) throw new Error(`Unknown layer: ${layerId}`);
      layer.schema = copy(schema);
    },
  };

  readonly uiHints: UiHintStore = {
    read: async viewId => copy(this.viewMap.get(viewId)?.uiHints ?? {}),
    write: async (viewId, hints) => {
      const view = this.viewMap.get(viewId);
      if (!view) throw new Error(`Unknown view: ${viewId}`);
      view.uiHints = copy(hints);
    },
  };

  readonly views: ViewStore = {
    list: async () => copy([...this.viewMap.values()]),
    get: async viewId => copy(this.viewMap.get(viewId) ?? null),
    findByLayer: async layerId => copy([...this.viewMap.values()].find(view => view.layerId === layerId) ?? null),
    save: async view => {
      this.viewMap.set(view.id, copy(view));
    },
    remove: async viewId => {
      this.viewMap.delete(viewId);
    },
  };

  readonly menuGroups: MenuGroupStore = {
    list: async () => copy(this.menuGroupList),
  };

  readonly groups: GroupStore = {
    list: async viewId => copy(this.groupList.filter(group => group.viewId === viewId)),
    save: async (group, previousSlug = group.slug) => {
      const index = this.groupList.findIndex(item => item.viewId === group.viewId && item.slug === previousSlug);
      if (index >= 0) this.groupList[index] = copy(group);
      else this.groupList.push(copy(group));
    },
    remove: async (viewId, slug) => {
      this.groupList = this.groupList.filter(group => group.viewId !== viewId || group.slug !== slug);
    },
    removeAll: async viewId => {
      this.groupList = this.groupList.filter(group => group.viewId !== viewId);
    },
  };

  readonly renderings: RenderingRuleStore = {
    list: async viewId => copy(this.ruleList.filter(rule => rule.viewId === viewId)),
    save: async (rule, previousProperty = rule.property) => {
      const index = this.ruleList.findIndex(item => item.viewId === rule.viewId && item.property === previousProperty);
      if (index >= 0) this.ruleList[index] = copy(rule);
      else this.ruleList.push(copy(rule));
    },
    remove: async (viewId, property) => {
      this.ruleList = this.ruleList.filter(rule => rule.viewId !== viewId || rule.property !== property);
    },
    removeAll: async viewId => {
      this.ruleList = this.ruleList.filter(rule => rule.viewId !== viewId);
    },
  };

  readonly features: FeatureStore = {
    iterate: layerId => this.iterateFeatures(layerId),
    get: async (layerId, identifier) =>
      copy([...this.featureMap.values()].find(f => f.layerId === layerId && f.identifier === identifier) ?? null),
    save: async feature => {
      this.featureMap.set(feature.id, copy(feature));
    },
  };

  private async *iterateFeatures(layerId: string): AsyncGenerator<Feature> {
    for (const feature of [...this.featureMap.values()]) {
      if (feature.layerId === layerId) yield copy(feature);
    }
  }
}
