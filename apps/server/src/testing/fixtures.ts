import type { AppConfig } from '../config';

// Fresh snapshot for each test: two point features, one with a null and a stale property
export const sitesSnapshot = () => ({
  layers: [
    {
      id: 'l1',
      name: 'Sites',
      geometryType: 'Point',
      schema: {
        properties: {
          a: { type: 'string', title: 'Alpha' },
          b: { type: 'string' },
          c: { type: 'string' },
          d: { type: 'string', format: 'date' },
        },
        required: ['a', 'b'],
      },
    },
    { id: 'l2', name: 'Empty', geometryType: 'Polygon', schema: null },
    { id: 'l3', name: 'Lines', geometryType: 'LineString', schema: { properties: { name: { type: 'string' } } } },
  ],
  menuGroups: [{ id: 'm1', name: 'Main', order: 0 }],
  views: [
    {
      id: 'v1',
      layerId: 'l1',
      name: 'Sites',
      order: 0,
      menuGroupId: 'm1',
      titleProperty: 'a',
      uiHints: { 'ui:order': ['a', 'c', '*'], c: { 'ui:widget': 'textarea' } },
    },
    { id: 'v2', layerId: 'l2', name: 'Empty', order: 1 },
  ],
  groups: [{ viewId: 'v1', label: 'G1', order: 0, properties: ['a', 'b'] }],
  renderings: [
    { viewId: 'v1', property: 'd', widget: 'date-format', args: { dateStyle: 'short', timeZone: 'UTC' } },
  ],
  features: [
    {
      id: 'f1',
      layerId: 'l1',
      identifier: 'site-1',
      geometry: { type: 'Point', coordinates: [1, 2] },
      properties: { a: 'x', b: null, z: 'orphan', d: '2020-01-31' },
    },
    {
      id: 'f2',
      layerId: 'l1',
      identifier: 'site-2',
      geometry: { type: 'Point', coordinates: [3, -1] },
      properties: { a: 'y' },
    },
  ],
});

export const testConfig: AppConfig = {
  port: 0,
  production: false,
  corsOrigins: [],
  dataFile: 'unused.json',
  defaultExtent: [-180, -90, 180, 90],
  settings: { theme: 'dark' },
};
