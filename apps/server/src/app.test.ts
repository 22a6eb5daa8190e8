import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp, createService } from './app';
import { MemoryStore } from './stores/memory';
import { sitesSnapshot, testConfig } from './testing/fixtures';

describe('HTTP API', () => {
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    const app = createApp(createService(testConfig, MemoryStore.fromSnapshot(sitesSnapshot())), testConfig);
    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('Server has no port');
    baseUrl = `http://127.0.0.1:${address.port}/api`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  });

  const send = (method: string, path: string, body?: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

  it('answers health checks', async () => {
    const response = await send('GET', '/health');
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true });
  });

  it('serves the grouped schema and ui schema of a view', async () => {
    const schema = await send('GET', '/views/v1/schema');
    expect(schema.status).toBe(200);
    expect(await schema.json()).toMatchObject({ properties: { g1: { type: 'object', required: ['a', 'b'] } }, required: [] });

    const uiSchema = await send('GET', '/views/v1/ui-schema');
    expect(await uiSchema.json()).toEqual({
      'ui:order': ['g1', '*'],
      c: { 'ui:widget': 'textarea' },
      g1: { 'ui:order': ['a', '*'] },
    });
  });

  it('returns list properties', async () => {
    const response = await send('GET', '/views/v1/list-properties');
    expect(await response.json()).toEqual({ available: ['a', 'b', 'd'], default: ['a', 'b', 'd'] });
  });

  it('creates, updates and deletes property groups', async () => {
    const created = await send('POST', '/views/v1/groups', { label: 'Dates', order: 1, properties: ['d'] });
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({
      group: { viewId: 'v1', label: 'Dates', slug: 'dates', order: 1, pictogram: null, properties: ['d'] },
      warnings: [],
    });

    const updated = await send('PATCH', '/views/v1/groups/dates', { label: 'When' });
    expect(await updated.json()).toMatchObject({ group: { slug: 'when' } });

    const deleted = await send('DELETE', '/views/v1/groups/when');
    expect(deleted.status).toBe(204);

    const listed = await send('GET', '/views/v1/groups');
    expect(await listed.json()).toMatchObject([{ slug: 'g1' }]);
  });

  it('rejects invalid configuration with every issue', async () => {
    const response = await send('POST', '/views/v1/groups', { label: 'G1', properties: ['ghost'] });
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      error: 'Invalid configuration',
      issues: [{ kind: 'UnknownProperty', keys: ['ghost'] }, { kind: 'DuplicateGroup' }],
    });
  });

  it('rejects bodies of the wrong shape', async () => {
    const response = await send('POST', '/views/v1/renderings', { property: 'c' });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Invalid configuration',
      issues: [{ kind: 'InvalidBody', message: 'widget: Required' }],
    });
  });

  it('rejects malformed JSON', async () => {
    const response = await fetch(`${baseUrl}/views/v1/groups`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"label":',
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Invalid configuration',
      issues: [{ kind: 'InvalidBody', message: 'body: malformed JSON' }],
    });
  });

  it('answers 404 for unknown views', async () => {
    const response = await send('GET', '/views/nope');
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found', message: 'View not found: nope' });
  });

  it('syncs properties and sanitizes when asked', async () => {
    const response = await send('PUT', '/views/v1/properties?sanitize=true', {
      properties: [{ key: 'a', jsonSchema: { type: 'string' }, required: true }],
    });
    expect(await response.json()).toEqual({
      schema: { properties: { a: { type: 'string' } }, required: ['a'] },
      uiHints: {},
      sanitized: 1,
    });
  });

  it('sanitizes on demand with options', async () => {
    const response = await send('POST', '/views/v1/sanitize', { pruneNull: false });
    expect(await response.json()).toEqual({ sanitized: 1 });

    const feature = await send('GET', '/layers/l1/features/site-1');
    expect(await feature.json()).toMatchObject({ properties: { g1: { a: 'x', b: null }, d: '2020-01-31' } });
  });

  it('serves the menu and client settings', async () => {
    const response = await send('GET', '/settings');
    expect(await response.json()).toMatchObject({
      menu: [{ name: 'Main' }, { name: 'Unclassified' }],
      config: { theme: 'dark' },
    });
  });

  it('lists the registered widgets', async () => {
    const response = await send('GET', '/widgets');
    expect(await response.json()).toEqual([
      { id: 'date-format', label: 'Formatted date' },
      { id: 'data-url-to-img', label: 'Image from data URL' },
      { id: 'file-ahref', label: 'Download link' },
    ]);
  });
});
