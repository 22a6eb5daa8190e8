import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryStore } from '../stores/memory';
import { sitesSnapshot } from '../testing/fixtures';
import { NotFoundError } from './errors';
import { RenderingRuleRegistry } from './renderings';
import { createWidgetRegistry } from './widgets';

describe('RenderingRuleRegistry', () => {
  let registry: RenderingRuleRegistry;

  beforeEach(() => {
    const store = MemoryStore.fromSnapshot(sitesSnapshot());
    registry = new RenderingRuleRegistry(store.renderings, createWidgetRegistry(), async () => ['a', 'b', 'c', 'd']);
  });

  it('stores valid rules and lists them by property', async () => {
    await registry.create('v1', { property: 'c', widget: 'file-ahref', args: { text: 'Get it' } });
    expect((await registry.list('v1')).map(rule => rule.property)).toEqual(['c', 'd']);
  });

  it('reports every problem of a rule at once', async () => {
    await expect(registry.create('v1', { property: 'ghost', widget: 'nope', args: {} })).rejects.toMatchObject({
      issues: [
        { kind: 'UnknownProperty', keys: ['ghost'] },
        { kind: 'UnknownWidget', message: 'Unknown widget: nope' },
      ],
    });
  });

  it('allows a single rule per property', async () => {
    await expect(registry.create('v1', { property: 'd', widget: 'file-ahref', args: {} })).rejects.toMatchObject({
      issues: [{ kind: 'DuplicateRenderingRule', keys: ['d'] }],
    });
  });

  it('moves a rule to another property', async () => {
    const rule = await registry.update('v1', 'd', { property: 'c' });
    expect(rule).toEqual({ viewId: 'v1', property: 'c', widget: 'date-format', args: { dateStyle: 'short', timeZone: 'UTC' } });
    expect((await registry.list('v1')).map(item => item.property)).toEqual(['c']);
    await expect(registry.remove('v1', 'd')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('renders values through the matching rule only', async () => {
    const rules = await registry.list('v1');
    expect(registry.render(rules, 'd', '2020-01-31')).toBe('31/01/2020');
    expect(registry.render(rules, 'a', '2020-01-31')).toBe('2020-01-31');
  });
});
