import type { GroupInput, GroupPatch } from '../schemas';
import type { GroupStore } from '../stores/types';
import type { PropertyGroup } from '../types/schema';
import { slugify } from '../utils/slug';
import { findDuplicateMemberships, orderGroups } from './composer';
import { ConfigurationError, NotFoundError, type ConfigurationIssue, type DuplicateGroupMembership } from './errors';
import { validateGroup } from './validator';

export interface GroupWriteResult {
  group: PropertyGroup;
  warnings: DuplicateGroupMembership[];
}

/**
 * Property display groups of each view. Every write is checked against the
 * layer's current property keys, read through `keysOf` at call time.
 */
export class GroupRegistry {
  constructor(
    private store: GroupStore,
    private keysOf: (viewId: string) => Promise<string[]>,
  ) {}

  async list(viewId: string): Promise<PropertyGroup[]> {
    return orderGroups(await this.store.list(viewId));
  }

  async create(viewId: string, input: GroupInput): Promise<GroupWriteResult> {
    const group: PropertyGroup = { viewId, ...input, slug: slugify(input.label) };
    return this.commit(group);
  }

  async update(viewId: string, slug: string, patch: GroupPatch): Promise<GroupWriteResult> {
    const existing = await this.find(viewId, slug);
    const label = patch.label ?? existing.label;
    const group: PropertyGroup = {
      viewId,
      label,
      slug: slugify(label),
      order: patch.order ?? existing.order,
      pictogram: patch.pictogram === undefined ? existing.pictogram : patch.pictogram,
      properties: patch.properties ?? existing.properties,
    };
    return this.commit(group, slug);
  }

  async remove(viewId: string, slug: string): Promise<void> {
    await this.find(viewId, slug);
    await this.store.remove(viewId, slug);
    console.log(`[GROUPS] Removed ${viewId}/${slug}`);
  }

  private async find(viewId: string, slug: string): Promise<PropertyGroup> {
    const group = (await this.store.list(viewId)).find(item => item.slug === slug);
    if (!group) throw new NotFoundError('Group', `${viewId}/${slug}`);
    return group;
  }

  private async commit(group: PropertyGroup, previousSlug?: string): Promise<GroupWriteResult> {
    const availableKeys = await this.keysOf(group.viewId);
    const others = (await this.store.list(group.viewId)).filter(item => item.slug !== previousSlug);
    const validation = validateGroup(group, availableKeys);
    const issues: ConfigurationIssue[] = validation.ok ? [] : [...validation.issues];

    if (!group.slug) {
      issues.push({ kind: 'InvalidBody', message: `Label has no letters or digits to build a slug from: ${group.label}` });
    }
    if (others.some(item => item.label === group.label || item.slug === group.slug)) {
      issues.push({ kind: 'DuplicateGroup', message: `A group labelled ${group.label} (${group.slug}) already exists` });
    }
    if (availableKeys.includes(group.slug) && !group.properties.includes(group.slug)) {
      issues.push({
        kind: 'SlugConflict',
        keys: [group.slug],
        message: `Group slug ${group.slug} collides with an ungrouped property`,
      });
    }
    if (issues.length > 0) throw new ConfigurationError(issues);

    const warnings = findDuplicateMemberships([...others, group]).filter(warning =>
      group.properties.includes(warning.key),
    );
    for (const warning of warnings) {
      console.warn(`[GROUPS] ${warning.key} belongs to several groups (${warning.groups.join(', ')}); first one wins`);
    }

    await this.store.save(group, previousSlug);
    console.log(`[GROUPS] Saved ${group.viewId}/${group.slug}`);
    return { group, warnings };
  }
}
