import type { FlatSchema, PropertyGroup, RenderingRule, View } from '../types/schema';
import type { ConfigurationIssue } from './errors';

export type ValidationResult = { ok: true } | { ok: false; issues: ConfigurationIssue[] };

// Property key set of a layer, in schema order
export const propertyKeys = (schema: FlatSchema | null): string[] => Object.keys(schema?.properties ?? {});

const unknownKeys = (keys: Iterable<string>, availableKeys: Iterable<string>): string[] => {
  const available = new Set(availableKeys);
  return [...new Set(keys)].filter(key => !available.has(key));
};

const unknownProperty = (keys: string[], label: string): ConfigurationIssue => ({
  kind: 'UnknownProperty',
  keys,
  message: `${label} should exist in layer schema: ${keys.join(', ')}`,
});

const result = (issues: ConfigurationIssue[]): ValidationResult =>
  issues.length === 0 ? { ok: true } : { ok: false, issues };

export function validateGroup(
  group: Pick<PropertyGroup, 'properties'>,
  availableKeys: Iterable<string>,
): ValidationResult {
  const issues: ConfigurationIssue[] = [];
  const unknown = unknownKeys(group.properties, availableKeys);
  if (unknown.length > 0) issues.push(unknownProperty(unknown, 'Group properties'));

  const duplicated = [...new Set(group.properties.filter((key, index) => group.properties.indexOf(key) !== index))];
  if (duplicated.length > 0) {
    issues.push({
      kind: 'DuplicateProperty',
      keys: duplicated,
      message: `Group lists properties more than once: ${duplicated.join(', ')}`,
    });
  }
  return result(issues);
}

export function validateRenderingRule(
  rule: Pick<RenderingRule, 'property'>,
  availableKeys: Iterable<string>,
): ValidationResult {
  const unknown = unknownKeys([rule.property], availableKeys);
  return result(unknown.length > 0 ? [unknownProperty(unknown, 'Rendered property')] : []);
}

/** Title property and every default list property must exist; all violations land in one issue. */
export function validateView(
  view: Pick<View, 'titleProperty' | 'defaultListProperties'>,
  availableKeys: Iterable<string>,
): ValidationResult {
  const referenced = view.titleProperty ? [view.titleProperty, ...view.defaultListProperties] : view.defaultListProperties;
  const unknown = unknownKeys(referenced, availableKeys);
  return result(unknown.length > 0 ? [unknownProperty(unknown, 'Title and list properties')] : []);
}
