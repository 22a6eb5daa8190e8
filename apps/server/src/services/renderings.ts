import type { RenderingInput, RenderingPatch } from '../schemas';
import type { RenderingRuleStore } from '../stores/types';
import type { RenderingRule } from '../types/schema';
import { ConfigurationError, NotFoundError, type ConfigurationIssue } from './errors';
import { validateRenderingRule } from './validator';
import type { WidgetRegistry } from './widgets';

export class RenderingRuleRegistry {
  constructor(
    private store: RenderingRuleStore,
    private widgets: WidgetRegistry,
    private keysOf: (viewId: string) => Promise<string[]>,
  ) {}

  async list(viewId: string): Promise<RenderingRule[]> {
    return (await this.store.list(viewId)).sort((a, b) => (a.property < b.property ? -1 : a.property > b.property ? 1 : 0));
  }

  async create(viewId: string, input: RenderingInput): Promise<RenderingRule> {
    return this.commit({ viewId, ...input });
  }

  async update(viewId: string, property: string, patch: RenderingPatch): Promise<RenderingRule> {
    const existing = await this.find(viewId, property);
    return this.commit(
      {
        viewId,
        property: patch.property ?? existing.property,
        widget: patch.widget ?? existing.widget,
        args: patch.args ?? existing.args,
      },
      property,
    );
  }

  async remove(viewId: string, property: string): Promise<void> {
    await this.find(viewId, property);
    await this.store.remove(viewId, property);
  }

  /** Display value of one property, through its rendering rule when there is one. */
  render(rules: readonly RenderingRule[], property: string, value: unknown): unknown {
    const rule = rules.find(item => item.property === property);
    return rule ? this.widgets.render(rule.widget, value, rule.args) : value;
  }

  private async find(viewId: string, property: string): Promise<RenderingRule> {
    const rule = (await this.store.list(viewId)).find(item => item.property === property);
    if (!rule) throw new NotFoundError('Rendering rule', `${viewId}/${property}`);
    return rule;
  }

  private async commit(rule: RenderingRule, previousProperty?: string): Promise<RenderingRule> {
    const validation = validateRenderingRule(rule, await this.keysOf(rule.viewId));
    const issues: ConfigurationIssue[] = validation.ok ? [] : [...validation.issues];
    issues.push(...this.widgets.validate(rule.widget, rule.args));

    const others = (await this.store.list(rule.viewId)).filter(item => item.property !== previousProperty);
    if (others.some(item => item.property === rule.property)) {
      issues.push({
        kind: 'DuplicateRenderingRule',
        keys: [rule.property],
        message: `Property ${rule.property} already has a rendering rule`,
      });
    }
    if (issues.length > 0) throw new ConfigurationError(issues);

    await this.store.save(rule, previousProperty);
    console.log(`[RENDERINGS] Saved ${rule.viewId}/${rule.property} -> ${rule.widget}`);
    return rule;
  }
}
