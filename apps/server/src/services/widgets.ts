import { z } from 'zod';
import { attributes, escapeHtml } from '../utils/html';
import type { ConfigurationIssue } from './errors';

export interface WidgetDescriptor<A> {
  label: string;
  args: z.ZodType<A, z.ZodTypeDef, unknown>;
  render: (value: unknown, args: A) => unknown;
}

interface RegisteredWidget {
  label: string;
  check: (args: unknown) => string[];
  render: (value: unknown, args: unknown) => unknown;
}

/**
 * Closed set of widget identifiers a rendering rule may reference.
 * Adding a widget means registering it here, at startup.
 */
export class WidgetRegistry {
  private widgets = new Map<string, RegisteredWidget>();

  register<A>(id: string, descriptor: WidgetDescriptor<A>): this {
    if (this.widgets.has(id)) {
      throw new Error(`Widget already registered: ${id}`);
    }
    this.widgets.set(id, {
      label: descriptor.label,
      check: args => {
        const parsed = descriptor.args.safeParse(args);
        return parsed.success ? [] : parsed.error.issues.map(issue => `${issue.path.join('.') || 'args'}: ${issue.message}`);
      },
      render: (value, args) => {
        const parsed = descriptor.args.safeParse(args);
        if (!parsed.success) {
          console.warn(`[WIDGETS] ${id}: ignoring rule with invalid args, value shown as is`);
          return value;
        }
        return descriptor.render(value, parsed.data);
      },
    });
    return this;
  }

  has(id: string): boolean {
    return this.widgets.has(id);
  }

  list(): Array<{ id: string; label: string }> {
    return [...this.widgets.entries()].map(([id, widget]) => ({ id, label: widget.label }));
  }

  validate(id: string, args: unknown): ConfigurationIssue[] {
    const widget = this.widgets.get(id);
    if (!widget) {
      return [{ kind: 'UnknownWidget', message: `Unknown widget: ${id}` }];
    }
    return widget.check(args).map(message => ({ kind: 'InvalidWidgetArgs' as const, message: `${id} ${message}` }));
  }

  render(id: string, value: unknown, args: unknown): unknown {
    const widget = this.widgets.get(id);
    if (!widget || value === null || value === undefined) return value;
    return widget.render(value, args);
  }
}

const canFormatDates = (locale: string, options: Intl.DateTimeFormatOptions): boolean => {
  try {
    new Intl.DateTimeFormat(locale, options);
    return true;
  } catch {
    return false;
  }
};

const dateFormatArgs = z
  .object({
    locale: z.string().default('en-GB'),
    dateStyle: z.enum(['full', 'long', 'medium', 'short']).optional(),
    timeStyle: z.enum(['full', 'long', 'medium', 'short']).optional(),
    timeZone: z.string().optional(),
  })
  .strict()
  .refine(({ locale, ...options }) => canFormatDates(locale, options), {
    message: 'locale or time zone not supported',
  });

const imageArgs = z
  .object({
    alt: z.string().optional(),
    width: z.number().int().positive().optional(),
    height: z.number().int().positive().optional(),
  })
  .strict();

const linkArgs = z.object({ text: z.string().default('Download') }).strict();

export function createWidgetRegistry(): WidgetRegistry {
  return new WidgetRegistry()
    .register('date-format', {
      label: 'Formatted date',
      args: dateFormatArgs,
      render: (value, { locale, ...options }) => {
        if (typeof value !== 'string' && typeof value !== 'number') return value;
        const date = new Date(value);
        if (Number.isNaN(date.getTime())) return value;
        return new Intl.DateTimeFormat(locale, options).format(date);
      },
    })
    .register('data-url-to-img', {
      label: 'Image from data URL',
      args: imageArgs,
      render: (value, args) => {
        if (typeof value !== 'string' || !value.startsWith('data:image/')) return value;
        return `<img ${attributes({ src: value, ...args })} />`;
      },
    })
    .register('file-ahref', {
      label: 'Download link',
      args: linkArgs,
      render: (value, { text }) => {
        if (typeof value !== 'string') return value;
        return `<a ${attributes({ href: value })} download>${escapeHtml(text)}</a>`;
      },
    });
}

// Widgets available to rendering rules in this process
export const widgetRegistry = createWidgetRegistry();
