import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createWidgetRegistry } from './widgets';

describe('WidgetRegistry', () => {
  it('registers the built-in widgets at creation', () => {
    expect(createWidgetRegistry().list().map(widget => widget.id)).toEqual(['date-format', 'data-url-to-img', 'file-ahref']);
  });

  it('refuses to register an identifier twice', () => {
    const registry = createWidgetRegistry();
    expect(() => registry.register('file-ahref', { label: 'Again', args: z.object({}), render: value => value })).toThrow(
      'Widget already registered: file-ahref',
    );
  });

  it('accepts new widgets without touching the built-in ones', () => {
    const registry = createWidgetRegistry().register('upper', {
      label: 'Upper case',
      args: z.object({}),
      render: value => String(value).toUpperCase(),
    });
    expect(registry.has('upper')).toBe(true);
    expect(registry.render('upper', 'oak', {})).toBe('OAK');
  });

  it('reports unknown widgets and invalid args', () => {
    const registry = createWidgetRegistry();
    expect(registry.validate('nope', {})).toEqual([{ kind: 'UnknownWidget', message: 'Unknown widget: nope' }]);
    expect(registry.validate('file-ahref', { text: 3 })).toMatchObject([{ kind: 'InvalidWidgetArgs' }]);
    expect(registry.validate('data-url-to-img', { extra: true })).toMatchObject([{ kind: 'InvalidWidgetArgs' }]);
    expect(registry.validate('date-format', { dateStyle: 'short' })).toEqual([]);
  });

  it('rejects date args that Intl cannot format with', () => {
    const registry = createWidgetRegistry();
    expect(registry.validate('date-format', { locale: 'not a locale!!' })).toEqual([
      { kind: 'InvalidWidgetArgs', message: 'date-format args: locale or time zone not supported' },
    ]);
    expect(registry.validate('date-format', { timeZone: 'Mars/Olympus' })).toMatchObject([{ kind: 'InvalidWidgetArgs' }]);
    expect(registry.validate('date-format', { locale: 'fr-FR', timeZone: 'Europe/Paris' })).toEqual([]);
  });

  it('shows the raw value when stored args are invalid', () => {
    const registry = createWidgetRegistry();
    expect(registry.render('date-format', '2020-01-31', { bogus: 1 })).toBe('2020-01-31');
    expect(registry.render('date-format', '2020-01-31', { timeZone: 'Mars/Olympus' })).toBe('2020-01-31');
  });

  it('renders dates', () => {
    const registry = createWidgetRegistry();
    expect(registry.render('date-format', '1921-04-12', { dateStyle: 'short', timeZone: 'UTC' })).toBe('12/04/1921');
    expect(registry.render('date-format', 'not a date', {})).toBe('not a date');
  });

  it('renders images and links with escaped attributes', () => {
    const registry = createWidgetRegistry();
    expect(registry.render('data-url-to-img', 'data:image/png;base64,AAA', { alt: 'Tree', width: 120 })).toBe(
      '<img src="data:image/png;base64,AAA" alt="Tree" width="120" />',
    );
    expect(registry.render('data-url-to-img', 'plain text', {})).toBe('plain text');
    expect(registry.render('file-ahref', '/files/x".pdf', {})).toBe('<a href="/files/x&quot;.pdf" download>Download</a>');
  });

  it('passes null through untouched', () => {
    expect(createWidgetRegistry().render('file-ahref', null, {})).toBeNull();
  });
});
