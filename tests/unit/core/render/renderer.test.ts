/**
 * Tests for template parsing and rendering.
 */
import { describe, it, expect } from 'vitest';
import { renderSource, renderTemplate } from '../../../../src/core/render/renderer.js';
import { parseTemplate } from '../../../../src/core/render/parser.js';
import { loadTemplateStore, getBundledStorePath } from '../../../../src/core/store/loader.js';
import { RenderError } from '../../../../src/utils/errors.js';
import { captureError } from '../../../helpers/project.js';

describe('parseTemplate', () => {
  it('should record placeholder filters and lines', () => {
    expect(parseTemplate('a\n{{name | pascal}}', 't')).toEqual([
      { type: 'text', value: 'a\n' },
      { type: 'placeholder', name: 'name', filter: 'pascal', line: 2 },
    ]);
  });

  it('should default placeholders to the text filter', () => {
    expect(parseTemplate('{{ name }}', 't')).toEqual([{ type: 'placeholder', name: 'name', filter: 'text', line: 1 }]);
  });

  it.each([
    ['a {{#if x}}b', "Unclosed '{{#if}}' at t:1"],
    ['{{#if x}}a{{/unless}}', "'{{/unless}}' closes '{{#if}}' opened on line 1 at t:1"],
    ['a{{/if}}', "Unexpected '{{/if}}' at t:1"],
    ['{{else}}', "Unexpected '{{else}}' at t:1"],
    ['{{#each items}}{{/each}}', "Unknown block '{{#each items}}' at t:1"],
    ['{{a b}}', "Invalid placeholder '{{a b}}' at t:1"],
    ['a {{b {{c}}', "Nested '{{' in tag at t:1"],
    ['a {{b', "Unclosed '{{' in t"],
  ])('should reject %j', (source, message) => {
    expect(() => parseTemplate(source, 't')).toThrow(message);
  });

  it('should reject unknown filters with their own code', () => {
    expect(captureError(() => parseTemplate('{{a | shout}}', 't'))).toMatchObject({
      code: 'REN004',
      message: "Unknown filter 'shout' at t:1",
    });
  });
});

describe('renderSource', () => {
  it('should substitute placeholders through their filters', () => {
    expect(renderSource('let key = "{{key | string}}"', { key: 'a"b' })).toBe('let key = "a\\"b"');
  });

  it('should drop standalone block lines', () => {
    const source = 'a\n{{#if x}}\nb\n{{/if}}\nc\n';

    expect(renderSource(source, { x: true })).toBe('a\nb\nc\n');
    expect(renderSource(source, { x: false })).toBe('a\nc\n');
  });

  it('should keep inline blocks on their line', () => {
    const source = 'Hello {{#if x}}yes{{else}}no{{/if}}!';

    expect(renderSource(source, { x: true })).toBe('Hello yes!');
    expect(renderSource(source, { x: false })).toBe('Hello no!');
  });

  it('should invert unless blocks', () => {
    expect(renderSource('{{#unless x}}off{{else}}on{{/unless}}', { x: false })).toBe('off');
  });

  it('should remove comment lines', () => {
    expect(renderSource('a\n  {{! explain }}\nb', {})).toBe('a\nb');
  });

  it('should fail on placeholders missing from the configuration', () => {
    expect(() => renderSource('line1\nline2 {{missing}}', {}, 't')).toThrow(
      "Placeholder 'missing' at t:2 is not in the configuration"
    );
  });

  it('should add the template location to condition errors', () => {
    try {
      renderSource('x\n{{#if missing}}y{{/if}}', {}, 't');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RenderError);
      expect(error instanceof RenderError && error.code).toBe('REN002');
      expect(error instanceof RenderError && error.details).toMatchObject({ template: 't', line: 2, option: 'missing' });
    }
  });

  it('should refuse values that would break the surrounding code', () => {
    expect(captureError(() => renderSource('struct {{name | identifier}} {}', { name: 'A {} struct B' }))).toMatchObject({
      code: 'REN003',
    });
  });

  it('should refuse a raw value that comments out the rest of its line', () => {
    expect(captureError(() => renderSource('let x = {{name}}()\n', { name: 'foo //' }))).toMatchObject({
      code: 'REN003',
      details: { filter: 'text', value: 'foo //', reason: 'contains a comment delimiter' },
    });
  });
});

describe('bundled templates', () => {
  it('should render byte-identical output for identical input', async () => {
    const store = await loadTemplateStore(getBundledStorePath());
    const analytics = store.generators.find((definition) => definition.id === 'analytics-setup');
    const config = { provider: 'noop', service_name: 'AnalyticsService', app_id: 'YOUR-APP-ID', debug_logging: false };

    for (const ref of analytics?.templates ?? []) {
      expect(renderTemplate(ref.template, config)).toBe(renderTemplate(ref.template, config));
    }
    expect(analytics?.templates).toHaveLength(4);
  });

  it('should select the provider at the composition point', async () => {
    const store = await loadTemplateStore(getBundledStorePath());
    const abstraction = store.generators
      .find((definition) => definition.id === 'analytics-setup')
      ?.templates.find((ref) => ref.name === 'abstraction');
    if (!abstraction) throw new Error('abstraction template missing');

    const noop = renderTemplate(abstraction.template, {
      provider: 'noop',
      service_name: 'AnalyticsService',
      app_id: 'YOUR-APP-ID',
      debug_logging: false,
    });
    const deck = renderTemplate(abstraction.template, {
      provider: 'telemetrydeck',
      service_name: 'Tracking',
      app_id: 'app-"1"',
      debug_logging: false,
    });

    expect(noop).toContain('\n    static let shared: any AnalyticsService = NoOpAnalytics()\n');
    expect(noop.startsWith('// @appforge generator=analytics-setup\n')).toBe(true);
    expect(deck).toContain('\n    static let shared: any Tracking = TelemetryDeckAnalytics(appID: "app-\\"1\\"")\n');
    expect(deck).toContain('\nprotocol Tracking: Sendable {\n');
  });

  it('should omit debug-only lines when the flag is off', async () => {
    const store = await loadTemplateStore(getBundledStorePath());
    const noop = store.generators
      .find((definition) => definition.id === 'analytics-setup')
      ?.templates.find((ref) => ref.name === 'noop-provider');
    if (!noop) throw new Error('noop template missing');
    const base = { provider: 'noop', service_name: 'AnalyticsService', app_id: 'YOUR-APP-ID' };

    expect(renderTemplate(noop.template, { ...base, debug_logging: false })).toContain(
      '    func track(_ event: AnalyticsEvent) {\n    }\n'
    );
    expect(renderTemplate(noop.template, { ...base, debug_logging: true })).toContain(
      '    func track(_ event: AnalyticsEvent) {\n        #if DEBUG\n'
    );
  });
});
