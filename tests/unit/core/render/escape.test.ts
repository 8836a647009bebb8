/**
 * Tests for placeholder filters.
 */
import { describe, it, expect } from 'vitest';
import {
  applyFilter,
  bracketsBalanced,
  escapeStringLiteral,
  splitWords,
  toCamelCase,
  toPascalCase,
  toSnakeCase,
} from '../../../../src/core/render/escape.js';
import { RenderError } from '../../../../src/utils/errors.js';

const context = { option: 'value', template: 'templates/A.swift.tmpl', line: 3 };

describe('escapeStringLiteral', () => {
  it('should escape quotes, backslashes and control characters', () => {
    expect(escapeStringLiteral('a\\b"c\nd\te\u0001')).toBe('a\\\\b\\"c\\nd\\te\\u{1}');
  });

  it('should leave interpolation harmless', () => {
    expect(escapeStringLiteral('\\(secret)')).toBe('\\\\(secret)');
  });
});

describe('case conversion', () => {
  it('should split on separators and case boundaries', () => {
    expect(splitWords('analytics-service_name')).toEqual(['analytics', 'service', 'name']);
    expect(splitWords('URLSession')).toEqual(['URL', 'Session']);
    expect(splitWords('userID2')).toEqual(['user', 'ID2']);
  });

  it('should convert between cases', () => {
    expect(toPascalCase('analytics service')).toBe('AnalyticsService');
    expect(toCamelCase('user-id')).toBe('userId');
    expect(toSnakeCase('AnalyticsService')).toBe('analytics_service');
    expect(toSnakeCase('UserID')).toBe('user_id');
  });
});

describe('bracketsBalanced', () => {
  it('should check nesting and order', () => {
    expect(bracketsBalanced('f(a[b]{c})')).toBe(true);
    expect(bracketsBalanced(')(')).toBe(false);
    expect(bracketsBalanced('(]')).toBe(false);
    expect(bracketsBalanced('((')).toBe(false);
  });
});

describe('applyFilter', () => {
  it('should escape string literal bodies', () => {
    expect(applyFilter('string', 'say "hi"', context)).toBe('say \\"hi\\"');
  });

  it('should accept valid identifiers and reject the rest', () => {
    expect(applyFilter('identifier', 'AnalyticsService', context)).toBe('AnalyticsService');
    expect(() => applyFilter('identifier', '1Service', context)).toThrow(RenderError);
    expect(() => applyFilter('identifier', 'Service; import Evil', context)).toThrow(RenderError);
  });

  it('should reject reserved words', () => {
    expect(() => applyFilter('identifier', 'class', context)).toThrow(
      "Value of 'value' cannot be used with filter 'identifier' in templates/A.swift.tmpl:3: is a reserved word"
    );
    expect(() => applyFilter('camel', 'Protocol', context)).toThrow(RenderError);
  });

  it('should convert case before validating identifiers', () => {
    expect(applyFilter('pascal', 'error monitoring', context)).toBe('ErrorMonitoring');
    expect(applyFilter('snake', 'ErrorMonitoring', context)).toBe('error_monitoring');
    expect(() => applyFilter('pascal', '---', context)).toThrow(RenderError);
  });

  it('should render booleans as text', () => {
    expect(applyFilter('text', true, context)).toBe('true');
    expect(applyFilter('upper', 'abc', context)).toBe('ABC');
    expect(applyFilter('lower', 'ABC', context)).toBe('abc');
  });

  it.each([
    ['a "quoted" value', 'contains quote or backslash'],
    ['C:\\path', 'contains quote or backslash'],
    ['open /* comment', 'contains a comment delimiter'],
    ['foo // rest of line', 'contains a comment delimiter'],
    ['call(', 'contains unbalanced brackets'],
    ['line\nbreak', 'contains control characters'],
  ])('should reject unsafe raw text %j', (value, reason) => {
    expect(() => applyFilter('text', value, context)).toThrow(reason);
  });

  it('should reject a line comment through the case filters too', () => {
    expect(() => applyFilter('upper', 'abc //', context)).toThrow('contains a comment delimiter');
    expect(() => applyFilter('lower', 'ABC //', context)).toThrow('contains a comment delimiter');
  });

  it('should let comments contain quotes but not delimiters', () => {
    expect(applyFilter('comment', 'uses "quotes" (and brackets', context)).toBe('uses "quotes" (and brackets');
    expect(() => applyFilter('comment', 'ends */ here', context)).toThrow(RenderError);
  });

  it('should reject unpaired surrogates with every filter', () => {
    expect(() => applyFilter('string', 'bad\uD800', context)).toThrow('contains an unpaired UTF-16 surrogate');
    expect(applyFilter('string', '\uD83D\uDE00', context)).toBe('\uD83D\uDE00');
  });

  it('should report the value, filter and location', () => {
    try {
      applyFilter('identifier', 'nil', context);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RenderError);
      expect(error instanceof RenderError && error.code).toBe('REN003');
      expect(error instanceof RenderError && error.details).toEqual({
        option: 'value',
        template: 'templates/A.swift.tmpl',
        line: 3,
        filter: 'identifier',
        value: 'nil',
        reason: 'is a reserved word',
      });
    }
  });
});
