/**
 * Tests for option conditions.
 */
import { describe, it, expect } from 'vitest';
import {
  parseCondition,
  evaluateCondition,
  testCondition,
  conditionOptions,
} from '../../../../src/core/render/condition.js';
import { RenderError } from '../../../../src/utils/errors.js';

const config = { provider: 'noop', debug: true, verbose: false, name: 'App', empty: '' };

describe('parseCondition', () => {
  it('should give && precedence over ||', () => {
    expect(parseCondition('a && !b || c == "x"')).toEqual({
      kind: 'or',
      left: {
        kind: 'and',
        left: { kind: 'option', name: 'a' },
        right: { kind: 'not', operand: { kind: 'option', name: 'b' } },
      },
      right: { kind: 'compare', name: 'c', op: '==', literal: 'x' },
    });
  });

  it('should honour parentheses', () => {
    expect(parseCondition("a && (b || c != 'y')")).toEqual({
      kind: 'and',
      left: { kind: 'option', name: 'a' },
      right: {
        kind: 'or',
        left: { kind: 'option', name: 'b' },
        right: { kind: 'compare', name: 'c', op: '!=', literal: 'y' },
      },
    });
  });

  it.each(['', 'a ==', '(a', 'a b', '"x', 'a == b', '== "x"', 'a & b'])('should reject %j', (source) => {
    expect(() => parseCondition(source)).toThrow(RenderError);
  });

  it('should name the failing condition', () => {
    expect(() => parseCondition('(a')).toThrow("Invalid condition '(a': missing ')'");
  });
});

describe('evaluateCondition', () => {
  it('should compare option values with literals', () => {
    expect(testCondition('provider == "noop"', config)).toBe(true);
    expect(testCondition('provider != "noop"', config)).toBe(false);
    expect(testCondition('debug == true', config)).toBe(true);
    expect(testCondition('verbose == "false"', config)).toBe(true);
  });

  it('should treat booleans and non-empty strings as truthy', () => {
    expect(testCondition('debug', config)).toBe(true);
    expect(testCondition('verbose', config)).toBe(false);
    expect(testCondition('name', config)).toBe(true);
    expect(testCondition('empty', config)).toBe(false);
    expect(testCondition('!verbose && (debug || empty)', config)).toBe(true);
  });

  it('should reject options missing from the configuration', () => {
    expect(() => evaluateCondition(parseCondition('missing'), config)).toThrow(
      "Condition references option 'missing', which is not in the configuration"
    );
  });
});

describe('conditionOptions', () => {
  it('should list every option read', () => {
    expect(conditionOptions(parseCondition('a && (!b || c == "x")'))).toEqual(['a', 'b', 'c']);
  });
});
