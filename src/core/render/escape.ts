/**
 * Placeholder filters. Each one turns an option value into text that is safe
 * in a particular position of Swift source, or throws RenderError.
 */
import type { OptionValue } from '../store/types.js';
import { RenderError, ErrorCodes } from '../../utils/errors.js';

export type FilterName =
  | 'text'
  | 'string'
  | 'identifier'
  | 'pascal'
  | 'camel'
  | 'snake'
  | 'upper'
  | 'lower'
  | 'comment';

export const FILTER_NAMES: readonly FilterName[] = [
  'text',
  'string',
  'identifier',
  'pascal',
  'camel',
  'snake',
  'upper',
  'lower',
  'comment',
];

export function isFilterName(name: string): name is FilterName {
  return FILTER_NAMES.some((filter) => filter === name);
}

/** Words Swift will not accept as a plain identifier. */
const RESERVED_WORDS = new Set([
  'associatedtype', 'class', 'deinit', 'enum', 'extension', 'fileprivate', 'func', 'import', 'init',
  'inout', 'internal', 'let', 'open', 'operator', 'private', 'protocol', 'public', 'rethrows',
  'static', 'struct', 'subscript', 'typealias', 'var', 'break', 'case', 'continue', 'default',
  'defer', 'do', 'else', 'fallthrough', 'for', 'guard', 'if', 'in', 'repeat', 'return', 'switch',
  'where', 'while', 'as', 'catch', 'false', 'is', 'nil', 'super', 'self', 'Self', 'throw',
  'throws', 'true', 'try', 'Any', 'await', 'async',
]);

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const OPENERS: Record<string, string> = { ')': '(', ']': '[', '}': '{' };

interface FilterContext {
  option: string;
  template: string;
  line: number;
}

function unsafe(context: FilterContext, filter: FilterName, reason: string, value: string): RenderError {
  return new RenderError(
    ErrorCodes.UNSAFE_VALUE,
    `Value of '${context.option}' cannot be used with filter '${filter}' in ${context.template}:${context.line}: ${reason}`,
    { ...context, filter, value, reason }
  );
}

/**
 * Apply a filter to an option value.
 */
export function applyFilter(filter: FilterName, raw: OptionValue, context: FilterContext): string {
  const value = typeof raw === 'boolean' ? String(raw) : raw;

  if (LONE_SURROGATE.test(value)) {
    throw unsafe(context, filter, 'contains an unpaired UTF-16 surrogate', value);
  }

  switch (filter) {
    case 'string':
      return escapeStringLiteral(value);
    case 'identifier':
      return requireIdentifier(value, filter, context);
    case 'pascal':
      return requireIdentifier(toPascalCase(value), filter, context);
    case 'camel':
      return requireIdentifier(toCamelCase(value), filter, context);
    case 'snake':
      return requireIdentifier(toSnakeCase(value), filter, context);
    case 'upper':
      return requireText(value.toUpperCase(), filter, context);
    case 'lower':
      return requireText(value.toLowerCase(), filter, context);
    case 'comment':
      return requireComment(value, context);
    case 'text':
      return requireText(value, filter, context);
  }
}

/**
 * Escape for the body of a double-quoted Swift string literal.
 */
export function escapeStringLiteral(value: string): string {
  let out = '';
  for (const char of value) {
    switch (char) {
      case '\\': out += '\\\\'; break;
      case '"': out += '\\"'; break;
      case '\n': out += '\\n'; break;
      case '\r': out += '\\r'; break;
      case '\t': out += '\\t'; break;
      case '\0': out += '\\0'; break;
      default: {
        const code = char.codePointAt(0) ?? 0;
        out += code < 0x20 || code === 0x7f ? `\\u{${code.toString(16)}}` : char;
      }
    }
  }
  return out;
}

function requireIdentifier(value: string, filter: FilterName, context: FilterContext): string {
  if (!IDENTIFIER.test(value)) {
    throw unsafe(context, filter, 'not a valid identifier', value);
  }
  if (RESERVED_WORDS.has(value)) {
    throw unsafe(context, filter, 'is a reserved word', value);
  }
  return value;
}

/**
 * Raw text must not open or close a literal, a comment or a bracket it does
 * not also close.
 */
function requireText(value: string, filter: FilterName, context: FilterContext): string {
  if (CONTROL_CHARS.test(value)) {
    throw unsafe(context, filter, 'contains control characters', value);
  }
  if (/["\\`]/.test(value)) {
    throw unsafe(context, filter, "contains quote or backslash characters; use '| string'", value);
  }
  if (value.includes('/*') || value.includes('*/') || value.includes('//')) {
    throw unsafe(context, filter, 'contains a comment delimiter', value);
  }
  if (!bracketsBalanced(value)) {
    throw unsafe(context, filter, 'contains unbalanced brackets', value);
  }
  return value;
}

function requireComment(value: string, context: FilterContext): string {
  if (CONTROL_CHARS.test(value)) {
    throw unsafe(context, 'comment', 'contains control characters', value);
  }
  if (value.includes('/*') || value.includes('*/')) {
    throw unsafe(context, 'comment', 'contains a comment delimiter', value);
  }
  return value;
}

export function bracketsBalanced(value: string): boolean {
  const stack: string[] = [];
  for (const char of value) {
    if (char === '(' || char === '[' || char === '{') {
      stack.push(char);
    } else if (char in OPENERS) {
      if (stack.pop() !== OPENERS[char]) return false;
    }
  }
  return stack.length === 0;
}

/**
 * Split into words on separators and lower-to-upper case boundaries.
 */
export function splitWords(value: string): string[] {
  return value
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .split(/[^A-Za-z0-9]+/)
    .filter((word) => word.length > 0);
}

export function toPascalCase(value: string): string {
  return splitWords(value)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join('');
}

export function toCamelCase(value: string): string {
  const pascal = toPascalCase(value);
  return pascal.charAt(0).toLowerCase() + pascal.slice(1);
}

export function toSnakeCase(value: string): string {
  return splitWords(value)
    .map((word) => word.toLowerCase())
    .join('_');
}
