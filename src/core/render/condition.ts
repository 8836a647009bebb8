/**
 * Boolean conditions over generator options, shared by `{{#if}}` blocks,
 * template `when` clauses and dependency `when` clauses.
 *
 *   expr    := and ('||' and)*
 *   and     := unary ('&&' unary)*
 *   unary   := '!' unary | primary
 *   primary := '(' expr ')' | name (('==' | '!=') literal)?
 *   literal := "text" | 'text' | true | false
 */
import type { GenerationConfig } from '../store/types.js';
import { RenderError, ErrorCodes } from '../../utils/errors.js';

export type Condition =
  | { kind: 'option'; name: string }
  | { kind: 'compare'; name: string; op: '==' | '!='; literal: string }
  | { kind: 'not'; operand: Condition }
  | { kind: 'and' | 'or'; left: Condition; right: Condition };

type Token =
  | { type: 'name'; value: string }
  | { type: 'literal'; value: string }
  | { type: 'op'; value: '==' | '!=' | '&&' | '||' | '!' | '(' | ')' };

const NAME = /^[A-Za-z_][A-Za-z0-9_]*/;

function syntaxError(source: string, message: string): RenderError {
  return new RenderError(
    ErrorCodes.TEMPLATE_SYNTAX,
    `Invalid condition '${source}': ${message}`,
    { condition: source }
  );
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const char = source[i];
    if (/\s/.test(char)) {
      i++;
      continue;
    }

    const two = source.slice(i, i + 2);
    if (two === '==' || two === '!=' || two === '&&' || two === '||') {
      tokens.push({ type: 'op', value: two });
      i += 2;
      continue;
    }
    if (char === '!' || char === '(' || char === ')') {
      tokens.push({ type: 'op', value: char });
      i++;
      continue;
    }
    if (char === '"' || char === "'") {
      const end = source.indexOf(char, i + 1);
      if (end === -1) throw syntaxError(source, 'unterminated string literal');
      tokens.push({ type: 'literal', value: source.slice(i + 1, end) });
      i = end + 1;
      continue;
    }

    const match = NAME.exec(source.slice(i));
    if (!match) throw syntaxError(source, `unexpected '${char}'`);
    const word = match[0];
    if (word === 'true' || word === 'false') {
      tokens.push({ type: 'literal', value: word });
    } else {
      tokens.push({ type: 'name', value: word });
    }
    i += word.length;
  }

  return tokens;
}

/**
 * Parse a condition expression.
 */
export function parseCondition(source: string): Condition {
  const tokens = tokenize(source);
  let pos = 0;

  const peekOp = (value: string): boolean => {
    const token = tokens[pos];
    return token !== undefined && token.type === 'op' && token.value === value;
  };

  const parseExpr = (): Condition => {
    let left = parseAnd();
    while (peekOp('||')) {
      pos++;
      left = { kind: 'or', left, right: parseAnd() };
    }
    return left;
  };

  const parseAnd = (): Condition => {
    let left = parseUnary();
    while (peekOp('&&')) {
      pos++;
      left = { kind: 'and', left, right: parseUnary() };
    }
    return left;
  };

  const parseUnary = (): Condition => {
    if (peekOp('!')) {
      pos++;
      return { kind: 'not', operand: parseUnary() };
    }
    return parsePrimary();
  };

  const parsePrimary = (): Condition => {
    if (peekOp('(')) {
      pos++;
      const inner = parseExpr();
      if (!peekOp(')')) throw syntaxError(source, "missing ')'");
      pos++;
      return inner;
    }

    const token = tokens[pos];
    if (!token || token.type !== 'name') {
      throw syntaxError(source, 'expected an option name');
    }
    pos++;

    const next = tokens[pos];
    if (next && next.type === 'op' && (next.value === '==' || next.value === '!=')) {
      pos++;
      const literal = tokens[pos];
      if (!literal || literal.type !== 'literal') {
        throw syntaxError(source, `expected a literal after '${next.value}'`);
      }
      pos++;
      return { kind: 'compare', name: token.value, op: next.value, literal: literal.value };
    }
    return { kind: 'option', name: token.value };
  };

  if (tokens.length === 0) throw syntaxError(source, 'empty condition');
  const condition = parseExpr();
  if (pos < tokens.length) throw syntaxError(source, 'unexpected trailing input');
  return condition;
}

/**
 * Option names a condition reads.
 */
export function conditionOptions(condition: Condition): string[] {
  switch (condition.kind) {
    case 'option':
    case 'compare':
      return [condition.name];
    case 'not':
      return conditionOptions(condition.operand);
    case 'and':
    case 'or':
      return [...conditionOptions(condition.left), ...conditionOptions(condition.right)];
  }
}

/**
 * Evaluate a condition. Strings are truthy when non-empty.
 */
export function evaluateCondition(condition: Condition, config: GenerationConfig): boolean {
  switch (condition.kind) {
    case 'option': {
      const value = lookupOption(condition.name, config);
      return typeof value === 'boolean' ? value : value.length > 0;
    }
    case 'compare': {
      const equal = String(lookupOption(condition.name, config)) === condition.literal;
      return condition.op === '==' ? equal : !equal;
    }
    case 'not':
      return !evaluateCondition(condition.operand, config);
    case 'and':
      return evaluateCondition(condition.left, config) && evaluateCondition(condition.right, config);
    case 'or':
      return evaluateCondition(condition.left, config) || evaluateCondition(condition.right, config);
  }
}

/**
 * Parse and evaluate in one step.
 */
export function testCondition(source: string, config: GenerationConfig): boolean {
  return evaluateCondition(parseCondition(source), config);
}

function lookupOption(name: string, config: GenerationConfig): string | boolean {
  if (!Object.prototype.hasOwnProperty.call(config, name)) {
    throw new RenderError(
      ErrorCodes.UNKNOWN_PLACEHOLDER,
      `Condition references option '${name}', which is not in the configuration`,
      { option: name, known: Object.keys(config).sort() }
    );
  }
  return config[name];
}
