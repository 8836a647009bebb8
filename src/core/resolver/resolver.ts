/**
 * Configuration Resolver - turns a generator's option list plus an optional
 * partial config into a fully validated, frozen GenerationConfig.
 *
 * Options are resolved in declared order. The first invalid value aborts the
 * whole resolution; nothing partial escapes.
 */
import { z } from 'zod';
import type { PromptCollaborator } from './prompt.js';
import type { GenerationConfig, GeneratorConfigSchema, OptionDescriptor, OptionValue } from '../store/types.js';
import { ValidationError, CancelledError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('resolver');

const TRUE_WORDS = ['true', 'yes', 'y', '1', 'on'];
const FALSE_WORDS = ['false', 'no', 'n', '0', 'off'];

/**
 * Resolve every option of a schema.
 */
export async function resolveConfig(
  schema: GeneratorConfigSchema,
  prefilled: Readonly<Record<string, unknown>>,
  prompt: PromptCollaborator
): Promise<GenerationConfig> {
  const known = new Set(schema.map((option) => option.name));
  const unknown = Object.keys(prefilled).filter((name) => !known.has(name)).sort();
  if (unknown.length > 0) {
    throw new ValidationError(
      ErrorCodes.UNKNOWN_OPTION,
      `Unknown option${unknown.length > 1 ? 's' : ''}: ${unknown.join(', ')}`,
      { options: unknown, known: [...known] }
    );
  }

  const resolved: Record<string, OptionValue> = {};

  for (const option of schema) {
    if (Object.prototype.hasOwnProperty.call(prefilled, option.name)) {
      resolved[option.name] = validateOptionValue(option, prefilled[option.name]);
      continue;
    }

    log.debug(`Requesting value for '${option.name}'`);
    const answer = await prompt.requestValue(option);
    if (answer.kind === 'cancel') {
      throw new CancelledError(
        ErrorCodes.PROMPT_CANCELLED,
        `Cancelled while resolving option '${option.name}'`,
        { option: option.name }
      );
    }
    resolved[option.name] = validateOptionValue(option, answer.value);
  }

  return Object.freeze(resolved);
}

/**
 * Coerce and validate one value, or throw ValidationError.
 */
export function validateOptionValue(option: OptionDescriptor, raw: unknown): OptionValue {
  const result = optionValueSchema(option).safeParse(option.type === 'bool' ? coerceBoolean(raw) : raw);
  if (result.success) {
    return result.data;
  }

  throw new ValidationError(
    ErrorCodes.INVALID_OPTION_VALUE,
    `Invalid value for option '${option.name}': ${describeExpectation(option)}, got ${JSON.stringify(raw)}`,
    {
      option: option.name,
      type: option.type,
      value: raw,
      allowed: option.type === 'enum' ? option.values : undefined,
      pattern: option.type === 'string' ? option.pattern : undefined,
      issues: result.error.issues.map((issue) => issue.message),
    }
  );
}

function optionValueSchema(option: OptionDescriptor): z.ZodType<OptionValue> {
  switch (option.type) {
    case 'enum':
      return z.string().refine((value) => option.values.includes(value), {
        message: `must be one of ${option.values.join(', ')}`,
      });
    case 'bool':
      return z.boolean();
    case 'string': {
      const base = z.string().min(1);
      if (option.pattern === undefined) return base;
      return base.regex(new RegExp(`^(?:${option.pattern})$`), { message: `must match ${option.pattern}` });
    }
  }
}

function coerceBoolean(raw: unknown): unknown {
  if (typeof raw !== 'string') return raw;
  const word = raw.trim().toLowerCase();
  if (TRUE_WORDS.includes(word)) return true;
  if (FALSE_WORDS.includes(word)) return false;
  return raw;
}

function describeExpectation(option: OptionDescriptor): string {
  switch (option.type) {
    case 'enum':
      return `expected one of ${option.values.join(', ')}`;
    case 'bool':
      return 'expected true or false';
    case 'string':
      return option.pattern ? `expected a non-empty string matching ${option.pattern}` : 'expected a non-empty string';
  }
}
