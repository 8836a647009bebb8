/**
 * YAML documents validated against zod schemas. Store manifests and the
 * project config both load through here, so every failure names its source.
 */
import { parse, YAMLParseError } from 'yaml';
import type { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

export function parseYaml(content: string, source = 'input'): unknown {
  try {
    return parse(content);
  } catch (error) {
    const line = error instanceof YAMLParseError ? error.linePos?.[0].line : undefined;
    const reason = error instanceof Error ? error.message : String(error);
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Invalid YAML in ${source}${line === undefined ? '' : ` at line ${line}`}: ${reason}`,
      { source, line }
    );
  }
}

export function parseYamlWithSchema<T extends z.ZodTypeAny>(content: string, schema: T, source = 'input'): z.infer<T> {
  const result = schema.safeParse(parseYaml(content, source));
  if (result.success) {
    return result.data;
  }
  throw new SystemError(ErrorCodes.INVALID_SCHEMA, `${source} has an unexpected shape: ${formatZodError(result.error)}`, {
    source,
    issues: result.error.issues.map((issue) => ({ path: issue.path.map(String).join('.'), message: issue.message })),
  });
}

/**
 * Read a YAML file and validate it. Unreadable files count as parse errors.
 */
export async function loadYamlWithSchema<T extends z.ZodTypeAny>(filePath: string, schema: T): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { source: filePath }
    );
  }
  return parseYamlWithSchema(content, schema, filePath);
}

/** `path: message` pairs joined with semicolons. */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
