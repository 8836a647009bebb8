/**
 * Template Store loader - reads store.yaml, every generator.yaml it lists and
 * the template files those reference.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';
import {
  StoreManifestSchema,
  GeneratorFileSchema,
  SUPPORTED_SCHEMA_VERSIONS,
  type GeneratorFile,
  type ConflictPatternEntry,
  type OptionEntry,
} from './schema.js';
import type {
  ConflictPattern,
  GeneratorDefinition,
  OptionDescriptor,
  TemplateRef,
  TemplateStore,
} from './types.js';
import { loadYamlWithSchema, fileExists, isDirectory, readFile, isInside } from '../../utils/index.js';
import { StoreError, SystemError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('store');

export const STORE_MANIFEST = 'store.yaml';
export const GENERATOR_FILE = 'generator.yaml';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Store shipped with the package (`<package>/store`).
 */
export function getBundledStorePath(): string {
  return path.resolve(__dirname, '../../../store');
}

/**
 * Load a Template Store directory.
 */
export async function loadTemplateStore(storeRoot: string): Promise<TemplateStore> {
  const root = path.resolve(storeRoot);
  const manifestPath = path.join(root, STORE_MANIFEST);

  if (!(await isDirectory(root))) {
    throw new StoreError(ErrorCodes.STORE_NOT_FOUND, `Template store directory not found: ${root}`, { storeRoot: root });
  }
  if (!(await fileExists(manifestPath))) {
    throw new StoreError(
      ErrorCodes.STORE_NOT_FOUND,
      `No ${STORE_MANIFEST} found in template store ${root}`,
      { storeRoot: root }
    );
  }

  const manifest = await loadStoreYaml(manifestPath, StoreManifestSchema);
  if (!isSupportedVersion(manifest.schema_version)) {
    throw new StoreError(
      ErrorCodes.UNSUPPORTED_SCHEMA_VERSION,
      `Template store ${root} uses schema_version ${manifest.schema_version}; supported: ${SUPPORTED_SCHEMA_VERSIONS.join(', ')}`,
      { storeRoot: root, schemaVersion: manifest.schema_version, supported: [...SUPPORTED_SCHEMA_VERSIONS] }
    );
  }

  const generators: GeneratorDefinition[] = [];
  for (const entry of manifest.generators) {
    const generatorDir = path.resolve(root, entry);
    generators.push(await loadGeneratorDefinition(generatorDir));
  }

  log.debug(`Loaded ${generators.length} generator(s) from ${root}`);
  return { root, name: manifest.name, schemaVersion: manifest.schema_version, generators };
}

/**
 * Load one generator directory.
 */
export async function loadGeneratorDefinition(generatorDir: string): Promise<GeneratorDefinition> {
  const file = await loadStoreYaml(path.join(generatorDir, GENERATOR_FILE), GeneratorFileSchema);
  const options = file.options.map(toOptionDescriptor);
  assertOptionsConsistent(file, options);

  const templates: TemplateRef[] = [];
  for (const ref of file.templates) {
    const sourcePath = path.resolve(generatorDir, ref.source);
    if (!isInside(generatorDir, sourcePath) || !(await fileExists(sourcePath))) {
      throw new StoreError(
        ErrorCodes.TEMPLATE_MISSING,
        `Generator '${file.id}' references missing template '${ref.source}'`,
        { generatorId: file.id, template: ref.name, source: ref.source }
      );
    }
    templates.push({
      name: ref.name,
      output: ref.output,
      category: ref.category,
      when: ref.when,
      directory: ref.directory,
      template: { path: ref.source, content: await readFile(sourcePath) },
    });
  }

  return {
    id: file.id,
    version: file.version,
    description: file.description,
    templates,
    options,
    capabilities: file.capabilities,
    conflicts: file.conflicts.map(toConflictPattern),
    dependencies: file.dependencies,
    integration: file.integration,
    storePath: generatorDir,
  };
}

function isSupportedVersion(version: number): boolean {
  return SUPPORTED_SCHEMA_VERSIONS.some((supported) => supported === version);
}

async function loadStoreYaml<T extends z.ZodTypeAny>(filePath: string, schema: T): Promise<z.infer<T>> {
  try {
    return await loadYamlWithSchema(filePath, schema);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new StoreError(error.code, error.message, { ...error.details, filePath });
    }
    throw error;
  }
}

function toOptionDescriptor(entry: OptionEntry): OptionDescriptor {
  switch (entry.type) {
    case 'enum':
      return { name: entry.name, type: 'enum', values: entry.values, default: entry.default, description: entry.description };
    case 'bool':
      return { name: entry.name, type: 'bool', default: entry.default, description: entry.description };
    case 'string':
      return {
        name: entry.name,
        type: 'string',
        default: entry.default,
        pattern: entry.pattern,
        description: entry.description,
      };
  }
}

function toConflictPattern(entry: ConflictPatternEntry): ConflictPattern {
  return 'symbol' in entry
    ? { kind: 'symbol', pattern: entry.symbol }
    : { kind: 'file', pattern: entry.file };
}

/**
 * Option names must be unique and defaults must satisfy their own option.
 */
function assertOptionsConsistent(file: GeneratorFile, options: OptionDescriptor[]): void {
  const seen = new Set<string>();
  for (const option of options) {
    if (seen.has(option.name)) {
      throw new StoreError(
        ErrorCodes.DUPLICATE_OPTION,
        `Generator '${file.id}' declares option '${option.name}' more than once`,
        { generatorId: file.id, option: option.name }
      );
    }
    seen.add(option.name);

    if (option.type === 'enum' && option.default !== undefined && !option.values.includes(option.default)) {
      throw new StoreError(
        ErrorCodes.INVALID_SCHEMA,
        `Generator '${file.id}' option '${option.name}' defaults to '${option.default}', which is not one of its values`,
        { generatorId: file.id, option: option.name, default: option.default, allowed: option.values }
      );
    }

    if (option.type === 'string' && option.pattern !== undefined && !isValidPattern(option.pattern)) {
      throw new StoreError(
        ErrorCodes.INVALID_SCHEMA,
        `Generator '${file.id}' option '${option.name}' has an invalid pattern: ${option.pattern}`,
        { generatorId: file.id, option: option.name, pattern: option.pattern }
      );
    }
  }
}

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}
