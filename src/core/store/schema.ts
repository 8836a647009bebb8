/**
 * On-disk Template Store format.
 *
 * store.yaml lists generator directories; each holds a generator.yaml and its
 * template files.
 */
import { z } from 'zod';

/** Store schema versions this engine reads. */
export const SUPPORTED_SCHEMA_VERSIONS = [1] as const;

export const StoreManifestSchema = z.object({
  schema_version: z.number().int(),
  name: z.string().default('store'),
  /** Generator directories relative to the store root */
  generators: z.array(z.string()).default([]),
});

const OptionName = z.string().regex(/^[a-z][a-z0-9_]*$/, 'option names are lower_snake_case');

export const EnumOptionSchema = z.object({
  name: OptionName,
  type: z.literal('enum'),
  values: z.array(z.string()).min(1),
  default: z.string().optional(),
  description: z.string().optional(),
});

export const BoolOptionSchema = z.object({
  name: OptionName,
  type: z.literal('bool'),
  default: z.boolean().optional(),
  description: z.string().optional(),
});

export const StringOptionSchema = z.object({
  name: OptionName,
  type: z.literal('string'),
  default: z.string().optional(),
  pattern: z.string().optional(),
  description: z.string().optional(),
});

export const OptionSchema = z.discriminatedUnion('type', [
  EnumOptionSchema,
  BoolOptionSchema,
  StringOptionSchema,
]);

export const TemplateRefSchema = z.object({
  name: z.string(),
  /** Template file relative to the generator directory */
  source: z.string(),
  output: z.string(),
  category: z.string(),
  when: z.string().optional(),
  directory: z.string().optional(),
});

export const ConflictPatternSchema = z.union([
  z.object({ symbol: z.string() }),
  z.object({ file: z.string() }),
]);

export const PackageDependencySchema = z.object({
  name: z.string(),
  url: z.string().optional(),
  pod: z.string().optional(),
  carthage: z.string().optional(),
  version: z.string().optional(),
  when: z.string().optional(),
});

export const GeneratorFileSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'generator ids are kebab-case'),
  version: z.string().default('1.0.0'),
  description: z.string(),
  options: z.array(OptionSchema).default([]),
  templates: z.array(TemplateRefSchema).min(1),
  capabilities: z.array(z.string()).default(['filesystem-write']),
  conflicts: z.array(ConflictPatternSchema).default([]),
  dependencies: z.array(PackageDependencySchema).default([]),
  integration: z.array(z.string()).default([]),
});

export type StoreManifest = z.infer<typeof StoreManifestSchema>;
export type GeneratorFile = z.infer<typeof GeneratorFileSchema>;
export type OptionEntry = z.infer<typeof OptionSchema>;
export type ConflictPatternEntry = z.infer<typeof ConflictPatternSchema>;
