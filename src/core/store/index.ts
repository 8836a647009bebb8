export {
  loadTemplateStore,
  loadGeneratorDefinition,
  getBundledStorePath,
  STORE_MANIFEST,
  GENERATOR_FILE,
} from './loader.js';
export { SUPPORTED_SCHEMA_VERSIONS, StoreManifestSchema, GeneratorFileSchema } from './schema.js';
export type {
  OptionValue,
  OptionType,
  EnumOption,
  BoolOption,
  StringOption,
  OptionDescriptor,
  GeneratorConfigSchema,
  Template,
  TemplateRef,
  ConflictPattern,
  ConflictPatternKind,
  PackageDependency,
  GeneratorDefinition,
  TemplateStore,
  GenerationConfig,
} from './types.js';
