/**
 * Generator Definition and Template types, as loaded from a Template Store.
 */

/** A resolved option value. */
export type OptionValue = string | boolean;

interface OptionBase {
  name: string;
  description?: string;
}

export interface EnumOption extends OptionBase {
  type: 'enum';
  values: readonly string[];
  default?: string;
}

export interface BoolOption extends OptionBase {
  type: 'bool';
  default?: boolean;
}

export interface StringOption extends OptionBase {
  type: 'string';
  default?: string;
  /** Regular expression the whole value must match */
  pattern?: string;
}

export type OptionDescriptor = EnumOption | BoolOption | StringOption;

export type OptionType = OptionDescriptor['type'];

/** Ordered option list of one generator. */
export type GeneratorConfigSchema = readonly OptionDescriptor[];

/** Raw template source file. */
export interface Template {
  /** Path relative to the store root */
  path: string;
  content: string;
}

/**
 * One file a generator may produce.
 */
export interface TemplateRef {
  name: string;
  /** Output file name; may contain placeholders */
  output: string;
  /** Category used by placement (service, provider, view, ...) */
  category: string;
  /** Condition over config options; the template is used only when it holds */
  when?: string;
  /** Fixed directory relative to the project root, bypassing placement */
  directory?: string;
  template: Template;
}

export type ConflictPatternKind = 'symbol' | 'file';

/**
 * Symbol-name or file-path glob a generator considers its own territory.
 */
export interface ConflictPattern {
  kind: ConflictPatternKind;
  pattern: string;
}

/** Third-party package a generated provider needs. */
export interface PackageDependency {
  name: string;
  /** Swift Package Manager repository URL */
  url?: string;
  /** CocoaPods pod name */
  pod?: string;
  /** Carthage `github` spec, e.g. "owner/repo" */
  carthage?: string;
  version?: string;
  when?: string;
}

export interface GeneratorDefinition {
  id: string;
  version: string;
  description: string;
  templates: readonly TemplateRef[];
  options: GeneratorConfigSchema;
  capabilities: readonly string[];
  conflicts: readonly ConflictPattern[];
  dependencies: readonly PackageDependency[];
  /** Follow-up manual steps; each is rendered like a template */
  integration: readonly string[];
  /** Absolute path of the generator directory */
  storePath: string;
}

export interface TemplateStore {
  root: string;
  name: string;
  schemaVersion: number;
  generators: GeneratorDefinition[];
}

/**
 * Fully resolved option values for one run. Frozen once produced.
 */
export type GenerationConfig = Readonly<Record<string, OptionValue>>;
