/**
 * Artifact categories and the directory and file-name conventions that
 * identify them in an app project.
 */
import * as path from 'node:path';

export interface CategoryConvention {
  /** Directory base names that hold files of this category */
  directories: readonly string[];
  /** File-name signature; checked in declaration order */
  filePattern?: RegExp;
}

/**
 * Known categories. Order matters: ViewModel must be checked before View and
 * Model.
 */
export const CATEGORY_CONVENTIONS: Readonly<Record<string, CategoryConvention>> = {
  viewmodel: { directories: ['ViewModels', 'ViewModel'], filePattern: /ViewModel\.swift$/ },
  view: { directories: ['Views', 'View', 'Screens', 'UI', 'Components'], filePattern: /(View|Screen|Modifier)\.swift$/ },
  provider: { directories: ['Providers', 'Provider', 'Adapters'], filePattern: /Provider\.swift$/ },
  service: { directories: ['Services', 'Service'], filePattern: /Service\.swift$/ },
  manager: { directories: ['Managers', 'Manager'], filePattern: /Manager\.swift$/ },
  model: { directories: ['Models', 'Model', 'Entities'], filePattern: /(Model|Entity)\.swift$/ },
  utility: { directories: ['Utilities', 'Utils', 'Helpers', 'Extensions', 'Support'], filePattern: /(Helper|Extensions?|\+\w+)\.swift$/ },
  config: { directories: ['Config', 'Configuration', 'Configurations'], filePattern: /(Config|Configuration)\.swift$/ },
  ci: { directories: ['ci_scripts', 'scripts'], filePattern: /\.sh$/ },
};

export function knownCategories(): string[] {
  return Object.keys(CATEGORY_CONVENTIONS);
}

/**
 * Directory base names conventionally used for a category.
 */
export function categoryDirectories(category: string): readonly string[] {
  return CATEGORY_CONVENTIONS[category]?.directories ?? [];
}

/**
 * Classify a file by its name first, then by its parent directory.
 */
export function classifyFile(relativePath: string): string | undefined {
  const base = path.posix.basename(relativePath);
  for (const [category, convention] of Object.entries(CATEGORY_CONVENTIONS)) {
    if (convention.filePattern?.test(base)) return category;
  }

  const parent = path.posix.basename(path.posix.dirname(relativePath));
  for (const [category, convention] of Object.entries(CATEGORY_CONVENTIONS)) {
    if (convention.directories.includes(parent)) return category;
  }
  return undefined;
}
