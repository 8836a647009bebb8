/**
 * Placement Resolver - decides where an artifact lands in the project.
 *
 * First match wins:
 *   1. an existing directory conventionally named for the category
 *   2. the documented default for the category under the source root
 *   3. the fallback directory at the project root
 * A template with a fixed `directory` skips all three.
 */
import * as path from 'node:path';
import { defaultDirectory } from './defaults.js';
import { categoryDirectories } from '../analyzer/categories.js';
import { resolvedArchitecture } from '../analyzer/ambiguity.js';
import type { DirectoryEntry, ProjectProfile } from '../analyzer/types.js';
import type { GenerationConfig, TemplateRef } from '../store/types.js';
import { renderSource } from '../render/renderer.js';
import { getDefaultConfig, type PlacementSettings } from '../config/index.js';
import { SecurityError, ErrorCodes } from '../../utils/errors.js';

export type PlacementRule = 'fixed' | 'existing' | 'default' | 'fallback';

export interface Placement {
  /** Target path relative to the project root, forward slashes */
  path: string;
  directory: string;
  fileName: string;
  rule: PlacementRule;
}

export function placeArtifact(
  ref: TemplateRef,
  profile: ProjectProfile,
  config: GenerationConfig,
  settings: PlacementSettings = getDefaultConfig().placement
): Placement {
  const fileName = renderFileName(ref, config);
  const { directory, rule } = chooseDirectory(ref, profile, config, settings);
  const target = directory === '.' ? fileName : path.posix.join(directory, fileName);

  if (target.split('/').includes('..') || path.posix.isAbsolute(target)) {
    throw new SecurityError(
      ErrorCodes.PATH_TRAVERSAL,
      `Template '${ref.name}' would be placed outside the project root: ${target}`,
      { template: ref.name, path: target }
    );
  }

  return { path: target, directory, fileName, rule };
}

function renderFileName(ref: TemplateRef, config: GenerationConfig): string {
  const fileName = renderSource(ref.output, config, `${ref.name}:output`).trim();
  if (fileName === '' || fileName.includes('/') || fileName.includes('\\') || fileName === '.' || fileName === '..') {
    throw new SecurityError(
      ErrorCodes.PATH_TRAVERSAL,
      `Template '${ref.name}' renders an invalid output file name: '${fileName}'`,
      { template: ref.name, output: ref.output, fileName }
    );
  }
  return fileName;
}

function chooseDirectory(
  ref: TemplateRef,
  profile: ProjectProfile,
  config: GenerationConfig,
  settings: PlacementSettings
): { directory: string; rule: PlacementRule } {
  if (ref.directory !== undefined) {
    return { directory: normalizeDirectory(ref.directory), rule: 'fixed' };
  }

  const existing = existingConventionDirectory(ref.category, profile.directories);
  if (existing) {
    return { directory: existing.path, rule: 'existing' };
  }

  const configured = settings.directories[ref.category];
  const documented = recognized(profile)
    ? defaultDirectory(ref.category, resolvedArchitecture(profile, config))
    : undefined;
  const chosen = configured ?? documented;
  if (chosen !== undefined) {
    return { directory: normalizeDirectory(path.posix.join(profile.sourceRoot, chosen)), rule: 'default' };
  }

  return { directory: normalizeDirectory(settings.fallback_dir), rule: 'fallback' };
}

/**
 * Directories whose base name is one of the category's conventional names.
 * Ties: more files of the category, then shallower, then lexicographic.
 */
export function existingConventionDirectory(
  category: string,
  directories: readonly DirectoryEntry[]
): DirectoryEntry | undefined {
  const names = categoryDirectories(category);
  const candidates = directories.filter((entry) => names.includes(path.posix.basename(entry.path)));

  candidates.sort(
    (a, b) =>
      (b.categories[category] ?? 0) - (a.categories[category] ?? 0) ||
      depth(a.path) - depth(b.path) ||
      (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)
  );
  return candidates[0];
}

/** Whether the project looks like a real app rather than a bare folder. */
function recognized(profile: ProjectProfile): boolean {
  return profile.sourceRootDetected || profile.dependencyManager.value !== 'none';
}

function depth(relativePath: string): number {
  return relativePath.split('/').length;
}

function normalizeDirectory(directory: string): string {
  const normalized = path.posix.normalize(directory.replace(/\\/g, '/')).replace(/\/+$/, '');
  return normalized === '' ? '.' : normalized;
}
