/**
 * Project Analyzer - read-only, bounded scan of a project tree producing an
 * immutable Project Profile.
 *
 * File reads run in parallel batches; evidence is merged by rule order and
 * path afterwards so the profile never depends on read completion order.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { ARCHITECTURE_RULES, DEPENDENCY_MANAGER_RULES, matchesRuleFile, needsContent, parsePackagePlatforms, parsePbxprojPlatforms, parseToolsVersion, type SignalRule } from './rules.js';
import { detectAttribution, extractSymbols } from './symbols.js';
import { classifyFile } from './categories.js';
import {
  AMBIGUOUS,
  type Candidate,
  type DetectedField,
  type DirectoryEntry,
  type Evidence,
  type IndexEntry,
  type PlatformMarker,
  type ProjectProfile,
} from './types.js';
import { getDefaultConfig, defaultConcurrency, type DetectionSettings, type ScanSettings } from '../config/index.js';
import { listFiles, loadIgnoreFile, readFile, readFileHead, deepFreeze } from '../../utils/index.js';
import { ScanError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('analyzer');

export interface AnalyzerOptions {
  scan?: ScanSettings;
  detection?: DetectionSettings;
}

export interface ScannedFile {
  path: string;
  content?: string;
}

const PACKAGE_CONFIDENCE = 0.9;
const PBXPROJ_CONFIDENCE = 0.8;
const HEAD_BYTES = 2048;

/**
 * Scan a project root and build its profile.
 */
export async function analyzeProject(root: string, options: AnalyzerOptions = {}): Promise<ProjectProfile> {
  const defaults = getDefaultConfig();
  const scan = options.scan ?? defaults.scan;
  const detection = options.detection ?? defaults.detection;
  const absoluteRoot = path.resolve(root);

  await assertReadableRoot(absoluteRoot);

  const ignoreFilter = await loadIgnoreFile(absoluteRoot);
  let files: string[];
  try {
    files = await listFiles(absoluteRoot, { exclude: scan.exclude, maxDepth: scan.max_depth });
  } catch (error) {
    throw new ScanError(
      ErrorCodes.ROOT_NOT_READABLE,
      `Cannot list files under ${absoluteRoot}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { root: absoluteRoot }
    );
  }

  const listed = ignoreFilter.filter(files).sort();
  const truncated = listed.length > scan.max_files;
  const selected = truncated ? listed.slice(0, scan.max_files) : listed;
  if (truncated) {
    log.warn(`Scan limited to ${scan.max_files} of ${listed.length} files`);
  }

  const { scanned, unreadable } = await readFiles(absoluteRoot, selected, scan);
  log.debug(`Scanned ${scanned.length} files under ${absoluteRoot}`);

  const profile: ProjectProfile = {
    root: absoluteRoot,
    platforms: detectPlatforms(scanned),
    swiftToolsVersion: detectToolsVersion(scanned),
    dependencyManager: classify(
      collectEvidence(DEPENDENCY_MANAGER_RULES, scanned),
      ['spm', 'cocoapods', 'carthage'],
      'none',
      detection
    ),
    architecture: classify(
      collectEvidence(ARCHITECTURE_RULES, scanned),
      ['mvvm', 'tca', 'mvc', 'viper', 'clean'],
      'unstructured',
      detection
    ),
    ...detectSourceRoot(scanned),
    directories: indexDirectories(selected),
    symbols: indexSymbols(scanned),
    fileCount: selected.length,
    truncated,
    unreadableFiles: unreadable,
  };

  return deepFreeze(profile);
}

async function assertReadableRoot(root: string): Promise<void> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(root);
  } catch (error) {
    const code = errorCode(error);
    if (code === 'EACCES' || code === 'EPERM') {
      throw new ScanError(ErrorCodes.ROOT_NOT_READABLE, `Permission denied: ${root}`, { root, cause: code });
    }
    throw new ScanError(ErrorCodes.ROOT_NOT_FOUND, `Project root does not exist: ${root}`, { root, cause: code });
  }

  if (!stat.isDirectory()) {
    throw new ScanError(ErrorCodes.ROOT_NOT_DIRECTORY, `Project root is not a directory: ${root}`, { root });
  }

  try {
    await fs.promises.access(root, fs.constants.R_OK | fs.constants.X_OK);
    await fs.promises.readdir(root);
  } catch (error) {
    throw new ScanError(ErrorCodes.ROOT_NOT_READABLE, `Permission denied: ${root}`, { root, cause: errorCode(error) });
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Read the files content rules need, in batches of `scan.concurrency`.
 */
async function readFiles(
  root: string,
  files: string[],
  scan: ScanSettings
): Promise<{ scanned: ScannedFile[]; unreadable: string[] }> {
  const concurrency = scan.concurrency ?? defaultConcurrency();
  const scanned: ScannedFile[] = new Array<ScannedFile>(files.length);
  const unreadable: string[] = [];

  for (let i = 0; i < files.length; i += concurrency) {
    const batch = files.slice(i, i + concurrency);
    const results = await Promise.allSettled(batch.map((file) => readForScan(root, file, scan.max_file_bytes)));

    results.forEach((result, j) => {
      const file = batch[j];
      if (result.status === 'fulfilled') {
        scanned[i + j] = { path: file, content: result.value };
      } else {
        log.debug(`Could not read ${file}: ${result.reason instanceof Error ? result.reason.message : 'Unknown error'}`);
        unreadable.push(file);
        scanned[i + j] = { path: file };
      }
    });
  }

  return { scanned, unreadable: unreadable.sort() };
}

async function readForScan(root: string, file: string, maxBytes: number): Promise<string | undefined> {
  if (!needsContent(file)) return undefined;
  const absolute = path.join(root, file);
  const { size } = await fs.promises.stat(absolute);
  return size > maxBytes ? readFileHead(absolute, HEAD_BYTES) : readFile(absolute);
}

/**
 * Apply rules to every scanned file. Evidence is ordered by rule, then path.
 */
export function collectEvidence<T extends string>(
  rules: readonly SignalRule<T>[],
  files: readonly ScannedFile[]
): Map<T, Evidence[]> {
  const byValue = new Map<T, Evidence[]>();

  for (const rule of rules) {
    const hits: Evidence[] = [];
    for (const file of files) {
      if (!matchesRuleFile(rule, file.path)) continue;
      if (rule.content && !(file.content !== undefined && rule.content.test(file.content))) continue;
      hits.push({ rule: rule.name, path: file.path, weight: rule.weight });
      if (hits.length >= (rule.maxHits ?? 1)) break;
    }
    if (hits.length > 0) {
      byValue.set(rule.value, [...(byValue.get(rule.value) ?? []), ...hits]);
    }
  }

  return byValue;
}

function roundConfidence(value: number): number {
  return Math.round(Math.min(1, value) * 100) / 100;
}

/**
 * Turn evidence into a detected field. Candidates below the minimum
 * confidence do not count; the top two within the ambiguity margin make the
 * field ambiguous.
 */
export function classify<T extends string>(
  evidence: ReadonlyMap<T, Evidence[]>,
  order: readonly T[],
  fallback: T,
  settings: DetectionSettings
): DetectedField<T> {
  const candidates: Candidate<T>[] = order
    .filter((value) => evidence.has(value))
    .map((value) => {
      const items = evidence.get(value) ?? [];
      return {
        value,
        confidence: roundConfidence(items.reduce((sum, item) => sum + item.weight, 0)),
        evidence: items,
      };
    })
    .sort((a, b) => b.confidence - a.confidence || order.indexOf(a.value) - order.indexOf(b.value));

  const [top, second] = candidates;
  if (!top || top.confidence < settings.min_confidence) {
    return { value: fallback, confidence: 0, candidates };
  }
  if (
    second &&
    second.confidence >= settings.min_confidence &&
    roundConfidence(top.confidence - second.confidence) < settings.ambiguity_margin
  ) {
    return { value: AMBIGUOUS, confidence: top.confidence, candidates };
  }
  return { value: top.value, confidence: top.confidence, candidates };
}

function detectPlatforms(files: readonly ScannedFile[]): PlatformMarker[] {
  const markers = new Map<string, PlatformMarker>();

  for (const file of files) {
    if (file.content === undefined) continue;
    let found: Array<{ platform: PlatformMarker['platform']; version: string }> = [];
    let confidence = 0;
    if (file.path === 'Package.swift') {
      found = parsePackagePlatforms(file.content);
      confidence = PACKAGE_CONFIDENCE;
    } else if (file.path.endsWith('.pbxproj')) {
      found = parsePbxprojPlatforms(file.content);
      confidence = PBXPROJ_CONFIDENCE;
    }
    for (const marker of found) {
      const key = `${marker.platform}@${marker.version}@${file.path}`;
      markers.set(key, { ...marker, source: file.path, confidence });
    }
  }

  return [...markers.values()].sort(
    (a, b) =>
      a.platform.localeCompare(b.platform) ||
      compareVersions(a.version, b.version) ||
      a.source.localeCompare(b.source)
  );
}

export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map(Number);
  const right = b.split('.').map(Number);
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

function detectToolsVersion(files: readonly ScannedFile[]): string | undefined {
  const manifest = files.find((file) => file.path === 'Package.swift');
  return manifest?.content !== undefined ? parseToolsVersion(manifest.content) : undefined;
}

/**
 * `Sources/<Target>` when exactly one SPM target exists, else the directory of
 * the `@main` entry point, else the project root.
 */
function detectSourceRoot(files: readonly ScannedFile[]): { sourceRoot: string; sourceRootDetected: boolean } {
  const targets = new Set<string>();
  for (const file of files) {
    const match = /^Sources\/([^/]+)\//.exec(file.path);
    if (match) targets.add(match[1]);
  }
  if (targets.size === 1) {
    return { sourceRoot: `Sources/${[...targets][0]}`, sourceRootDetected: true };
  }

  const entryPoint = files.find(
    (file) => file.path.endsWith('.swift') && file.content !== undefined && /^@main\b/m.test(file.content)
  );
  if (entryPoint) {
    return { sourceRoot: path.posix.dirname(entryPoint.path), sourceRootDetected: true };
  }

  return { sourceRoot: '.', sourceRootDetected: false };
}

/**
 * Every directory that contains files, directly or below it, with counts of
 * the categorised files directly inside.
 */
function indexDirectories(files: readonly string[]): DirectoryEntry[] {
  const directories = new Map<string, DirectoryEntry>();

  const entryFor = (dir: string): DirectoryEntry => {
    let entry = directories.get(dir);
    if (!entry) {
      entry = { path: dir, categories: {}, fileCount: 0 };
      directories.set(dir, entry);
    }
    return entry;
  };

  for (const file of files) {
    const dir = path.posix.dirname(file);
    if (dir === '.') continue;

    const entry = entryFor(dir);
    entry.fileCount++;
    const category = classifyFile(file);
    if (category) {
      entry.categories[category] = (entry.categories[category] ?? 0) + 1;
    }

    let ancestor = path.posix.dirname(dir);
    while (ancestor !== '.') {
      entryFor(ancestor);
      ancestor = path.posix.dirname(ancestor);
    }
  }

  return [...directories.values()].sort((a, b) => a.path.localeCompare(b.path));
}

function indexSymbols(files: readonly ScannedFile[]): IndexEntry[] {
  const entries: IndexEntry[] = [];

  for (const file of files) {
    const attribution = file.content !== undefined ? detectAttribution(file.content) : { kind: 'foreign' as const };
    entries.push({
      kind: 'file',
      name: path.posix.basename(file.path),
      path: file.path,
      confidence: 1,
      attribution,
    });
    if (file.content === undefined) continue;

    for (const symbol of extractSymbols(file.path, file.content)) {
      entries.push({
        kind: 'symbol',
        name: symbol.name,
        path: file.path,
        line: symbol.line,
        symbolKind: symbol.kind,
        confidence: symbol.confidence,
        attribution,
      });
    }
  }

  return entries;
}

/**
 * Candidate values for an ambiguous field, strongest first, limited to those
 * that reached the minimum confidence.
 */
export function ambiguousChoices<T extends string>(field: DetectedField<T>, settings: DetectionSettings): T[] {
  return field.candidates
    .filter((candidate) => candidate.confidence >= settings.min_confidence)
    .map((candidate) => candidate.value);
}
