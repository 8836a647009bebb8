/**
 * Generation Planner - composes rendered templates, placements and the
 * conflict report into one frozen Generation Plan.
 *
 * Reads the filesystem (to compare against existing targets) but never
 * writes to it. Blocking conflicts without a resolution end in ConflictError.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { authorizeCapabilities } from './capabilities.js';
import { buildInstructions } from './instructions.js';
import type { Artifact, GenerationPlan, SkippedTemplate } from './types.js';
import type { ProjectProfile } from '../analyzer/types.js';
import { detectAttribution, extractSymbols } from '../analyzer/symbols.js';
import { resolvedDependencyManager } from '../analyzer/ambiguity.js';
import { ConflictError } from '../conflicts/conflict-error.js';
import { blockingEntries, type ConflictEntry, type ConflictReport } from '../conflicts/types.js';
import type { ConflictResolution } from '../resolver/prompt.js';
import { placeArtifact, type Placement } from '../placement/resolver.js';
import { renderTemplate } from '../render/renderer.js';
import { testCondition } from '../render/condition.js';
import type { GenerationConfig, GeneratorDefinition, TemplateRef } from '../store/types.js';
import { getDefaultConfig, type Config } from '../config/index.js';
import { computeChecksum, deepFreeze, isInside, toPosixPath } from '../../utils/index.js';
import { CancelledError, RenderError, SecurityError, WriteError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('planner');

export interface PlanRequest {
  definition: GeneratorDefinition;
  profile: ProjectProfile;
  config: GenerationConfig;
  report: ConflictReport;
  resolution?: ConflictResolution;
  settings?: Pick<Config, 'placement' | 'capabilities'>;
}

interface PlannedTarget {
  ref: TemplateRef;
  placement: Placement;
  absolutePath: string;
  content: string;
  existing?: string;
}

export async function planGeneration(request: PlanRequest): Promise<GenerationPlan> {
  const { definition, profile, config, resolution } = request;
  const settings = request.settings ?? getDefaultConfig();
  const root = path.resolve(profile.root);

  authorizeCapabilities(definition, settings.capabilities);

  const targets: PlannedTarget[] = [];
  const seen = new Map<string, string>();

  for (const ref of definition.templates) {
    if (ref.when !== undefined && !testCondition(ref.when, config)) {
      log.debug(`Template '${ref.name}' not selected (${ref.when})`);
      continue;
    }

    const placement = placeArtifact(ref, profile, config, settings.placement);
    const absolutePath = path.resolve(root, placement.path);
    if (!isInside(root, absolutePath)) {
      throw new SecurityError(
        ErrorCodes.PATH_TRAVERSAL,
        `Template '${ref.name}' targets a path outside the project root: ${placement.path}`,
        { template: ref.name, path: placement.path, root }
      );
    }

    const previous = seen.get(placement.path);
    if (previous !== undefined) {
      throw new RenderError(
        ErrorCodes.DUPLICATE_TARGET,
        `Templates '${previous}' and '${ref.name}' both target ${placement.path}`,
        { templates: [previous, ref.name], path: placement.path }
      );
    }
    seen.set(placement.path, ref.name);

    const content = renderTemplate(ref.template, config);
    warnOnMissingMarker(definition.id, ref, content);
    targets.push({ ref, placement, absolutePath, content, existing: await readExisting(absolutePath, placement.path) });
  }

  const report = withOccupiedTargets(request.report, targets);
  const blocking = blockingEntries(report);

  if (blocking.length > 0 && resolution === undefined) {
    throw new ConflictError(report);
  }
  if (blocking.length > 0 && resolution === 'abort') {
    throw new CancelledError(ErrorCodes.CONFLICT_ABORTED, `Generation of '${definition.id}' aborted at conflict resolution`, {
      generatorId: definition.id,
    });
  }

  const blockedPaths = new Set(blocking.map((entry) => entry.matchedPath));
  const blockedSymbols = new Map<string, string>();
  for (const entry of blocking) {
    if (entry.matchedSymbol !== undefined) blockedSymbols.set(entry.matchedSymbol, entry.matchedPath);
  }
  const keptSymbols = new Set<string>();
  const artifacts: Artifact[] = [];
  const unchanged: string[] = [];
  const skipped: SkippedTemplate[] = [];
  const extraSteps: string[] = [];

  for (const target of targets) {
    const { ref, placement, absolutePath, content, existing } = target;

    if (existing === content) {
      unchanged.push(placement.path);
      continue;
    }

    if (resolution === 'extend' && blockedPaths.has(placement.path)) {
      skipped.push({ templateName: ref.name, path: placement.path, reason: 'existing hand-written file kept' });
      extraSteps.push(`Kept existing ${placement.path}; make sure it provides what '${ref.name}' would have generated.`);
      continue;
    }

    const redeclared = resolution === 'extend' ? findRedeclaration(placement.path, content, blockedSymbols) : undefined;
    if (redeclared) {
      keptSymbols.add(redeclared.name);
      skipped.push({
        templateName: ref.name,
        path: placement.path,
        reason: `${redeclared.name} already declared in ${redeclared.path}`,
      });
      extraSteps.push(
        `Kept existing ${redeclared.name} in ${redeclared.path}; make sure it provides what '${ref.name}' would have generated.`
      );
      continue;
    }

    artifacts.push({
      templateName: ref.name,
      path: placement.path,
      absolutePath,
      content,
      checksum: computeChecksum(content),
      kind: existing === undefined ? 'create' : 'modify',
      category: ref.category,
      placement: placement.rule,
    });
  }

  const targetPaths = new Set(targets.map((target) => target.placement.path));
  for (const entry of blocking) {
    if (targetPaths.has(entry.matchedPath) || entry.matchedSymbol === undefined) continue;
    if (keptSymbols.has(entry.matchedSymbol)) continue;
    extraSteps.push(
      resolution === 'replace'
        ? `Remove or rename ${entry.matchedSymbol} in ${entry.matchedPath}; the generated code declares the same name.`
        : `Wire the existing ${entry.matchedSymbol} in ${entry.matchedPath} into the generated composition point.`
    );
  }

  const plan: GenerationPlan = {
    generatorId: definition.id,
    generatorVersion: definition.version,
    root,
    config,
    artifacts,
    unchanged,
    skipped,
    instructions: buildInstructions(definition, config, resolvedDependencyManager(profile, config), extraSteps),
    conflicts: report.entries,
    resolution: blocking.length > 0 ? resolution : undefined,
  };

  log.debug(
    `Planned ${artifacts.length} artifact(s), ${unchanged.length} unchanged, ${skipped.length} skipped for '${definition.id}'`
  );
  return deepFreeze(plan);
}

/**
 * First blocked name the rendered file declares. Extensions add to a type
 * and do not count.
 */
function findRedeclaration(
  relativePath: string,
  content: string,
  blockedSymbols: ReadonlyMap<string, string>
): { name: string; path: string } | undefined {
  for (const symbol of extractSymbols(relativePath, content)) {
    if (symbol.kind === 'extension') continue;
    const existingPath = blockedSymbols.get(symbol.name);
    if (existingPath !== undefined) return { name: symbol.name, path: existingPath };
  }
  return undefined;
}

/**
 * Add a blocking entry for every target occupied by a hand-written file the
 * detector did not already report, and a warning for regenerated files.
 */
function withOccupiedTargets(report: ConflictReport, targets: readonly PlannedTarget[]): ConflictReport {
  const entries: ConflictEntry[] = [...report.entries];

  for (const { placement, existing, content } of targets) {
    if (existing === undefined || existing === content) continue;
    if (entries.some((entry) => entry.matchedPath === placement.path && entry.matchedSymbol === undefined)) continue;

    const attribution = detectAttribution(existing);
    entries.push({
      pattern: placement.path,
      patternKind: 'file',
      matchedPath: placement.path,
      severity: attribution.kind === 'generated' ? 'warning' : 'blocking',
      attribution,
      reason:
        attribution.kind === 'generated'
          ? `target previously generated by '${attribution.generatorId}'`
          : 'hand-written file exists at the target path',
    });
  }

  return { generatorId: report.generatorId, entries };
}

async function readExisting(absolutePath: string, relativePath: string): Promise<string | undefined> {
  try {
    return await fs.promises.readFile(absolutePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw new WriteError(ErrorCodes.TARGET_UNREADABLE, `Cannot read existing target ${relativePath}`, {
      path: relativePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

function warnOnMissingMarker(generatorId: string, ref: TemplateRef, content: string): void {
  const attribution = detectAttribution(content);
  if (attribution.kind !== 'generated' || attribution.generatorId !== generatorId) {
    log.warn(
      `Template '${ref.name}' of '${generatorId}' has no '@appforge generator=${generatorId}' marker; ` +
        `files it writes will be treated as hand-written next time (${toPosixPath(ref.template.path)})`
    );
  }
}
