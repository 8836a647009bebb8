/**
 * One generation run: catalog lookup, analysis, conflict detection,
 * configuration, planning, preview and apply.
 *
 * Every stage before apply is read-only, so any failure up to that point
 * leaves the project untouched.
 */
import * as path from 'node:path';
import { exitCodeFor, ExitCodes, type ExitCode } from './exit-codes.js';
import { analyzeProject } from '../analyzer/analyzer.js';
import { ambiguityOptions } from '../analyzer/ambiguity.js';
import type { ProjectProfile } from '../analyzer/types.js';
import { GeneratorCatalog } from '../catalog/catalog.js';
import { loadConfig } from '../config/index.js';
import { detectConflicts } from '../conflicts/detector.js';
import { ConflictError } from '../conflicts/conflict-error.js';
import type { ConflictReport } from '../conflicts/types.js';
import { WriteExecutor, type ApplyResult } from '../executor/executor.js';
import type { FileSystemAdapter } from '../executor/fs-adapter.js';
import { planGeneration, type PlanRequest } from '../plan/planner.js';
import type { GenerationPlan } from '../plan/types.js';
import { resolveConfig } from '../resolver/resolver.js';
import type { ConflictResolution, PromptCollaborator } from '../resolver/prompt.js';
import { AppForgeError, CancelledError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('pipeline');

export interface GenerationRequest {
  root: string;
  generatorId: string;
  prefilled?: Readonly<Record<string, unknown>>;
  prompt: PromptCollaborator;
  /** Decision for blocking conflicts; asked from the prompt when omitted */
  resolution?: ConflictResolution;
  /** Stop after planning */
  dryRun?: boolean;
  /** Preview hook; returning false aborts before anything is written */
  confirm?: (plan: GenerationPlan) => Promise<boolean>;
  configPath?: string;
  /** Defaults to the bundled store plus the project's configured stores */
  catalog?: GeneratorCatalog;
  fileSystem?: FileSystemAdapter;
}

export type GenerationOutcome =
  | {
      status: 'applied';
      exitCode: typeof ExitCodes.SUCCESS;
      profile: ProjectProfile;
      report: ConflictReport;
      plan: GenerationPlan;
      result: ApplyResult;
    }
  | {
      status: 'planned';
      exitCode: typeof ExitCodes.SUCCESS;
      profile: ProjectProfile;
      report: ConflictReport;
      plan: GenerationPlan;
    }
  | {
      status: 'failed';
      exitCode: ExitCode;
      error: AppForgeError;
      report?: ConflictReport;
    };

/**
 * Run the whole pipeline. Engine errors become a failed outcome with the
 * matching exit code; anything else propagates.
 */
export async function runGeneration(request: GenerationRequest): Promise<GenerationOutcome> {
  let report: ConflictReport | undefined;
  try {
    const root = path.resolve(request.root);
    const settings = await loadConfig(root, request.configPath);
    const catalog = request.catalog ?? (await GeneratorCatalog.loadForProject(root, settings.stores));
    const definition = catalog.lookup(request.generatorId);

    const profile = await analyzeProject(root, { scan: settings.scan, detection: settings.detection });
    report = detectConflicts(definition, profile, settings.conflicts);
    log.debug(`Conflict report for '${definition.id}': ${report.entries.length} entr${report.entries.length === 1 ? 'y' : 'ies'}`);

    const schema = [...definition.options, ...ambiguityOptions(profile, settings.detection)];
    const config = await resolveConfig(schema, request.prefilled ?? {}, request.prompt);

    const planRequest: PlanRequest = { definition, profile, config, report, resolution: request.resolution, settings };
    const plan = await planWithResolution(planRequest, request);
    report = { generatorId: definition.id, entries: plan.conflicts };

    if (request.dryRun) {
      return { status: 'planned', exitCode: ExitCodes.SUCCESS, profile, report, plan };
    }

    if (request.confirm && !(await request.confirm(plan))) {
      throw new CancelledError(ErrorCodes.PROMPT_CANCELLED, 'Generation cancelled at preview', {
        generatorId: definition.id,
      });
    }

    const result = await new WriteExecutor(request.fileSystem).apply(plan);
    return { status: 'applied', exitCode: ExitCodes.SUCCESS, profile, report, plan, result };
  } catch (error) {
    if (!(error instanceof AppForgeError)) throw error;
    if (error instanceof ConflictError) report = error.report;
    log.debug(`Run failed with ${error.name} ${error.code}`);
    return { status: 'failed', exitCode: exitCodeFor(error), error, report };
  }
}

async function planWithResolution(planRequest: PlanRequest, request: GenerationRequest): Promise<GenerationPlan> {
  try {
    return await planGeneration(planRequest);
  } catch (error) {
    if (!(error instanceof ConflictError) || planRequest.resolution !== undefined) throw error;

    const resolution = await request.prompt.chooseResolution(error.report);
    if (resolution === undefined) throw error;
    log.debug(`Conflicts resolved with '${resolution}'`);
    return planGeneration({ ...planRequest, resolution });
  }
}
