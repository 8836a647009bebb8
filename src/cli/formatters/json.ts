/**
 * JSON output shapes for `--json`.
 */
import type { GenerationOutcome } from '../../core/pipeline/session.js';
import type { GenerationPlan } from '../../core/plan/types.js';

export function planToJSON(plan: GenerationPlan, includeContent: boolean): Record<string, unknown> {
  return {
    generatorId: plan.generatorId,
    generatorVersion: plan.generatorVersion,
    root: plan.root,
    config: plan.config,
    artifacts: plan.artifacts.map((artifact) => ({
      template: artifact.templateName,
      path: artifact.path,
      kind: artifact.kind,
      category: artifact.category,
      placement: artifact.placement,
      checksum: artifact.checksum,
      ...(includeContent ? { content: artifact.content } : {}),
    })),
    unchanged: plan.unchanged,
    skipped: plan.skipped,
    conflicts: plan.conflicts,
    resolution: plan.resolution,
    instructions: plan.instructions,
  };
}

export function outcomeToJSON(outcome: GenerationOutcome): Record<string, unknown> {
  switch (outcome.status) {
    case 'applied':
      return {
        status: outcome.status,
        exitCode: outcome.exitCode,
        written: outcome.result.written,
        created: outcome.result.created,
        modified: outcome.result.modified,
        plan: planToJSON(outcome.plan, false),
      };
    case 'planned':
      return { status: outcome.status, exitCode: outcome.exitCode, plan: planToJSON(outcome.plan, true) };
    case 'failed':
      return {
        status: outcome.status,
        exitCode: outcome.exitCode,
        error: outcome.error.toJSON(),
        conflicts: outcome.report?.entries,
      };
  }
}
