/**
 * Write Executor - applies a finalized Generation Plan as one transaction.
 *
 * Writes artifacts in plan order. If any write fails, everything this run
 * wrote is reversed (modified files restored, created files and directories
 * removed) before WriteError is thrown. Files that predate the run are only
 * ever touched when the plan says to modify them.
 */
import * as path from 'node:path';
import { nodeFileSystem, type FileSystemAdapter } from './fs-adapter.js';
import type { Artifact, GenerationPlan, IntegrationInstructions } from '../plan/types.js';
import { verifyChecksum } from '../../utils/checksum.js';
import { WriteError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('executor');

export interface ApplyResult {
  plan: GenerationPlan;
  /** Every path written, in plan order */
  written: string[];
  created: string[];
  modified: string[];
  instructions: IntegrationInstructions;
}

interface Journal {
  created: Artifact[];
  modified: { artifact: Artifact; previous: string }[];
  /** Directories created by this run, outermost first */
  directories: string[];
}

export class WriteExecutor {
  constructor(private readonly fs: FileSystemAdapter = nodeFileSystem) {}

  async apply(plan: GenerationPlan): Promise<ApplyResult> {
    const tampered = plan.artifacts.filter((artifact) => !verifyChecksum(artifact.content, artifact.checksum));
    if (tampered.length > 0) {
      throw new WriteError(
        ErrorCodes.CHECKSUM_MISMATCH,
        `Plan content changed after it was finalized: ${tampered.map((artifact) => artifact.path).join(', ')}`,
        { paths: tampered.map((artifact) => artifact.path), restored: [], removed: [] }
      );
    }

    const journal: Journal = { created: [], modified: [], directories: [] };

    for (const artifact of plan.artifacts) {
      try {
        await this.writeArtifact(artifact, journal);
      } catch (error) {
        const cause = error instanceof Error ? error.message : String(error);
        log.debug(`Write of ${artifact.path} failed (${cause}); rolling back`);
        const outcome = await this.rollback(journal);
        throw new WriteError(
          ErrorCodes.WRITE_FAILED,
          `Failed to write ${artifact.path}: ${cause}. Rolled back ${outcome.restored.length + outcome.removed.length} file(s)`,
          {
            failedPath: artifact.path,
            cause,
            restored: outcome.restored,
            removed: outcome.removed,
            rollbackFailures: outcome.failures.length > 0 ? outcome.failures : undefined,
          }
        );
      }
    }

    const written = plan.artifacts.map((artifact) => artifact.path);
    return {
      plan,
      written,
      created: journal.created.map((artifact) => artifact.path),
      modified: journal.modified.map(({ artifact }) => artifact.path),
      instructions: plan.instructions,
    };
  }

  private async writeArtifact(artifact: Artifact, journal: Journal): Promise<void> {
    await this.ensureDirectory(path.dirname(artifact.absolutePath), journal);

    const exists = await this.fs.exists(artifact.absolutePath);
    if (artifact.kind === 'create' && exists) {
      throw new Error('file appeared after the plan was made');
    }
    if (artifact.kind === 'modify' && exists) {
      journal.modified.push({ artifact, previous: await this.fs.readFile(artifact.absolutePath) });
    } else {
      journal.created.push(artifact);
    }

    await this.fs.writeFile(artifact.absolutePath, artifact.content);
  }

  private async ensureDirectory(dirPath: string, journal: Journal): Promise<void> {
    const missing: string[] = [];
    let current = dirPath;
    while (!(await this.fs.exists(current))) {
      missing.unshift(current);
      const parent = path.dirname(current);
      if (parent === current) break;
      current = parent;
    }
    for (const dir of missing) {
      await this.fs.mkdir(dir);
      journal.directories.push(dir);
    }
  }

  private async rollback(journal: Journal): Promise<{ restored: string[]; removed: string[]; failures: string[] }> {
    const restored: string[] = [];
    const removed: string[] = [];
    const failures: string[] = [];

    const attempt = async (label: string, action: () => Promise<void>): Promise<boolean> => {
      try {
        await action();
        return true;
      } catch (error) {
        const message = `${label}: ${error instanceof Error ? error.message : String(error)}`;
        log.warn(`Rollback step failed - ${message}`);
        failures.push(message);
        return false;
      }
    };

    for (const { artifact, previous } of [...journal.modified].reverse()) {
      if (await attempt(`restore ${artifact.path}`, () => this.fs.writeFile(artifact.absolutePath, previous))) {
        restored.push(artifact.path);
      }
    }

    for (const artifact of [...journal.created].reverse()) {
      if (!(await this.fs.exists(artifact.absolutePath))) continue;
      if (await attempt(`remove ${artifact.path}`, () => this.fs.unlink(artifact.absolutePath))) {
        removed.push(artifact.path);
      }
    }

    for (const dir of [...journal.directories].reverse()) {
      await attempt(`remove directory ${dir}`, () => this.fs.rmdir(dir));
    }

    return { restored, removed, failures };
  }
}
