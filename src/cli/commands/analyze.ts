/**
 * CLI command that prints the detected Project Profile.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { analyzeProject } from '../../core/analyzer/analyzer.js';
import { loadConfig } from '../../core/config/index.js';
import { ExitCodes } from '../../core/pipeline/exit-codes.js';
import { formatError, formatProfile } from '../formatters/human.js';
import { AppForgeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

interface AnalyzeOptions {
  root: string;
  json?: boolean;
  symbols?: boolean;
}

export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Detect platforms, dependency manager and architecture of a project')
    .option('-r, --root <dir>', 'Project root', process.cwd())
    .option('--json', 'Output as JSON')
    .option('--symbols', 'Include the symbol index in the output')
    .action(async (options: AnalyzeOptions) => {
      try {
        await runAnalyze(options);
      } catch (error) {
        if (error instanceof AppForgeError) {
          console.error(formatError(error));
        } else {
          logger.error(error instanceof Error ? error.message : 'Unknown error');
        }
        process.exit(ExitCodes.FATAL);
      }
    });
}

async function runAnalyze(options: AnalyzeOptions): Promise<void> {
  const root = path.resolve(options.root);
  const config = await loadConfig(root);
  const profile = await analyzeProject(root, { scan: config.scan, detection: config.detection });

  if (options.json) {
    const { symbols, ...rest } = profile;
    console.log(JSON.stringify(options.symbols ? profile : rest, null, 2));
    return;
  }

  console.log(formatProfile(profile));
  if (options.symbols) {
    for (const entry of profile.symbols.filter((indexed) => indexed.kind === 'symbol')) {
      const owner = entry.attribution.kind === 'generated' ? ` (${entry.attribution.generatorId})` : '';
      console.log(`  ${entry.symbolKind ?? 'symbol'} ${entry.name}  ${entry.path}:${entry.line ?? 1}${owner}`);
    }
  }
}
