/**
 * CLI command that runs one generator against a project.
 */
import { Command } from 'commander';
import { runGeneration } from '../../core/pipeline/session.js';
import { ExitCodes } from '../../core/pipeline/exit-codes.js';
import { NonInteractivePrompt, isConflictResolution, type ConflictResolution } from '../../core/resolver/prompt.js';
import { ReadlinePrompt } from '../prompts/readline-prompt.js';
import { formatApplyResult, formatConflictReport, formatError, formatPlan } from '../formatters/human.js';
import { outcomeToJSON } from '../formatters/json.js';
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

interface GenerateOptions {
  root: string;
  set: string[];
  onConflict?: string;
  yes?: boolean;
  dryRun?: boolean;
  json?: boolean;
  config?: string;
}

export function createGenerateCommand(): Command {
  return new Command('generate')
    .description('Generate code into a project with a generator from the catalog')
    .argument('<generator>', 'Generator id (see `appforge list`)')
    .option('-r, --root <dir>', 'Project root', process.cwd())
    .option('-s, --set <key=value>', 'Pre-fill an option (repeatable)', collect, [])
    .option('--on-conflict <resolution>', 'Resolve blocking conflicts: replace, extend or abort')
    .option('-y, --yes', 'Do not prompt; use defaults and apply without confirmation')
    .option('--dry-run', 'Show the plan without writing anything')
    .option('--json', 'Output as JSON (implies --yes)')
    .option('-c, --config <path>', 'Config file relative to the root')
    .action(async (generatorId: string, options: GenerateOptions) => {
      try {
        process.exit(await runGenerate(generatorId, options));
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(ExitCodes.FATAL);
      }
    });
}

/**
 * Run the command and return its exit code.
 */
export async function runGenerate(generatorId: string, options: GenerateOptions): Promise<number> {
  let prefilled: Record<string, string>;
  let resolution: ConflictResolution | undefined;
  try {
    prefilled = parseAssignments(options.set);
    resolution = parseResolution(options.onConflict);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    console.error(formatError(error));
    return ExitCodes.INVALID_CONFIG;
  }

  const interactive = !options.yes && !options.json && process.stdin.isTTY === true;
  const readlinePrompt = interactive ? new ReadlinePrompt() : undefined;
  const previousLevel = logger.getLevel();
  if (options.json) logger.setLevel('silent');

  try {
    const outcome = await runGeneration({
      root: options.root,
      generatorId,
      prefilled,
      prompt: readlinePrompt ?? new NonInteractivePrompt(resolution),
      resolution,
      dryRun: options.dryRun,
      confirm: readlinePrompt ? (plan) => readlinePrompt.confirm(plan) : undefined,
      configPath: options.config,
    });

    if (options.json) {
      console.log(JSON.stringify(outcomeToJSON(outcome), null, 2));
      return outcome.exitCode;
    }

    switch (outcome.status) {
      case 'planned':
        console.log(formatPlan(outcome.plan));
        break;
      case 'applied':
        console.log(formatApplyResult(outcome.result));
        break;
      case 'failed':
        console.error(formatError(outcome.error));
        if (outcome.report && outcome.exitCode === ExitCodes.UNRESOLVED_CONFLICT) {
          console.error(formatConflictReport(outcome.report));
          console.error('Re-run with --on-conflict replace|extend|abort to decide.');
        }
        break;
    }
    return outcome.exitCode;
  } finally {
    readlinePrompt?.close();
    logger.setLevel(previousLevel);
  }
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse `key=value` pairs; the value may itself contain '='.
 */
export function parseAssignments(assignments: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const assignment of assignments) {
    const index = assignment.indexOf('=');
    if (index <= 0) {
      throw new ValidationError(ErrorCodes.INVALID_OPTION_VALUE, `Expected key=value, got '${assignment}'`, {
        assignment,
      });
    }
    result[assignment.slice(0, index).trim()] = assignment.slice(index + 1);
  }
  return result;
}

function parseResolution(value: string | undefined): ConflictResolution | undefined {
  if (value === undefined) return undefined;
  if (isConflictResolution(value)) return value;
  throw new ValidationError(ErrorCodes.INVALID_OPTION_VALUE, `Invalid --on-conflict value '${value}'`, {
    option: 'on-conflict',
    value,
    allowed: ['replace', 'extend', 'abort'],
  });
}
