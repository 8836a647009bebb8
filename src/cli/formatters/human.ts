/**
 * Human-readable output for plans, conflict reports, profiles and errors.
 */
import chalk from 'chalk';
import type { GenerationPlan } from '../../core/plan/types.js';
import type { ConflictEntry, ConflictReport } from '../../core/conflicts/types.js';
import type { DetectedField, ProjectProfile } from '../../core/analyzer/types.js';
import type { GeneratorDefinition, OptionDescriptor } from '../../core/store/types.js';
import type { ApplyResult } from '../../core/executor/executor.js';
import type { AppForgeError } from '../../utils/errors.js';

export function formatPlan(plan: GenerationPlan): string {
  const lines: string[] = [];
  const count = plan.artifacts.length;
  lines.push(chalk.bold(`Plan for ${plan.generatorId} ${plan.generatorVersion} (${count} file${count === 1 ? '' : 's'})`));

  for (const artifact of plan.artifacts) {
    const marker = artifact.kind === 'create' ? chalk.green('+ create') : chalk.yellow('~ modify');
    lines.push(`  ${marker}  ${artifact.path}  ${chalk.dim(`[${artifact.category}, ${artifact.placement}]`)}`);
  }
  for (const unchanged of plan.unchanged) {
    lines.push(`  ${chalk.dim('= same  ')}  ${unchanged}`);
  }
  for (const skipped of plan.skipped) {
    lines.push(`  ${chalk.dim('- skip  ')}  ${skipped.path}  ${chalk.dim(skipped.reason)}`);
  }

  if (plan.conflicts.length > 0) {
    lines.push('', chalk.bold('Conflicts:'));
    lines.push(...plan.conflicts.map(formatConflictEntry));
    if (plan.resolution) {
      lines.push(chalk.dim(`  resolved with: ${plan.resolution}`));
    }
  }

  lines.push(...formatInstructions(plan));
  return lines.join('\n');
}

export function formatInstructions(plan: GenerationPlan): string[] {
  const { capabilities, dependencies, steps } = plan.instructions;
  const lines: string[] = [];

  const notes = capabilities.filter((entry) => entry.capability !== 'filesystem-write');
  if (notes.length > 0) {
    lines.push('', chalk.bold('Capabilities:'));
    lines.push(...notes.map((entry) => `  • ${chalk.cyan(entry.capability)}: ${entry.note}`));
  }
  if (dependencies.length > 0) {
    lines.push('', chalk.bold('Dependencies:'));
    lines.push(...dependencies.map((step) => `  • ${step}`));
  }
  if (steps.length > 0) {
    lines.push('', chalk.bold('Next steps:'));
    lines.push(...steps.map((step, index) => `  ${index + 1}. ${step}`));
  }
  return lines;
}

export function formatApplyResult(result: ApplyResult): string {
  const lines = [chalk.green(`✓ Wrote ${result.written.length} file${result.written.length === 1 ? '' : 's'}`)];
  lines.push(...result.created.map((file) => `  ${chalk.green('+')} ${file}`));
  lines.push(...result.modified.map((file) => `  ${chalk.yellow('~')} ${file}`));
  lines.push(...formatInstructions(result.plan));
  return lines.join('\n');
}

export function formatConflictReport(report: ConflictReport): string {
  if (report.entries.length === 0) {
    return chalk.green(`No conflicts for ${report.generatorId}`);
  }
  return [chalk.bold(`Conflicts for ${report.generatorId}:`), ...report.entries.map(formatConflictEntry)].join('\n');
}

function formatConflictEntry(entry: ConflictEntry): string {
  const severity = entry.severity === 'blocking' ? chalk.red('✗ blocking') : chalk.yellow('⚠ warning ');
  const where = entry.matchedSymbol ? `${entry.matchedSymbol} in ${entry.matchedPath}` : entry.matchedPath;
  return `  ${severity}  ${where}  ${chalk.dim(`${entry.reason}; pattern ${entry.pattern}`)}`;
}

export function formatProfile(profile: ProjectProfile): string {
  const lines: string[] = [chalk.bold(`Project: ${profile.root}`)];

  const platforms = profile.platforms.map((marker) => `${marker.platform} ${marker.version}`).join(', ');
  lines.push(`  Platforms:          ${platforms || chalk.dim('(none detected)')}`);
  if (profile.swiftToolsVersion) {
    lines.push(`  Swift tools:        ${profile.swiftToolsVersion}`);
  }
  lines.push(`  Dependency manager: ${formatField(profile.dependencyManager)}`);
  lines.push(`  Architecture:       ${formatField(profile.architecture)}`);
  lines.push(`  Source root:        ${profile.sourceRoot}${profile.sourceRootDetected ? '' : chalk.dim(' (default)')}`);

  const symbols = profile.symbols.filter((entry) => entry.kind === 'symbol').length;
  lines.push(`  Indexed:            ${profile.fileCount} files, ${symbols} symbols`);
  if (profile.truncated) {
    lines.push(chalk.yellow('  Scan stopped at scan.max_files; results may be incomplete'));
  }
  if (profile.unreadableFiles.length > 0) {
    lines.push(chalk.yellow(`  Unreadable files:   ${profile.unreadableFiles.length}`));
  }
  return lines.join('\n');
}

function formatField<T extends string>(field: DetectedField<T>): string {
  const value = field.value === 'ambiguous' ? chalk.yellow(field.value) : chalk.cyan(field.value);
  const candidates = field.candidates
    .slice(0, 3)
    .map((candidate) => `${candidate.value} ${candidate.confidence.toFixed(2)}`)
    .join(', ');
  return candidates ? `${value} ${chalk.dim(`(${candidates})`)}` : value;
}

export function formatGeneratorList(definitions: readonly GeneratorDefinition[]): string {
  if (definitions.length === 0) {
    return chalk.dim('No generators available.');
  }
  const width = Math.max(...definitions.map((definition) => definition.id.length));
  return definitions
    .map((definition) => `  ${chalk.cyan(definition.id.padEnd(width))}  ${definition.description}`)
    .join('\n');
}

export function formatGenerator(definition: GeneratorDefinition): string {
  const lines = [chalk.bold(`${definition.id} ${definition.version}`), `  ${definition.description}`, ''];

  lines.push(chalk.bold('Options:'));
  lines.push(...(definition.options.length > 0 ? definition.options.map(formatOption) : [chalk.dim('  (none)')]));

  lines.push('', chalk.bold('Templates:'));
  for (const ref of definition.templates) {
    const when = ref.when ? chalk.dim(` when ${ref.when}`) : '';
    lines.push(`  ${ref.name}  ${chalk.dim(`→ ${ref.output} [${ref.category}]`)}${when}`);
  }

  lines.push('', chalk.bold('Capabilities:'), `  ${definition.capabilities.join(', ') || chalk.dim('(none)')}`);
  if (definition.conflicts.length > 0) {
    lines.push('', chalk.bold('Conflict patterns:'));
    lines.push(...definition.conflicts.map((pattern) => `  ${pattern.kind}: ${pattern.pattern}`));
  }
  return lines.join('\n');
}

export function formatOption(option: OptionDescriptor): string {
  const type = option.type === 'enum' ? option.values.join(' | ') : option.type;
  const fallback = option.default !== undefined ? chalk.dim(` (default: ${String(option.default)})`) : '';
  const description = option.description ? `  ${chalk.dim(option.description)}` : '';
  return `  ${chalk.cyan(option.name)}: ${type}${fallback}${description}`;
}

export function formatError(error: AppForgeError): string {
  const lines = [`${chalk.red(error.name)} ${chalk.dim(`[${error.code}]`)} ${error.message}`];
  for (const [key, value] of Object.entries(error.details ?? {})) {
    if (value === undefined) continue;
    lines.push(chalk.dim(`  ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`));
  }
  return lines.join('\n');
}
