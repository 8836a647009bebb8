/**
 * Interactive prompt collaborator on a readline interface.
 *
 * Invalid answers are re-asked; closing the input (Ctrl+D) or Ctrl+C cancels.
 */
import * as readline from 'node:readline';
import chalk from 'chalk';
import type { ConflictResolution, PromptAnswer, PromptCollaborator } from '../../core/resolver/prompt.js';
import { validateOptionValue } from '../../core/resolver/resolver.js';
import type { OptionDescriptor } from '../../core/store/types.js';
import { blockingEntries, type ConflictReport } from '../../core/conflicts/types.js';
import type { GenerationPlan } from '../../core/plan/types.js';
import { ValidationError } from '../../utils/errors.js';
import { formatPlan } from '../formatters/human.js';

export interface ReadlinePromptOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export class ReadlinePrompt implements PromptCollaborator {
  private readonly rl: readline.Interface;
  private readonly output: NodeJS.WritableStream;
  private closed = false;

  constructor(options: ReadlinePromptOptions = {}) {
    this.output = options.output ?? process.stderr;
    this.rl = readline.createInterface({ input: options.input ?? process.stdin, output: this.output });
    this.rl.on('close', () => {
      this.closed = true;
    });
    this.rl.on('SIGINT', () => this.rl.close());
  }

  async requestValue(option: OptionDescriptor): Promise<PromptAnswer> {
    this.say('');
    this.say(chalk.bold(option.name) + (option.description ? chalk.dim(`  ${option.description}`) : ''));
    if (option.type === 'enum') {
      option.values.forEach((value, index) => this.say(`  ${index + 1}) ${value}`));
    }

    while (true) {
      const input = await this.ask(chalk.cyan(`  ${hintFor(option)}: `));
      if (input === undefined) return { kind: 'cancel' };

      const raw = interpret(option, input.trim());
      if (raw === undefined) {
        this.say(chalk.yellow('  A value is required'));
        continue;
      }
      try {
        return { kind: 'value', value: validateOptionValue(option, raw) };
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        this.say(chalk.yellow(`  ${error.message}`));
      }
    }
  }

  async chooseResolution(report: ConflictReport): Promise<ConflictResolution | undefined> {
    this.say('');
    this.say(chalk.red.bold(`Existing code conflicts with ${report.generatorId}:`));
    for (const entry of blockingEntries(report)) {
      const where = entry.matchedSymbol ? `${entry.matchedSymbol} in ${entry.matchedPath}` : entry.matchedPath;
      this.say(`  ✗ ${where} ${chalk.dim(`(${entry.reason})`)}`);
    }

    while (true) {
      const input = await this.ask(chalk.cyan('  [r]eplace, [e]xtend or [a]bort: '));
      if (input === undefined) return 'abort';
      const answer = input.trim().toLowerCase();
      if (answer === 'r' || answer === 'replace') return 'replace';
      if (answer === 'e' || answer === 'extend') return 'extend';
      if (answer === 'a' || answer === 'abort') return 'abort';
      this.say(chalk.yellow('  Please enter r, e or a'));
    }
  }

  /** Show the plan and ask before anything is written. */
  async confirm(plan: GenerationPlan): Promise<boolean> {
    this.say('');
    this.say(formatPlan(plan));
    this.say('');
    const input = await this.ask(chalk.cyan('Apply? [Y/n]: '));
    if (input === undefined) return false;
    return ['', 'y', 'yes'].includes(input.trim().toLowerCase());
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }

  private ask(question: string): Promise<string | undefined> {
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => {
      const onClose = (): void => resolve(undefined);
      this.rl.once('close', onClose);
      this.rl.question(question, (answer) => {
        this.rl.off('close', onClose);
        resolve(answer);
      });
    });
  }

  private say(line: string): void {
    this.output.write(`${line}\n`);
  }
}

function hintFor(option: OptionDescriptor): string {
  const fallback = option.default !== undefined ? ` [${String(option.default)}]` : '';
  switch (option.type) {
    case 'enum':
      return `choose 1-${option.values.length}${fallback}`;
    case 'bool':
      return `y/n${fallback}`;
    case 'string':
      return `value${fallback}`;
  }
}

/**
 * Map raw input to a candidate value: empty takes the default, enum answers
 * may be a number from the list.
 */
function interpret(option: OptionDescriptor, input: string): string | boolean | undefined {
  if (input === '') return option.default;
  if (option.type === 'enum' && /^\d+$/.test(input)) {
    return option.values[Number(input) - 1] ?? input;
  }
  return input;
}
