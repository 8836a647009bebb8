import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createGenerateCommand } from './commands/generate.js';
import { createListCommand, createShowCommand } from './commands/list.js';
import { createAnalyzeCommand } from './commands/analyze.js';
import { logger } from '../utils/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION = readVersion(resolve(__dirname, '../../package.json'));

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('appforge')
    .description('Project-aware code generation for app source trees')
    .version(VERSION)
    .option('-v, --verbose', 'Log debug output')
    .option('-q, --quiet', 'Only log errors')
    .hook('preAction', (command) => {
      const { verbose, quiet } = command.opts<{ verbose?: boolean; quiet?: boolean }>();
      if (verbose) logger.setLevel('debug');
      else if (quiet) logger.setLevel('error');
    });

  [createGenerateCommand, createListCommand, createShowCommand, createAnalyzeCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}

function readVersion(packageJsonPath: string): string {
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}
