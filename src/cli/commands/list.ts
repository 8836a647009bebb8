/**
 * CLI commands for browsing the generator catalog: `list` and `show`.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { GeneratorCatalog } from '../../core/catalog/catalog.js';
import { loadConfig } from '../../core/config/index.js';
import { ExitCodes } from '../../core/pipeline/exit-codes.js';
import { formatError, formatGenerator, formatGeneratorList } from '../formatters/human.js';
import { AppForgeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

interface CatalogOptions {
  root: string;
  json?: boolean;
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List available generators')
    .option('-r, --root <dir>', 'Project root (for project-local stores)', process.cwd())
    .option('--json', 'Output as JSON')
    .action(async (options: CatalogOptions) => {
      await runCatalogCommand(options, async (catalog) => {
        const definitions = catalog.list();
        if (options.json) {
          console.log(JSON.stringify(
            definitions.map(({ id, version, description }) => ({ id, version, description })),
            null,
            2
          ));
          return;
        }
        console.log(formatGeneratorList(definitions));
      });
    });
}

export function createShowCommand(): Command {
  return new Command('show')
    .description('Show a generator\'s options, templates and capabilities')
    .argument('<generator>', 'Generator id')
    .option('-r, --root <dir>', 'Project root (for project-local stores)', process.cwd())
    .option('--json', 'Output as JSON')
    .action(async (generatorId: string, options: CatalogOptions) => {
      await runCatalogCommand(options, async (catalog) => {
        const definition = catalog.lookup(generatorId);
        if (options.json) {
          const { templates, ...rest } = definition;
          console.log(JSON.stringify(
            { ...rest, templates: templates.map(({ template, ...ref }) => ({ ...ref, source: template.path })) },
            null,
            2
          ));
          return;
        }
        console.log(formatGenerator(definition));
      });
    });
}

async function runCatalogCommand(
  options: CatalogOptions,
  body: (catalog: GeneratorCatalog) => Promise<void>
): Promise<void> {
  try {
    const root = path.resolve(options.root);
    const config = await loadConfig(root);
    await body(await GeneratorCatalog.loadForProject(root, config.stores));
  } catch (error) {
    if (error instanceof AppForgeError) {
      console.error(formatError(error));
    } else {
      logger.error(error instanceof Error ? error.message : 'Unknown error');
    }
    process.exit(ExitCodes.FATAL);
  }
}
