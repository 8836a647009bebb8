/**
 * Generator Catalog - read-only registry of Generator Definitions, built once
 * per process from one or more Template Stores and passed by reference.
 */
import * as path from 'node:path';
import { loadTemplateStore, getBundledStorePath } from '../store/loader.js';
import type { GeneratorDefinition } from '../store/types.js';
import { NotFoundError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('catalog');

export class GeneratorCatalog {
  private readonly generators: ReadonlyMap<string, GeneratorDefinition>;

  constructor(definitions: Iterable<GeneratorDefinition>) {
    const byId = new Map<string, GeneratorDefinition>();
    for (const definition of definitions) {
      if (byId.has(definition.id)) {
        log.debug(`Generator '${definition.id}' from ${definition.storePath} overrides an earlier definition`);
      }
      byId.set(definition.id, definition);
    }
    this.generators = byId;
  }

  /**
   * Load a catalog from store directories. Later stores override generators
   * with the same id from earlier ones.
   */
  static async load(storeRoots: readonly string[]): Promise<GeneratorCatalog> {
    const definitions: GeneratorDefinition[] = [];
    for (const root of storeRoots) {
      const store = await loadTemplateStore(root);
      definitions.push(...store.generators);
    }
    return new GeneratorCatalog(definitions);
  }

  /**
   * Load the bundled store followed by project-local stores.
   */
  static async loadForProject(projectRoot: string, extraStores: readonly string[] = []): Promise<GeneratorCatalog> {
    const roots = [getBundledStorePath(), ...extraStores.map((store) => path.resolve(projectRoot, store))];
    return GeneratorCatalog.load(roots);
  }

  lookup(id: string): GeneratorDefinition {
    const definition = this.generators.get(id);
    if (!definition) {
      throw new NotFoundError(
        ErrorCodes.UNKNOWN_GENERATOR,
        `Unknown generator '${id}'`,
        { generatorId: id, available: this.ids() }
      );
    }
    return definition;
  }

  has(id: string): boolean {
    return this.generators.has(id);
  }

  ids(): string[] {
    return [...this.generators.keys()].sort();
  }

  /** All definitions sorted by id. */
  list(): GeneratorDefinition[] {
    return this.ids().flatMap((id) => {
      const definition = this.generators.get(id);
      return definition ? [definition] : [];
    });
  }
}
