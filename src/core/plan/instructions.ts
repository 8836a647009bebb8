/**
 * Integration instructions: capability notes, dependency steps and the
 * generator's own follow-up steps.
 */
import { capabilityNotes } from './capabilities.js';
import type { IntegrationInstructions } from './types.js';
import type { DependencyManager } from '../analyzer/types.js';
import type { GenerationConfig, GeneratorDefinition, PackageDependency } from '../store/types.js';
import { renderSource } from '../render/renderer.js';
import { testCondition } from '../render/condition.js';

export function buildInstructions(
  definition: GeneratorDefinition,
  config: GenerationConfig,
  manager: DependencyManager | undefined,
  extraSteps: readonly string[] = []
): IntegrationInstructions {
  const dependencies = definition.dependencies
    .filter((dependency) => dependency.when === undefined || testCondition(dependency.when, config))
    .map((dependency) => dependencyStep(dependency, manager));

  const steps = definition.integration
    .map((step, index) => renderSource(step, config, `${definition.id}:integration[${index}]`).trim())
    .filter((step) => step !== '');

  return {
    capabilities: capabilityNotes(definition),
    dependencies,
    steps: [...steps, ...extraSteps],
  };
}

/**
 * One install step in the idiom of the project's dependency manager, falling
 * back to whichever coordinates the dependency provides.
 */
export function dependencyStep(dependency: PackageDependency, manager: DependencyManager | undefined): string {
  const { name, url, pod, carthage, version } = dependency;

  if (manager === 'cocoapods' && pod) {
    return `Add \`pod '${pod}'${version ? `, '~> ${version}'` : ''}\` to the Podfile and run \`pod install\`.`;
  }
  if (manager === 'carthage' && carthage) {
    return `Add \`github "${carthage}"${version ? ` ~> ${version}` : ''}\` to the Cartfile and run \`carthage update\`.`;
  }
  if (url) {
    const where = manager === 'spm' ? 'to Package.swift dependencies' : 'via File > Add Package Dependencies';
    return `Add Swift package ${url}${version ? ` (from: "${version}")` : ''} ${where} and link the ${name} product.`;
  }
  if (pod) {
    return `Add \`pod '${pod}'${version ? `, '~> ${version}'` : ''}\` to the Podfile and run \`pod install\`.`;
  }
  if (carthage) {
    return `Add \`github "${carthage}"${version ? ` ~> ${version}` : ''}\` to the Cartfile and run \`carthage update\`.`;
  }
  return `Add the ${name} library${version ? ` (${version})` : ''} to the project.`;
}
