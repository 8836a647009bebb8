/**
 * Ambiguous profile fields become prompt-only options; these helpers build
 * those options and read the user's answers back.
 */
import {
  ARCHITECTURE_CONVENTIONS,
  DEPENDENCY_MANAGERS,
  isAmbiguous,
  type ArchitectureConvention,
  type DependencyManager,
  type DetectedField,
  type ProjectProfile,
} from './types.js';
import { ambiguousChoices } from './analyzer.js';
import type { EnumOption, GenerationConfig } from '../store/types.js';
import type { DetectionSettings } from '../config/index.js';

export const ARCHITECTURE_OPTION = 'architecture';
export const DEPENDENCY_MANAGER_OPTION = 'dependency_manager';

/**
 * Enum options, without defaults, for every ambiguous field of the profile.
 */
export function ambiguityOptions(profile: ProjectProfile, settings: DetectionSettings): EnumOption[] {
  const options: EnumOption[] = [];
  if (isAmbiguous(profile.architecture)) {
    options.push({
      name: ARCHITECTURE_OPTION,
      type: 'enum',
      values: choicesFor(profile.architecture, settings, ARCHITECTURE_CONVENTIONS),
      description: 'Architecture convention (detection was ambiguous)',
    });
  }
  if (isAmbiguous(profile.dependencyManager)) {
    options.push({
      name: DEPENDENCY_MANAGER_OPTION,
      type: 'enum',
      values: choicesFor(profile.dependencyManager, settings, DEPENDENCY_MANAGERS),
      description: 'Dependency manager (detection was ambiguous)',
    });
  }
  return options;
}

export function resolvedArchitecture(
  profile: ProjectProfile,
  config: GenerationConfig
): ArchitectureConvention | undefined {
  return resolveField(profile.architecture, config[ARCHITECTURE_OPTION], ARCHITECTURE_CONVENTIONS);
}

export function resolvedDependencyManager(
  profile: ProjectProfile,
  config: GenerationConfig
): DependencyManager | undefined {
  return resolveField(profile.dependencyManager, config[DEPENDENCY_MANAGER_OPTION], DEPENDENCY_MANAGERS);
}

function resolveField<T extends string>(
  field: DetectedField<T>,
  answer: unknown,
  values: readonly T[]
): T | undefined {
  const value = isAmbiguous(field) ? answer : field.value;
  return values.find((candidate) => candidate === value);
}

function choicesFor<T extends string>(field: DetectedField<T>, settings: DetectionSettings, all: readonly T[]): T[] {
  const choices = ambiguousChoices(field, settings);
  return choices.length >= 2 ? choices : [...all];
}
