/**
 * Documented default directories per category, relative to the source root.
 */
import type { ArchitectureConvention } from '../analyzer/types.js';

type CategoryDirectories = Readonly<Record<string, string>>;

const GENERIC_DEFAULTS: CategoryDirectories = {
  service: 'Services',
  provider: 'Services/Providers',
  view: 'Views',
  viewmodel: 'ViewModels',
  model: 'Models',
  manager: 'Managers',
  utility: 'Utilities',
  config: 'Config',
  ci: 'ci_scripts',
};

const ARCHITECTURE_DEFAULTS: Readonly<Record<ArchitectureConvention, CategoryDirectories>> = {
  mvvm: {},
  mvc: { view: 'Controllers', viewmodel: 'Controllers' },
  unstructured: {},
  tca: {
    service: 'Dependencies',
    provider: 'Dependencies/Live',
    view: 'Features',
    viewmodel: 'Features',
    manager: 'Dependencies',
  },
  viper: {
    view: 'Modules',
    viewmodel: 'Modules',
    service: 'Services',
    provider: 'Services/Providers',
    model: 'Entities',
  },
  clean: {
    service: 'Data/Services',
    provider: 'Data/Providers',
    manager: 'Data/Managers',
    model: 'Domain/Models',
    view: 'Presentation/Views',
    viewmodel: 'Presentation/ViewModels',
    utility: 'Core/Utilities',
    config: 'Core/Config',
  },
};

/**
 * Default directory for a category under the given architecture, if one is
 * documented.
 */
export function defaultDirectory(category: string, architecture: ArchitectureConvention | undefined): string | undefined {
  const specific = architecture ? ARCHITECTURE_DEFAULTS[architecture][category] : undefined;
  return specific ?? GENERIC_DEFAULTS[category];
}
