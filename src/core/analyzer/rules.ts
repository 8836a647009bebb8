/**
 * Heuristic signal rules. Each rule matches files by path glob and, when it
 * has one, a content signature. Every matching file adds `weight` to the
 * rule's value, up to `maxHits` files.
 */
import { minimatch } from 'minimatch';
import type { ArchitectureConvention, DependencyManager, Platform } from './types.js';

export interface SignalRule<T extends string> {
  name: string;
  value: T;
  /** Glob over the root-relative path */
  file: string;
  content?: RegExp;
  weight: number;
  maxHits?: number;
}

export const DEPENDENCY_MANAGER_RULES: readonly SignalRule<DependencyManager>[] = [
  { name: 'package-swift', value: 'spm', file: 'Package.swift', weight: 0.9 },
  { name: 'package-resolved', value: 'spm', file: '**/Package.resolved', weight: 0.5 },
  {
    name: 'xcode-package-reference',
    value: 'spm',
    file: '**/project.pbxproj',
    content: /XCRemoteSwiftPackageReference/,
    weight: 0.7,
  },
  { name: 'podfile', value: 'cocoapods', file: 'Podfile', weight: 0.9 },
  { name: 'podfile-lock', value: 'cocoapods', file: 'Podfile.lock', weight: 0.5 },
  { name: 'cartfile', value: 'carthage', file: 'Cartfile', weight: 0.9 },
  { name: 'cartfile-resolved', value: 'carthage', file: 'Cartfile.resolved', weight: 0.5 },
];

export const ARCHITECTURE_RULES: readonly SignalRule<ArchitectureConvention>[] = [
  // MVVM
  { name: 'viewmodel-file', value: 'mvvm', file: '**/*ViewModel.swift', weight: 0.15, maxHits: 4 },
  { name: 'viewmodels-directory', value: 'mvvm', file: '**/ViewModels/**', weight: 0.2 },
  {
    name: 'observable-object',
    value: 'mvvm',
    file: '**/*.swift',
    content: /:\s*(?:[\w.]+\s*,\s*)*ObservableObject\b|^@Observable\b/m,
    weight: 0.1,
    maxHits: 3,
  },
  // The Composable Architecture
  {
    name: 'composable-architecture-import',
    value: 'tca',
    file: '**/*.swift',
    content: /^import\s+ComposableArchitecture\b/m,
    weight: 0.3,
    maxHits: 3,
  },
  { name: 'reducer-macro', value: 'tca', file: '**/*.swift', content: /^@Reducer\b/m, weight: 0.2, maxHits: 2 },
  // VIPER
  { name: 'presenter-file', value: 'viper', file: '**/*Presenter.swift', weight: 0.15, maxHits: 3 },
  { name: 'interactor-file', value: 'viper', file: '**/*Interactor.swift', weight: 0.15, maxHits: 3 },
  { name: 'wireframe-file', value: 'viper', file: '**/*Wireframe.swift', weight: 0.15, maxHits: 2 },
  // MVC
  { name: 'viewcontroller-file', value: 'mvc', file: '**/*ViewController.swift', weight: 0.1, maxHits: 3 },
  {
    name: 'uikit-controller-subclass',
    value: 'mvc',
    file: '**/*.swift',
    content: /^(?:final\s+)?class\s+\w+\s*:\s*UI(?:Table|Collection|Navigation)?ViewController\b/m,
    weight: 0.15,
    maxHits: 4,
  },
  // Clean architecture
  { name: 'usecase-file', value: 'clean', file: '**/*UseCase.swift', weight: 0.15, maxHits: 4 },
  { name: 'domain-directory', value: 'clean', file: '**/Domain/**', weight: 0.15 },
  { name: 'presentation-directory', value: 'clean', file: '**/Presentation/**', weight: 0.15 },
  { name: 'repository-file', value: 'clean', file: '**/*Repository.swift', weight: 0.05, maxHits: 2 },
];

export function matchesRuleFile<T extends string>(rule: SignalRule<T>, relativePath: string): boolean {
  return minimatch(relativePath, rule.file, { dot: true });
}

/** Files whose content rules and the platform parser need. */
export function needsContent(relativePath: string): boolean {
  return /\.(swift|h|m|mm|sh|pbxproj|resolved|ya?ml|json|plist|xcconfig|md|txt|lock)$/.test(relativePath)
    || /(^|\/)(Podfile|Cartfile)$/.test(relativePath);
}

// Platform markers

const PACKAGE_PLATFORM = /\.(iOS|macOS|watchOS|tvOS|visionOS)\(\s*(?:\.v(\d+(?:_\d+)*)|"(\d+(?:\.\d+)*)")\s*\)/g;
const TOOLS_VERSION = /^\/\/\s*swift-tools-version\s*:\s*(\d+(?:\.\d+)*)/m;

const PBXPROJ_TARGETS: ReadonlyArray<[string, Platform]> = [
  ['IPHONEOS_DEPLOYMENT_TARGET', 'iOS'],
  ['MACOSX_DEPLOYMENT_TARGET', 'macOS'],
  ['WATCHOS_DEPLOYMENT_TARGET', 'watchOS'],
  ['TVOS_DEPLOYMENT_TARGET', 'tvOS'],
  ['XROS_DEPLOYMENT_TARGET', 'visionOS'],
];

function isPlatform(name: string): name is Platform {
  return ['iOS', 'macOS', 'watchOS', 'tvOS', 'visionOS'].includes(name);
}

/**
 * Platforms declared in a Package.swift manifest.
 */
export function parsePackagePlatforms(content: string): Array<{ platform: Platform; version: string }> {
  const markers: Array<{ platform: Platform; version: string }> = [];
  for (const match of content.matchAll(PACKAGE_PLATFORM)) {
    const platform = match[1];
    if (!isPlatform(platform)) continue;
    const version = match[2] !== undefined ? match[2].replace(/_/g, '.') : match[3];
    if (version !== undefined) markers.push({ platform, version });
  }
  return markers;
}

export function parseToolsVersion(content: string): string | undefined {
  return TOOLS_VERSION.exec(content)?.[1];
}

/**
 * Deployment targets declared in an Xcode project file.
 */
export function parsePbxprojPlatforms(content: string): Array<{ platform: Platform; version: string }> {
  const markers: Array<{ platform: Platform; version: string }> = [];
  for (const [setting, platform] of PBXPROJ_TARGETS) {
    const pattern = new RegExp(`\\b${setting}\\s*=\\s*"?(\\d+(?:\\.\\d+)*)"?\\s*;`, 'g');
    for (const match of content.matchAll(pattern)) {
      markers.push({ platform, version: match[1] });
    }
  }
  return markers;
}
