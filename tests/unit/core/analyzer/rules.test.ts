/**
 * Tests for detection rules and platform parsing.
 */
import { describe, it, expect } from 'vitest';
import {
  ARCHITECTURE_RULES,
  matchesRuleFile,
  needsContent,
  parsePackagePlatforms,
  parsePbxprojPlatforms,
  parseToolsVersion,
} from '../../../../src/core/analyzer/rules.js';

describe('platform parsing', () => {
  it('should read Package.swift platforms in both version forms', () => {
    expect(parsePackagePlatforms('platforms: [.iOS(.v16_4), .watchOS("9.0"), .macOS(.v14)]')).toEqual([
      { platform: 'iOS', version: '16.4' },
      { platform: 'watchOS', version: '9.0' },
      { platform: 'macOS', version: '14' },
    ]);
  });

  it('should read deployment targets from project files', () => {
    const pbxproj = [
      'IPHONEOS_DEPLOYMENT_TARGET = 16.0;',
      'MACOSX_DEPLOYMENT_TARGET = "13.0";',
      'XROS_DEPLOYMENT_TARGET = 1.0;',
    ].join('\n');

    expect(parsePbxprojPlatforms(pbxproj)).toEqual([
      { platform: 'iOS', version: '16.0' },
      { platform: 'macOS', version: '13.0' },
      { platform: 'visionOS', version: '1.0' },
    ]);
  });

  it('should read the tools version comment', () => {
    expect(parseToolsVersion('// swift-tools-version:5.7\nimport PackageDescription')).toBe('5.7');
    expect(parseToolsVersion('import PackageDescription')).toBeUndefined();
  });
});

describe('rule matching', () => {
  it('should match rule globs against root-relative paths', () => {
    const directoryRule = ARCHITECTURE_RULES.find((rule) => rule.name === 'viewmodels-directory');
    if (!directoryRule) throw new Error('rule missing');

    expect(matchesRuleFile(directoryRule, 'App/ViewModels/HomeViewModel.swift')).toBe(true);
    expect(matchesRuleFile(directoryRule, 'App/Views/HomeView.swift')).toBe(false);
  });

  it('should read only text files that rules inspect', () => {
    expect(needsContent('App/Home.swift')).toBe(true);
    expect(needsContent('Podfile')).toBe(true);
    expect(needsContent('App.xcodeproj/project.pbxproj')).toBe(true);
    expect(needsContent('Assets/icon.png')).toBe(false);
  });
});
