import * as os from 'node:os';
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Directories never worth scanning in an app project. */
export const DEFAULT_SCAN_EXCLUDES = [
  '**/.git/**',
  '**/build/**',
  '**/DerivedData/**',
  '**/Pods/**',
  '**/Carthage/**',
  '**/.build/**',
  '**/.swiftpm/**',
  '**/node_modules/**',
  '**/*.xcassets/**',
];

/** 75% of available CPUs, min 2, max 16. */
export function defaultConcurrency(): number {
  return Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);
}

/** Project scan bounds. */
export const ScanSettingsSchema = z.object({
  max_depth: z.number().int().min(1).default(8),
  max_files: z.number().int().min(1).default(5000),
  /** Parallel file reads; defaults to 75% of CPUs */
  concurrency: z.number().int().min(1).max(64).optional(),
  /** Largest file read for content signatures, in bytes */
  max_file_bytes: z.number().int().min(1024).default(512 * 1024),
  exclude: z.array(z.string()).default(DEFAULT_SCAN_EXCLUDES),
});

/** Confidence thresholds for convention detection. */
export const DetectionSettingsSchema = z.object({
  /** Below this, no convention is considered detected */
  min_confidence: z.number().min(0).max(1).default(0.3),
  /** Top two candidates closer than this are reported as ambiguous */
  ambiguity_margin: z.number().min(0).max(1).default(0.15),
});

export const ConflictSettingsSchema = z.object({
  /** Foreign symbols indexed below this confidence only raise warnings */
  min_symbol_confidence: z.number().min(0).max(1).default(0.5),
});

export const PlacementSettingsSchema = z.object({
  fallback_dir: z.string().default('Generated'),
  /** Per-category overrides of the documented default directory */
  directories: z.record(z.string(), z.string()).default({}),
});

export const CapabilitySettingsSchema = z.object({
  /** Capabilities generators may use; omitted means every known capability */
  allow: z.array(z.string()).optional(),
});

/** Complete .appforge/config.yaml schema. */
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  scan: withDefaults(ScanSettingsSchema),
  detection: withDefaults(DetectionSettingsSchema),
  conflicts: withDefaults(ConflictSettingsSchema),
  placement: withDefaults(PlacementSettingsSchema),
  capabilities: withDefaults(CapabilitySettingsSchema),
  /** Extra Template Store directories, relative to the project root */
  stores: z.preprocess((val) => val ?? [], z.array(z.string())),
});

export type ScanSettings = z.infer<typeof ScanSettingsSchema>;
export type DetectionSettings = z.infer<typeof DetectionSettingsSchema>;
export type ConflictSettings = z.infer<typeof ConflictSettingsSchema>;
export type PlacementSettings = z.infer<typeof PlacementSettingsSchema>;
export type CapabilitySettings = z.infer<typeof CapabilitySettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
