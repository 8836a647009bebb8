export { loadConfig, getDefaultConfig, mergeConfig, getConfigPath, CONFIG_DIR } from './loader.js';
export { ConfigSchema, DEFAULT_SCAN_EXCLUDES, defaultConcurrency } from './schema.js';
export type {
  Config,
  ScanSettings,
  DetectionSettings,
  ConflictSettings,
  PlacementSettings,
  CapabilitySettings,
} from './schema.js';
