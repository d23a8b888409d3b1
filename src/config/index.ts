// src/config/index.ts
// Public API for configuration types and validation

export type {
  AppConfig,
  PartialAppConfig,
  AppShellConfig,
  PortalConfig,
  LayerConfig,
  BasemapConfig,
  MapConfig,
  IdentifyConfig,
  CalloutConfig,
} from './types.js';

export {
  validateConfig,
  assertValidConfig,
  type ValidationResult,
  type ValidationMessage,
  type ValidationSeverity,
} from './validator.js';

export {
  loadAppConfig,
  fetchConfig,
  mergeAppConfig,
  getConfigUrlParam,
  clearConfigCache,
  DEFAULT_APP_CONFIG,
  type LoadedAppConfig,
} from './loader.js';
