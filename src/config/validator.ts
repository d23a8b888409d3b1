// src/config/validator.ts
// Runtime validator for brewmap configuration files

import type { PartialAppConfig } from './types.js';

export type ValidationSeverity = 'error' | 'warning';

export interface ValidationMessage {
  severity: ValidationSeverity;
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationMessage[];
  warnings: ValidationMessage[];
}

// Known keys for each config section
const KNOWN_KEYS = {
  root: ['app', 'layer', 'map'],
  app: ['width', 'height'],
  layer: ['color', 'selectionColor'],
  map: ['basemap'],
  basemap: ['id', 'styleUrl'],
};

// Keys that exist in AppConfig but always come from the defaults
const FIXED_KEYS: Record<string, string[]> = {
  root: ['portal', 'identify', 'callout'],
  app: ['title'],
  layer: ['index'],
};

/**
 * Validates a configuration object loaded from JSON.
 * Every section is optional because the file is merged over the defaults,
 * but values that are present must have the right type and range.
 */
export function validateConfig(config: unknown): ValidationResult {
  const errors: ValidationMessage[] = [];
  const warnings: ValidationMessage[] = [];

  if (!isObject(config)) {
    errors.push({ severity: 'error', path: '', message: 'Configuration must be an object' });
    return { valid: false, errors, warnings };
  }

  checkFixedKeys(config, FIXED_KEYS.root, '', errors);
  checkUnknownKeys(config, KNOWN_KEYS.root, '', warnings, FIXED_KEYS.root);

  const app = readSection(config, 'app', errors, warnings);
  if (app) {
    checkNumber(app, 'width', 'app', errors, { min: 1 });
    checkNumber(app, 'height', 'app', errors, { min: 1 });
  }

  const layer = readSection(config, 'layer', errors, warnings);
  if (layer) {
    checkString(layer, 'color', 'layer', errors);
    checkString(layer, 'selectionColor', 'layer', errors);
  }

  const map = readSection(config, 'map', errors, warnings);
  if (map && map.basemap !== undefined) {
    if (!isObject(map.basemap)) {
      errors.push({ severity: 'error', path: 'map.basemap', message: '"basemap" must be an object' });
    } else {
      checkUnknownKeys(map.basemap, KNOWN_KEYS.basemap, 'map.basemap', warnings);
      checkString(map.basemap, 'id', 'map.basemap', errors);
      checkUrl(map.basemap, 'styleUrl', 'map.basemap', errors);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function readSection(
  config: Record<string, unknown>,
  name: keyof typeof KNOWN_KEYS,
  errors: ValidationMessage[],
  warnings: ValidationMessage[]
): Record<string, unknown> | null {
  const section = config[name];
  if (section === undefined) {
    return null;
  }
  if (!isObject(section)) {
    errors.push({ severity: 'error', path: name, message: `"${name}" must be an object` });
    return null;
  }
  const fixed = FIXED_KEYS[name] ?? [];
  checkFixedKeys(section, fixed, name, errors);
  checkUnknownKeys(section, KNOWN_KEYS[name], name, warnings, fixed);
  return section;
}

function checkString(
  obj: Record<string, unknown>,
  key: string,
  path: string,
  errors: ValidationMessage[]
): boolean {
  const value = obj[key];
  if (value === undefined) {
    return false;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    errors.push({ severity: 'error', path: `${path}.${key}`, message: `"${key}" must be a non-empty string` });
    return false;
  }
  return true;
}

function checkUrl(
  obj: Record<string, unknown>,
  key: string,
  path: string,
  errors: ValidationMessage[]
): void {
  if (!checkString(obj, key, path, errors)) {
    return;
  }
  const value = String(obj[key]);
  if (!/^https?:\/\//i.test(value)) {
    errors.push({ severity: 'error', path: `${path}.${key}`, message: `"${key}" must be an http(s) URL` });
  }
}

function checkNumber(
  obj: Record<string, unknown>,
  key: string,
  path: string,
  errors: ValidationMessage[],
  limits: { min?: number; integer?: boolean } = {}
): void {
  const value = obj[key];
  if (value === undefined) {
    return;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    errors.push({ severity: 'error', path: `${path}.${key}`, message: `"${key}" must be a number` });
    return;
  }
  if (limits.integer && !Number.isInteger(value)) {
    errors.push({ severity: 'error', path: `${path}.${key}`, message: `"${key}" must be an integer` });
    return;
  }
  if (limits.min !== undefined && value < limits.min) {
    errors.push({ severity: 'error', path: `${path}.${key}`, message: `"${key}" must be at least ${limits.min}` });
  }
}

// Helper functions

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkUnknownKeys(
  obj: Record<string, unknown>,
  knownKeys: string[],
  path: string,
  warnings: ValidationMessage[],
  fixedKeys: string[] = []
): void {
  Object.keys(obj).forEach((key) => {
    if (!knownKeys.includes(key) && !fixedKeys.includes(key)) {
      warnings.push({
        severity: 'warning',
        path: path ? `${path}.${key}` : key,
        message: `Unknown key "${key}"`,
      });
    }
  });
}

function checkFixedKeys(
  obj: Record<string, unknown>,
  fixedKeys: string[],
  path: string,
  errors: ValidationMessage[]
): void {
  fixedKeys.forEach((key) => {
    if (obj[key] !== undefined) {
      errors.push({
        severity: 'error',
        path: path ? `${path}.${key}` : key,
        message: `"${key}" is fixed and cannot be overridden`,
      });
    }
  });
}

/**
 * Throws when `config` is not a valid (partial) configuration.
 * The error message lists every invalid path.
 */
export function assertValidConfig(config: unknown, origin = 'config'): asserts config is PartialAppConfig {
  const result = validateConfig(config);
  if (!result.valid) {
    const errorMessages = result.errors.map(e => `  ${e.path}: ${e.message}`).join('\n');
    throw new Error(`Invalid config from "${origin}":\n${errorMessages}`);
  }
}
