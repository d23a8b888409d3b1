// src/config/loader.ts
// Configuration loader: defaults, optionally overridden by a ?config= JSON file

import type { AppConfig, PartialAppConfig } from './types.js';
import { assertValidConfig, validateConfig } from './validator.js';

const CONFIG_URL_PARAM = 'config';

/** Default configuration: the East Van breweries item on ArcGIS Online */
export const DEFAULT_APP_CONFIG: AppConfig = {
  app: {
    title: 'East Van Breweries',
    width: 800,
    height: 700,
  },
  portal: {
    url: 'https://www.arcgis.com',
    itemId: '317b5f03d5de4f368fb802fe32d15dfa',
  },
  layer: {
    index: 0,
    color: '#e07b39',
    selectionColor: '#00ffff',
  },
  map: {
    basemap: {
      id: 'light-gray-canvas',
      styleUrl: 'https://basemaps.cartocdn.com/gl/positron-gl-style/style.json',
    },
  },
  identify: {
    tolerance: 10,
    maxResults: 10,
    returnPopupsOnly: false,
  },
  callout: {
    title: 'Location',
    animationMs: 0,
  },
};

/** Cache for loaded configs to avoid duplicate fetches */
const configCache = new Map<string, PartialAppConfig>();

/**
 * Gets the config URL from the query string (?config=path/to/config.json)
 */
export function getConfigUrlParam(): string | null {
  const params = new URLSearchParams(window.location.search);
  return params.get(CONFIG_URL_PARAM);
}

/**
 * Fetches and validates a JSON config file.
 * Uses cache to avoid duplicate fetches.
 */
export async function fetchConfig(url: string): Promise<PartialAppConfig> {
  const cached = configCache.get(url);
  if (cached) {
    return cached;
  }

  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`Failed to load config from "${url}": ${response.status} ${response.statusText}`);
  }

  const config: unknown = await response.json();
  assertValidConfig(config, url);

  const { warnings } = validateConfig(config);
  if (warnings.length > 0) {
    console.warn(`[config] Warnings for "${url}":`);
    warnings.forEach(w => console.warn(`  ${w.path}: ${w.message}`));
  }

  configCache.set(url, config);
  return config;
}

/**
 * Merges partial configs section by section over a complete base config.
 * Later sources override earlier ones. Sections a partial config cannot
 * carry (portal, identify, callout) are taken from `base` unchanged.
 */
export function mergeAppConfig(base: AppConfig, ...overrides: PartialAppConfig[]): AppConfig {
  let result: AppConfig = {
    ...base,
    map: { basemap: { ...base.map.basemap } },
  };

  for (const override of overrides) {
    result = {
      ...result,
      app: { ...result.app, ...override.app },
      layer: { ...result.layer, ...override.layer },
      map: {
        basemap: { ...result.map.basemap, ...override.map?.basemap },
      },
    };
  }

  return result;
}

export interface LoadedAppConfig {
  /** The effective app configuration */
  config: AppConfig;
  /** Source URL of the override file, or null when running on defaults */
  source: string | null;
}

/**
 * Loads the app configuration. Without a ?config= parameter the defaults are used.
 */
export async function loadAppConfig(): Promise<LoadedAppConfig> {
  const configPath = getConfigUrlParam();
  if (!configPath) {
    console.log('[config] Using default config');
    return { config: mergeAppConfig(DEFAULT_APP_CONFIG), source: null };
  }

  const override = await fetchConfig(configPath);
  console.log(`[config] Loaded config overrides from "${configPath}"`);
  return {
    config: mergeAppConfig(DEFAULT_APP_CONFIG, override),
    source: configPath,
  };
}

/**
 * Clears the config cache (useful for testing or hot reload).
 */
export function clearConfigCache(): void {
  configCache.clear();
}
