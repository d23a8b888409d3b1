// src/config/types.ts
// TypeScript types for brewmap configuration files

/**
 * Application shell settings (page title and map area size in pixels).
 */
export interface AppShellConfig {
  title: string;
  width: number;
  height: number;
}

/**
 * Hosted-content reference: the portal base URL and the item to resolve.
 */
export interface PortalConfig {
  /** Portal base URL, e.g. https://www.arcgis.com */
  url: string;
  /** Opaque item identifier */
  itemId: string;
}

/**
 * Feature layer settings.
 */
export interface LayerConfig {
  /** Sub-layer index inside the feature service */
  index: number;
  /** Fill color for unselected features */
  color: string;
  /** Fill color for selected features */
  selectionColor: string;
}

/**
 * Basemap reference. `styleUrl` must point to a MapLibre style document.
 */
export interface BasemapConfig {
  id: string;
  styleUrl: string;
}

export interface MapConfig {
  basemap: BasemapConfig;
}

/**
 * Hit-test parameters used on every qualifying click.
 */
export interface IdentifyConfig {
  /** Search radius around the click in screen pixels */
  tolerance: number;
  /** Maximum number of elements returned */
  maxResults: number;
  /** Restrict results to popup-enabled layers */
  returnPopupsOnly: boolean;
}

export interface CalloutConfig {
  title: string;
  /** Show animation duration in milliseconds */
  animationMs: number;
}

/**
 * Root configuration object.
 */
export interface AppConfig {
  app: AppShellConfig;
  portal: PortalConfig;
  layer: LayerConfig;
  map: MapConfig;
  identify: IdentifyConfig;
  callout: CalloutConfig;
}

/**
 * Shape accepted from a JSON config file. Only presentation settings can be
 * overridden; the portal item, layer index, identify parameters and callout
 * are fixed to the defaults.
 */
export interface PartialAppConfig {
  app?: Partial<Pick<AppShellConfig, 'width' | 'height'>>;
  layer?: Partial<Pick<LayerConfig, 'color' | 'selectionColor'>>;
  map?: { basemap?: Partial<BasemapConfig> };
}
