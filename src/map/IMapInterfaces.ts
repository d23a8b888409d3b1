// src/map/IMapInterfaces.ts

import type { FeatureCollection, Geometry } from 'geojson';
import type { BasemapConfig, LayerConfig } from '../config/types';
import type { MapClickEvent } from '../store/map-events';

/**
 * Lifecycle of anything that loads asynchronously (portal items, layers).
 * `not-loaded` moves to `loading` once, then to exactly one terminal state.
 */
export type LoadStatus = 'not-loaded' | 'loading' | 'loaded' | 'failed';

/** Screen position in pixels relative to the map canvas: [x, y]. */
export type ScreenPoint = [number, number];

export interface SpatialReference {
    wkid: number;
}

/** Well-known spatial references used by the application. */
export const WGS84: SpatialReference = { wkid: 4326 };
export const WEB_MERCATOR: SpatialReference = { wkid: 3857 };

/**
 * A location in a map's spatial reference.
 */
export interface MapPoint {
    x: number;
    y: number;
    spatialReference: SpatialReference;
}

/**
 * Axis-aligned bounding region.
 */
export interface Extent {
    xmin: number;
    ymin: number;
    xmax: number;
    ymax: number;
    spatialReference: SpatialReference;
}

/**
 * Anything that loads once and reports its status afterwards.
 */
export interface ILoadable {
    readonly loadStatus: LoadStatus;

    /** The failure, once `loadStatus` is `failed`. */
    readonly loadError: Error | null;

    /**
     * Starts loading if not started yet. Every call returns the same promise,
     * which rejects with `loadError` on failure. There is no retry.
     */
    load(): Promise<void>;
}

/**
 * A portal item resolved through the hosted-content service.
 */
export interface IPortalItem extends ILoadable {
    readonly portalUrl: string;
    readonly itemId: string;

    /** Item title, available once loaded. */
    readonly title: string | null;

    /** URL of the service the item references, available once loaded. */
    readonly serviceUrl: string | null;
}

/**
 * A feature belonging to a feature layer.
 */
export interface Feature {
    readonly kind: 'feature';
    readonly layerId: string;
    readonly objectId: number | string;
    readonly attributes: Readonly<Record<string, unknown>>;
    readonly geometry: Geometry | null;
}

/**
 * A graphic drawn on the view that is not backed by a layer.
 */
export interface Graphic {
    readonly kind: 'graphic';
    readonly attributes: Readonly<Record<string, unknown>>;
    readonly geometry: Geometry | null;
}

/** Generic element returned by a hit-test. */
export type GeoElement = Feature | Graphic;

export function isFeature(element: GeoElement): element is Feature {
    return element.kind === 'feature';
}

export type GeometryType = 'point' | 'multipoint' | 'polyline' | 'polygon';

export type SelectionListener = (selected: readonly Feature[]) => void;

/**
 * A feature layer built from a portal item and a sub-layer index.
 */
export interface ILayer extends ILoadable {
    /** Unique id, stable for the lifetime of the layer. */
    readonly id: string;

    /** Layer name, available once loaded. */
    readonly name: string | null;

    /** Full extent of the layer's features, available once loaded. */
    readonly fullExtent: Extent | null;

    /** Whether identify results may carry popups for this layer. */
    readonly popupEnabled: boolean;
}

export interface IFeatureLayer extends ILayer {
    readonly portalItem: IPortalItem;
    readonly layerIndex: number;
    readonly geometryType: GeometryType | null;
    readonly objectIdField: string | null;

    /** Currently selected features. */
    readonly selectedFeatures: readonly Feature[];

    /** Features as WGS84 GeoJSON, empty until loaded. */
    getFeatureCollection(): FeatureCollection;

    /** Looks up a loaded feature by object id. */
    getFeature(objectId: number | string): Feature | null;

    /** Deselects every feature. No-op when nothing is selected. */
    clearSelection(): void;

    /** Adds the given features to the selection. */
    selectFeatures(features: readonly Feature[]): void;

    /** Subscribes to selection changes. Returns an unsubscribe function. */
    onSelectionChanged(listener: SelectionListener): () => void;
}

/**
 * A map: one basemap plus operational layers drawn above it.
 */
export interface IMap {
    readonly basemap: BasemapConfig;
    readonly operationalLayers: readonly IFeatureLayer[];

    addOperationalLayer(layer: IFeatureLayer): void;
}

export interface CalloutContent {
    title: string;
    detail: string;
}

/**
 * The popup anchored to a map location. At most one is visible per view.
 */
export interface ICallout {
    readonly visible: boolean;
    readonly content: CalloutContent | null;
    readonly anchor: MapPoint | null;

    /** Shows the callout at `anchor`. Dismiss first when it is already visible. */
    show(content: CalloutContent, anchor: MapPoint, animationMs: number): void;

    /** Hides the callout. No-op when it is not visible. */
    dismiss(): void;
}

export interface IdentifyLayerResult {
    readonly layer: ILayer;
    readonly elements: readonly GeoElement[];
}

/**
 * The view widget that displays a map and reports user input.
 */
export interface IMapView {
    readonly map: IMap | null;
    readonly callout: ICallout;

    /** Displays `map`. */
    setMap(map: IMap): void;

    /** Sets the displayed region. */
    setViewpoint(extent: Extent): void;

    /** Converts a screen point to a location in the map's spatial reference (Web Mercator). */
    screenToLocation(point: ScreenPoint): MapPoint;

    /** Subscribes to click events. Returns an unsubscribe function. */
    onClick(listener: (event: MapClickEvent) => void): () => void;

    /**
     * Hit-tests `layer` around `point`.
     * @param tolerance search radius in screen pixels
     * @param returnPopupsOnly restrict to popup-enabled layers
     * @param maxResults maximum number of elements returned
     */
    identifyLayer(
        layer: ILayer,
        point: ScreenPoint,
        tolerance: number,
        returnPopupsOnly: boolean,
        maxResults: number
    ): Promise<IdentifyLayerResult>;

    /** Releases rendering and network resources. Safe to call more than once. */
    dispose(): void;
}

/**
 * Constructors for the loadable resources the application needs.
 */
export interface IMapSdk {
    createPortalItem(portalUrl: string, itemId: string): IPortalItem;

    createFeatureLayer(item: IPortalItem, layerIndex: number): IFeatureLayer;

    createMap(basemap: BasemapConfig): IMap;

    /** Creates the view widget inside `container`, drawing features in the given colors. */
    createMapView(container: HTMLElement, colors: Pick<LayerConfig, 'color' | 'selectionColor'>): IMapView;
}
