// src/map/maplibre-services/MapViewService.ts

import * as maplibregl from 'maplibre-gl';
import 'maplibre-gl/dist/maplibre-gl.css';
import type {
    Extent,
    GeoElement,
    ICallout,
    IdentifyLayerResult,
    IFeatureLayer,
    ILayer,
    IMap,
    IMapView,
    MapPoint,
    ScreenPoint,
} from '../IMapInterfaces';
import type { MapStateStore } from '../../store/map-state-store';
import type { MapEventBus } from '../../store/map-events';
import type { MapClickEvent } from '../../store/map-events';
import { extentToLngLatBounds, lngLatToWebMercator } from '../../utils/geo-calculations';
import { MapPointerController } from './MapPointerController';
import { MapCalloutService } from './MapCalloutService';
import { MapLibreLayerFactory, SELECTED_STATE } from './MapLibreLayerFactory';
import type { FeatureLayerColors } from './MapLibreLayerFactory';

interface RenderedLayer {
    layer: IFeatureLayer;
    sourceId: string;
    nativeLayerIds: string[];
    detachSelection: () => void;
}

// Empty style shown until a map is set
const EMPTY_STYLE: maplibregl.StyleSpecification = {
    version: 8,
    sources: {},
    layers: [],
};

const INITIAL_CENTER: [number, number] = [0, 0];

/**
 * Implements the view contract (IMapView) for the MapLibre engine.
 * The view starts with an empty style; nothing is drawn until a map is set.
 */
export class MapViewService implements IMapView {
    public readonly callout: ICallout;

    private readonly mapInstance: maplibregl.Map;
    private readonly pointer: MapPointerController;
    private currentMap: IMap | null = null;
    private rendered = new Map<string, RenderedLayer>();
    private disposed = false;

    constructor(
        container: HTMLElement,
        private readonly store: MapStateStore,
        private readonly eventBus: MapEventBus,
        private readonly colors: FeatureLayerColors
    ) {
        console.log('[MAP VIEW] Initializing MapLibre instance');

        this.mapInstance = new maplibregl.Map({
            container,
            center: INITIAL_CENTER,
            zoom: 1,
            style: EMPTY_STYLE,
            attributionControl: { compact: true },
        });

        // Loading state detection
        this.mapInstance.on('dataloading', () => {
            this.store.dispatch({ mapBusy: true }, 'MAP');
        });

        this.mapInstance.on('idle', () => {
            this.store.dispatch({ mapBusy: false }, 'MAP');
        });

        this.pointer = new MapPointerController(this.eventBus);
        this.pointer.attach(this.mapInstance);
        this.callout = new MapCalloutService(this.mapInstance);
    }

    public get map(): IMap | null {
        return this.currentMap;
    }

    public setMap(map: IMap): void {
        this.clearRenderedLayers();
        this.currentMap = map;

        console.log(`[MAP VIEW] Setting map with basemap "${map.basemap.id}"`);
        this.mapInstance.once('style.load', () => {
            map.operationalLayers.forEach(layer => this.renderLayer(layer));
        });
        this.mapInstance.setStyle(map.basemap.styleUrl, { diff: false });

        this.store.dispatch({ mapAttached: true }, 'MAP');
    }

    public setViewpoint(extent: Extent): void {
        const bounds = extentToLngLatBounds(extent);
        this.mapInstance.fitBounds(bounds, { padding: 40, maxZoom: 16, animate: false });
    }

    public screenToLocation(point: ScreenPoint): MapPoint {
        const lngLat = this.mapInstance.unproject(point);
        return lngLatToWebMercator([lngLat.lng, lngLat.lat]);
    }

    public onClick(listener: (event: MapClickEvent) => void): () => void {
        return this.eventBus.on('click', listener);
    }

    public async identifyLayer(
        layer: ILayer,
        point: ScreenPoint,
        tolerance: number,
        returnPopupsOnly: boolean,
        maxResults: number
    ): Promise<IdentifyLayerResult> {
        const rendered = this.rendered.get(layer.id);
        if (!rendered || !this.nativeLayersPresent(rendered)) {
            throw new Error(`Layer "${layer.id}" is not displayed in this view`);
        }
        if (returnPopupsOnly && !layer.popupEnabled) {
            return { layer, elements: [] };
        }

        const [x, y] = point;
        const hits = this.mapInstance.queryRenderedFeatures(
            [[x - tolerance, y - tolerance], [x + tolerance, y + tolerance]],
            { layers: rendered.nativeLayerIds }
        );

        const elements: GeoElement[] = [];
        const seen = new Set<string | number>();
        for (const hit of hits) {
            if (elements.length >= maxResults) {
                break;
            }
            if (hit.id !== undefined) {
                if (seen.has(hit.id)) {
                    continue;
                }
                seen.add(hit.id);
            }

            const feature = hit.id !== undefined ? rendered.layer.getFeature(hit.id) : null;
            elements.push(feature ?? {
                kind: 'graphic',
                attributes: { ...hit.properties },
                geometry: hit.geometry,
            });
        }

        return { layer, elements };
    }

    public dispose(): void {
        if (this.disposed) {
            return;
        }
        this.disposed = true;

        console.log('[MAP VIEW] Releasing MapLibre resources');
        this.clearRenderedLayers();
        this.callout.dismiss();
        this.pointer.detach();
        this.mapInstance.remove();
    }

    private renderLayer(layer: IFeatureLayer): void {
        const sourceId = `src-${layer.id}`;
        this.mapInstance.addSource(sourceId, {
            type: 'geojson',
            data: layer.getFeatureCollection(),
        });

        const specs = MapLibreLayerFactory.createLayers(layer, sourceId, this.colors);
        specs.forEach(spec => this.mapInstance.addLayer(spec));

        const detachSelection = layer.onSelectionChanged((selected) => {
            this.mapInstance.removeFeatureState({ source: sourceId });
            selected.forEach(feature => {
                this.mapInstance.setFeatureState({ source: sourceId, id: feature.objectId }, { [SELECTED_STATE]: true });
            });
        });

        this.rendered.set(layer.id, {
            layer,
            sourceId,
            nativeLayerIds: specs.map(spec => spec.id),
            detachSelection,
        });
        console.log(`[MAP VIEW] Rendered layer "${layer.name ?? layer.id}" as ${specs.length} native layer(s)`);
    }

    private nativeLayersPresent(rendered: RenderedLayer): boolean {
        return rendered.nativeLayerIds.every(id => this.mapInstance.getLayer(id) !== undefined);
    }

    private clearRenderedLayers(): void {
        this.rendered.forEach(rendered => rendered.detachSelection());
        this.rendered.clear();
    }
}
