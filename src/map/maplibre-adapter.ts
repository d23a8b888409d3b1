// src/map/maplibre-adapter.ts

import type { BasemapConfig } from '../config/types';
import type { IFeatureLayer, IMap, IMapView, IPortalItem } from './IMapInterfaces';
import { MapStateStore } from '../store/map-state-store';
import { MapEventBus } from '../store/map-events';
import type { IMapAdapter } from './IMapAdapter';
import { MapModel } from './MapModel';
import { PortalItem } from './portal-services/PortalItemService';
import { FeatureServiceLayer } from './portal-services/FeatureServiceLayer';
import { MapViewService } from './maplibre-services/MapViewService';
import type { FeatureLayerColors } from './maplibre-services/MapLibreLayerFactory';

/**
 * The concrete Map Adapter implementation (MapLibre view, ArcGIS REST data).
 * Composes services into a single interface for the controllers.
 */
export class MapLibreAdapter implements IMapAdapter {
    public readonly store: MapStateStore;
    public readonly events: MapEventBus;

    constructor() {
        this.store = new MapStateStore();
        this.events = new MapEventBus();
    }

    public createPortalItem(portalUrl: string, itemId: string): IPortalItem {
        return new PortalItem(portalUrl, itemId);
    }

    public createFeatureLayer(item: IPortalItem, layerIndex: number): IFeatureLayer {
        return new FeatureServiceLayer(item, layerIndex);
    }

    public createMap(basemap: BasemapConfig): IMap {
        return new MapModel(basemap);
    }

    public createMapView(container: HTMLElement, colors: FeatureLayerColors): IMapView {
        return new MapViewService(container, this.store, this.events, colors);
    }
}
