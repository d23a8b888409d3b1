// src/map/MapModel.ts

import type { BasemapConfig } from '../config/types';
import type { IFeatureLayer, IMap } from './IMapInterfaces';

/**
 * Library-agnostic map description: a basemap plus operational layers.
 * Views read it when the map is set on them.
 */
export class MapModel implements IMap {
    private layers: IFeatureLayer[] = [];

    constructor(public readonly basemap: BasemapConfig) {}

    public get operationalLayers(): readonly IFeatureLayer[] {
        return this.layers;
    }

    public addOperationalLayer(layer: IFeatureLayer): void {
        if (this.layers.some(existing => existing.id === layer.id)) {
            console.warn(`[MAP MODEL] Layer "${layer.id}" is already part of the map.`);
            return;
        }
        this.layers = [...this.layers, layer];
    }
}
