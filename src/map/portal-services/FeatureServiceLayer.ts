// src/map/portal-services/FeatureServiceLayer.ts

import { request } from '@esri/arcgis-rest-request';
import type { Feature as GeoJSONFeature, FeatureCollection } from 'geojson';
import type {
    Extent,
    Feature,
    GeometryType,
    IFeatureLayer,
    IPortalItem,
    SelectionListener,
} from '../IMapInterfaces';
import { Loadable } from '../Loadable';
import { extentOfFeatureCollection } from '../../utils/geo-calculations';

const GEOMETRY_TYPES: Record<string, GeometryType> = {
    esriGeometryPoint: 'point',
    esriGeometryMultipoint: 'multipoint',
    esriGeometryPolyline: 'polyline',
    esriGeometryPolygon: 'polygon',
};

/** Safety net for services that keep reporting exceededTransferLimit. */
const MAX_QUERY_PAGES = 50;

interface LayerInfo {
    name: string;
    geometryType: GeometryType;
    objectIdField: string;
}

/**
 * A feature layer of a hosted feature service.
 *
 * Loading fetches the layer description and every feature as WGS84 GeoJSON
 * through the ArcGIS REST JS request client; the full extent is the bounding box
 * of the loaded features. Selection is kept here and observed by the view.
 */
export class FeatureServiceLayer extends Loadable implements IFeatureLayer {
    public readonly id: string;
    public readonly popupEnabled = true;

    private info: LayerInfo | null = null;
    private collection: FeatureCollection = { type: 'FeatureCollection', features: [] };
    private featuresById = new Map<number | string, Feature>();
    private extent: Extent | null = null;
    private selection = new Map<number | string, Feature>();
    private selectionListeners = new Set<SelectionListener>();

    constructor(
        public readonly portalItem: IPortalItem,
        public readonly layerIndex: number
    ) {
        super();
        this.id = `${portalItem.itemId}-${layerIndex}`;
    }

    public get name(): string | null {
        return this.info?.name ?? null;
    }

    public get geometryType(): GeometryType | null {
        return this.info?.geometryType ?? null;
    }

    public get objectIdField(): string | null {
        return this.info?.objectIdField ?? null;
    }

    public get fullExtent(): Extent | null {
        return this.extent;
    }

    public get selectedFeatures(): readonly Feature[] {
        return [...this.selection.values()];
    }

    /** URL of this layer inside its feature service. */
    public get url(): string | null {
        const serviceUrl = this.portalItem.serviceUrl;
        return serviceUrl ? `${serviceUrl.replace(/\/+$/, '')}/${this.layerIndex}` : null;
    }

    public getFeatureCollection(): FeatureCollection {
        return this.collection;
    }

    public getFeature(objectId: number | string): Feature | null {
        return this.featuresById.get(objectId) ?? null;
    }

    public clearSelection(): void {
        if (this.selection.size === 0) {
            return;
        }
        this.selection.clear();
        this.notifySelectionChanged();
    }

    public selectFeatures(features: readonly Feature[]): void {
        let changed = false;
        features.forEach((feature) => {
            if (feature.layerId !== this.id || this.selection.has(feature.objectId)) {
                return;
            }
            this.selection.set(feature.objectId, feature);
            changed = true;
        });
        if (changed) {
            this.notifySelectionChanged();
        }
    }

    public onSelectionChanged(listener: SelectionListener): () => void {
        this.selectionListeners.add(listener);
        return () => {
            this.selectionListeners.delete(listener);
        };
    }

    protected async doLoad(): Promise<void> {
        await this.portalItem.load();

        const layerUrl = this.url;
        if (!layerUrl) {
            throw new Error(`Portal item ${this.portalItem.itemId} does not reference a service`);
        }

        console.log(`[FEATURE LAYER] Loading ${layerUrl}`);
        const info = parseLayerInfo(await request(layerUrl, { params: { f: 'json' } }), layerUrl);
        const features = await this.queryAllFeatures(layerUrl, info);

        this.info = info;
        this.collection = { type: 'FeatureCollection', features };
        this.featuresById = new Map(
            features.map((feature) => [objectIdOf(feature), this.toFeature(feature)])
        );
        this.extent = extentOfFeatureCollection(this.collection);
        console.log(`[FEATURE LAYER] Loaded "${info.name}" with ${features.length} features`);
    }

    private async queryAllFeatures(layerUrl: string, info: LayerInfo): Promise<GeoJSONFeature[]> {
        const features: GeoJSONFeature[] = [];
        let offset = 0;

        for (let page = 0; page < MAX_QUERY_PAGES; page++) {
            const response: unknown = await request(`${layerUrl}/query`, {
                params: {
                    where: '1=1',
                    outFields: '*',
                    returnGeometry: true,
                    resultOffset: offset,
                    f: 'geojson',
                },
            });
            if (!isFeatureCollection(response)) {
                throw new Error(`Unexpected query response from ${layerUrl}`);
            }
            offset += response.features.length;

            response.features.forEach((feature) => {
                const objectId = feature.id ?? readObjectId(feature, info.objectIdField);
                if (objectId === null) {
                    console.warn(`[FEATURE LAYER] Skipping feature without "${info.objectIdField}"`);
                    return;
                }
                features.push({ ...feature, id: objectId });
            });

            if (!exceededTransferLimit(response) || response.features.length === 0) {
                return features;
            }
        }

        console.warn(`[FEATURE LAYER] Stopped paging ${layerUrl} after ${MAX_QUERY_PAGES} pages`);
        return features;
    }

    private toFeature(feature: GeoJSONFeature): Feature {
        return {
            kind: 'feature',
            layerId: this.id,
            objectId: objectIdOf(feature),
            attributes: { ...(feature.properties ?? {}) },
            geometry: feature.geometry,
        };
    }

    private notifySelectionChanged(): void {
        const selected = this.selectedFeatures;
        this.selectionListeners.forEach((listener) => {
            try {
                listener(selected);
            } catch (error) {
                console.error('[FEATURE LAYER] Selection listener failed.', error);
            }
        });
    }
}

function parseLayerInfo(raw: unknown, url: string): LayerInfo {
    if (!isObject(raw)) {
        throw new Error(`Unexpected layer description from ${url}`);
    }

    const geometryType = typeof raw.geometryType === 'string' ? GEOMETRY_TYPES[raw.geometryType] : undefined;
    if (!geometryType) {
        throw new Error(`Layer ${url} is not a feature layer with geometry`);
    }

    return {
        name: typeof raw.name === 'string' ? raw.name : url,
        geometryType,
        objectIdField: findObjectIdField(raw) ?? 'OBJECTID',
    };
}

function findObjectIdField(raw: Record<string, unknown>): string | null {
    if (typeof raw.objectIdField === 'string') {
        return raw.objectIdField;
    }
    if (Array.isArray(raw.fields)) {
        const oidField: unknown = raw.fields.find(
            (field: unknown) => isObject(field) && field.type === 'esriFieldTypeOID'
        );
        if (isObject(oidField) && typeof oidField.name === 'string') {
            return oidField.name;
        }
    }
    return null;
}

function readObjectId(feature: GeoJSONFeature, field: string): number | string | null {
    const value = feature.properties?.[field];
    return typeof value === 'number' || typeof value === 'string' ? value : null;
}

function objectIdOf(feature: GeoJSONFeature): number | string {
    if (feature.id === undefined) {
        throw new Error('Feature is missing its object id');
    }
    return feature.id;
}

function exceededTransferLimit(collection: FeatureCollection): boolean {
    if (!isObject(collection)) {
        return false;
    }
    if (collection.exceededTransferLimit === true) {
        return true;
    }
    return isObject(collection.properties) && collection.properties.exceededTransferLimit === true;
}

function isFeatureCollection(value: unknown): value is FeatureCollection {
    return isObject(value) && value.type === 'FeatureCollection' && Array.isArray(value.features);
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
