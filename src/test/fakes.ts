// In-process stand-ins for the map SDK contract. No network, no WebGL.

import type { FeatureCollection } from 'geojson';
import type { BasemapConfig, LayerConfig } from '../config/types';
import type {
    CalloutContent,
    Extent,
    Feature,
    GeometryType,
    GeoElement,
    ICallout,
    IdentifyLayerResult,
    IFeatureLayer,
    ILayer,
    IMap,
    IMapSdk,
    IMapView,
    IPortalItem,
    MapPoint,
    ScreenPoint,
    SelectionListener,
} from '../map/IMapInterfaces';
import { WEB_MERCATOR } from '../map/IMapInterfaces';
import { Loadable } from '../map/Loadable';
import { MapModel } from '../map/MapModel';
import type { MapClickEvent } from '../store/map-events';
import type { AlertPresenter } from '../app/alerts';

export interface Deferred<T> {
    promise: Promise<T>;
    resolve(value: T): void;
    reject(reason: unknown): void;
}

export function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => undefined;
    let reject: (reason: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

/** Lets pending promise continuations run. */
export function flushPromises(): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, 0));
}

export type LoadOutcome = () => Promise<void>;

export const succeed: LoadOutcome = () => Promise.resolve();

export function failWith(message: string): LoadOutcome {
    return () => Promise.reject(new Error(message));
}

export class FakePortalItem extends Loadable implements IPortalItem {
    public loadCalls = 0;
    public readonly title = 'Test Breweries';
    public serviceUrl: string | null = 'https://services.test/FeatureServer';

    constructor(
        public readonly portalUrl: string,
        public readonly itemId: string,
        private readonly outcome: LoadOutcome
    ) {
        super();
    }

    protected doLoad(): Promise<void> {
        this.loadCalls++;
        return this.outcome();
    }
}

export const TEST_EXTENT: Extent = {
    xmin: -13705000,
    ymin: 6313000,
    xmax: -13698000,
    ymax: 6320000,
    spatialReference: WEB_MERCATOR,
};

export function makeFeature(layerId: string, objectId: number): Feature {
    return {
        kind: 'feature',
        layerId,
        objectId,
        attributes: { name: `Brewery ${objectId}` },
        geometry: { type: 'Point', coordinates: [-123.07, 49.27] },
    };
}

export class FakeFeatureLayer extends Loadable implements IFeatureLayer {
    public readonly id: string;
    public readonly popupEnabled = true;
    public geometryType: GeometryType | null = 'point';
    public readonly objectIdField = 'OBJECTID';
    public clearSelectionCalls = 0;
    public fullExtentAfterLoad: Extent | null = TEST_EXTENT;
    public readonly featuresById = new Map<number | string, Feature>();

    private selection: Feature[] = [];
    private listeners = new Set<SelectionListener>();

    constructor(
        public readonly portalItem: IPortalItem,
        public readonly layerIndex: number,
        private readonly outcome: LoadOutcome
    ) {
        super();
        this.id = `${portalItem.itemId}-${layerIndex}`;
    }

    public get name(): string | null {
        return this.loadStatus === 'loaded' ? 'Breweries' : null;
    }

    public get fullExtent(): Extent | null {
        return this.loadStatus === 'loaded' ? this.fullExtentAfterLoad : null;
    }

    public get selectedFeatures(): readonly Feature[] {
        return [...this.selection];
    }

    public getFeatureCollection(): FeatureCollection {
        return { type: 'FeatureCollection', features: [] };
    }

    public getFeature(objectId: number | string): Feature | null {
        return this.featuresById.get(objectId) ?? null;
    }

    public clearSelection(): void {
        this.clearSelectionCalls++;
        if (this.selection.length === 0) {
            return;
        }
        this.selection = [];
        this.notify();
    }

    public selectFeatures(features: readonly Feature[]): void {
        const fresh = features.filter(f => !this.selection.some(s => s.objectId === f.objectId));
        if (fresh.length === 0) {
            return;
        }
        this.selection = [...this.selection, ...fresh];
        this.notify();
    }

    public onSelectionChanged(listener: SelectionListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    protected doLoad(): Promise<void> {
        return this.outcome();
    }

    private notify(): void {
        this.listeners.forEach(listener => listener(this.selectedFeatures));
    }
}

export class FakeCallout implements ICallout {
    public content: CalloutContent | null = null;
    public anchor: MapPoint | null = null;
    public showCalls: Array<{ content: CalloutContent; anchor: MapPoint; animationMs: number }> = [];
    public dismissCalls = 0;

    public get visible(): boolean {
        return this.content !== null;
    }

    public show(content: CalloutContent, anchor: MapPoint, animationMs: number): void {
        this.showCalls.push({ content, anchor, animationMs });
        this.content = content;
        this.anchor = anchor;
    }

    public dismiss(): void {
        this.dismissCalls++;
        this.content = null;
        this.anchor = null;
    }
}

export interface IdentifyCall {
    layer: ILayer;
    point: ScreenPoint;
    tolerance: number;
    returnPopupsOnly: boolean;
    maxResults: number;
    result: Deferred<IdentifyLayerResult>;
}

export class FakeMapView implements IMapView {
    public readonly callout = new FakeCallout();
    public map: IMap | null = null;
    public setMapCalls = 0;
    public viewpoints: Extent[] = [];
    public identifyCalls: IdentifyCall[] = [];
    public disposeCalls = 0;

    private clickListeners = new Set<(event: MapClickEvent) => void>();

    constructor(public readonly colors: Pick<LayerConfig, 'color' | 'selectionColor'>) {}

    public get clickListenerCount(): number {
        return this.clickListeners.size;
    }

    public setMap(map: IMap): void {
        this.setMapCalls++;
        this.map = map;
    }

    public setViewpoint(extent: Extent): void {
        this.viewpoints.push(extent);
    }

    /** Screen to map conversion; pixels map one to one onto metres unless replaced. */
    public locate: (point: ScreenPoint) => MapPoint = ([x, y]) => ({ x, y: -y, spatialReference: WEB_MERCATOR });

    public screenToLocation(point: ScreenPoint): MapPoint {
        return this.locate(point);
    }

    public onClick(listener: (event: MapClickEvent) => void): () => void {
        this.clickListeners.add(listener);
        return () => {
            this.clickListeners.delete(listener);
        };
    }

    public identifyLayer(
        layer: ILayer,
        point: ScreenPoint,
        tolerance: number,
        returnPopupsOnly: boolean,
        maxResults: number
    ): Promise<IdentifyLayerResult> {
        const result = deferred<IdentifyLayerResult>();
        this.identifyCalls.push({ layer, point, tolerance, returnPopupsOnly, maxResults, result });
        return result.promise;
    }

    public dispose(): void {
        this.disposeCalls++;
    }

    /** Emits a click to every armed listener. */
    public click(pixel: ScreenPoint, overrides: Partial<MapClickEvent> = {}): void {
        const event: MapClickEvent = {
            coords: [-123.07, 49.27],
            pixel,
            button: 'primary',
            stillSincePress: true,
            ...overrides,
        };
        this.clickListeners.forEach(listener => listener(event));
    }

    /** Completes the identify started by the `index`-th click. */
    public completeIdentify(index: number, elements: GeoElement[]): void {
        const call = this.identifyCalls[index];
        if (!call) {
            throw new Error(`No identify call #${index}`);
        }
        call.result.resolve({ layer: call.layer, elements });
    }

    public failIdentify(index: number, error: Error): void {
        const call = this.identifyCalls[index];
        if (!call) {
            throw new Error(`No identify call #${index}`);
        }
        call.result.reject(error);
    }
}

export class FakeSdk implements IMapSdk {
    public portalItemOutcome: LoadOutcome = succeed;
    public layerOutcome: LoadOutcome = succeed;
    public portalItems: FakePortalItem[] = [];
    public layers: FakeFeatureLayer[] = [];
    public maps: MapModel[] = [];
    public views: FakeMapView[] = [];

    public createPortalItem(portalUrl: string, itemId: string): FakePortalItem {
        const item = new FakePortalItem(portalUrl, itemId, this.portalItemOutcome);
        this.portalItems.push(item);
        return item;
    }

    public createFeatureLayer(item: IPortalItem, layerIndex: number): FakeFeatureLayer {
        const layer = new FakeFeatureLayer(item, layerIndex, this.layerOutcome);
        this.layers.push(layer);
        return layer;
    }

    public createMap(basemap: BasemapConfig): MapModel {
        const map = new MapModel(basemap);
        this.maps.push(map);
        return map;
    }

    public createMapView(_container: HTMLElement, colors: Pick<LayerConfig, 'color' | 'selectionColor'>): FakeMapView {
        const view = new FakeMapView(colors);
        this.views.push(view);
        return view;
    }
}

export class FakeAlerts implements AlertPresenter {
    public messages: string[] = [];

    public showError(message: string): void {
        this.messages.push(message);
    }
}
