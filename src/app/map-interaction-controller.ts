// src/app/map-interaction-controller.ts

import type { BasemapConfig, CalloutConfig, IdentifyConfig, LayerConfig } from '../config/types';
import type {
    IFeatureLayer,
    IdentifyLayerResult,
    IMapSdk,
    IMapView,
    IPortalItem,
    ScreenPoint,
} from '../map/IMapInterfaces';
import { isFeature } from '../map/IMapInterfaces';
import { whenDoneLoading } from '../map/Loadable';
import type { MapClickEvent } from '../store/map-events';
import type { MapStateStore } from '../store/map-state-store';
import { formatLocation } from '../utils/format';
import type { AlertPresenter } from './alerts';
import type { LayerAttacher } from './portal-loader';

export interface MapInteractionOptions {
    layer: LayerConfig;
    basemap: BasemapConfig;
    identify: IdentifyConfig;
    callout: CalloutConfig;
}

/**
 * Owns the map view for the lifetime of the page.
 *
 * Attaches the feature layer once it has loaded, then turns every primary
 * still-click into a selection (through identify) and a location callout.
 */
export class MapInteractionController implements LayerAttacher {
    private view: IMapView | null = null;
    private layer: IFeatureLayer | null = null;
    private detachFns: Array<() => void> = [];
    private tornDown = false;

    constructor(
        private readonly sdk: IMapSdk,
        private readonly store: MapStateStore,
        private readonly alerts: AlertPresenter,
        private readonly options: MapInteractionOptions
    ) {}

    public get mapView(): IMapView | null {
        return this.view;
    }

    public get featureLayer(): IFeatureLayer | null {
        return this.layer;
    }

    /** Creates the view inside `container`. A second call returns the existing view. */
    public mountView(container: HTMLElement): IMapView {
        if (this.tornDown) {
            throw new Error('Map interaction controller has been torn down');
        }
        if (this.view) {
            console.warn('[MAP INTERACTION] View already mounted.');
            return this.view;
        }
        const { color, selectionColor } = this.options.layer;
        this.view = this.sdk.createMapView(container, { color, selectionColor });
        return this.view;
    }

    public async attachLayer(item: IPortalItem): Promise<void> {
        if (this.tornDown) {
            console.warn('[MAP INTERACTION] Torn down, not attaching a layer.');
            return;
        }
        if (this.layer) {
            console.warn(`[MAP INTERACTION] Layer "${this.layer.id}" already attached, ignoring.`);
            return;
        }
        const view = this.view;
        if (!view) {
            throw new Error('Cannot attach a layer before the map view is mounted');
        }

        const layer = this.sdk.createFeatureLayer(item, this.options.layer.index);
        this.layer = layer;

        this.store.dispatch({ layerStatus: 'loading' }, 'INIT');
        const status = await whenDoneLoading(layer);
        this.store.dispatch({ layerStatus: status }, 'MAP');

        if (this.tornDown) {
            console.warn('[MAP INTERACTION] Layer finished loading after teardown, not showing it.');
            return;
        }
        if (status !== 'loaded') {
            const message = `Feature Layer: ${layer.loadError?.message ?? 'Unknown error'}`;
            console.error('[MAP INTERACTION] Feature layer failed to load.', layer.loadError);
            this.store.dispatch({ lastError: message }, 'MAP');
            this.alerts.showError(message);
            return;
        }

        const map = this.sdk.createMap(this.options.basemap);
        map.addOperationalLayer(layer);
        view.setMap(map);

        if (layer.fullExtent) {
            view.setViewpoint(layer.fullExtent);
        } else {
            console.warn(`[MAP INTERACTION] Layer "${layer.id}" has no extent, keeping the current viewpoint.`);
        }

        this.detachFns.push(
            layer.onSelectionChanged((selected) => {
                this.store.dispatch({ selectedFeatureCount: selected.length }, 'MAP');
            }),
            view.onClick((event) => {
                this.handleClick(event).catch((error: unknown) => {
                    console.error('[MAP INTERACTION] Click handling failed.', error);
                });
            })
        );
        console.log(`[MAP INTERACTION] Layer "${layer.name ?? layer.id}" attached, click handler armed.`);
    }

    /**
     * Reacts to a click. Only primary still-clicks have an effect.
     * Resolves when the selection for this click has been applied.
     */
    public handleClick(event: MapClickEvent): Promise<void> {
        const view = this.view;
        const layer = this.layer;
        if (event.button !== 'primary' || !event.stillSincePress || !view || !layer || this.tornDown) {
            return Promise.resolve();
        }

        const point: ScreenPoint = [event.pixel[0], event.pixel[1]];
        const selection = this.selectFeaturesAt(view, layer, point);
        this.showLocationCallout(view, point);
        return selection;
    }

    /** Unsubscribes and releases the view. Runs once; a no-op without a view. */
    public teardown(): void {
        if (this.tornDown) {
            return;
        }
        this.tornDown = true;

        this.detachFns.forEach(fn => fn());
        this.detachFns = [];

        if (!this.view) {
            return;
        }
        console.log('[MAP INTERACTION] Releasing map view');
        this.view.dispose();
        this.store.dispatch({ mapAttached: false, calloutLocation: null }, 'UI');
    }

    private async selectFeaturesAt(view: IMapView, layer: IFeatureLayer, point: ScreenPoint): Promise<void> {
        layer.clearSelection();

        const { tolerance, returnPopupsOnly, maxResults } = this.options.identify;
        let result: IdentifyLayerResult;
        try {
            result = await view.identifyLayer(layer, point, tolerance, returnPopupsOnly, maxResults);
        } catch (error) {
            console.error('[MAP INTERACTION] Identify failed.', error);
            return;
        }

        // Overlapping identifies are not ordered; whichever completes last sets the selection.
        layer.clearSelection();
        layer.selectFeatures(result.elements.filter(isFeature));
    }

    private showLocationCallout(view: IMapView, point: ScreenPoint): void {
        const callout = view.callout;
        if (callout.visible) {
            callout.dismiss();
        }

        const location = view.screenToLocation(point);
        callout.show(
            { title: this.options.callout.title, detail: formatLocation(location) },
            location,
            this.options.callout.animationMs
        );
        this.store.dispatch({ calloutLocation: location }, 'UI');
    }
}
