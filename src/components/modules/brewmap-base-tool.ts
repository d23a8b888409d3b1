import { LitElement } from 'lit';
import type { MapStateStore } from '../../store/map-state-store';
import type { IAppState } from '../../store/IState';
import type { IMapAdapter } from '../../map/IMapAdapter';
import { resolveMapAdapter, resolveMapElement } from './map-context';

/**
 * Base class for overlay components placed inside `<brewmap-map>`.
 * Handles the connection to the map adapter and its state store.
 */
export abstract class BrewmapBaseTool extends LitElement {

    protected adapter: IMapAdapter | null = null;
    protected store: MapStateStore | null = null;
    private unsubscribe: (() => void) | null = null;
    private mapReadyHandler: (() => void) | null = null;

    connectedCallback(): void {
        super.connectedCallback();
        this.bindToMap();
    }

    disconnectedCallback(): void {
        this.releaseStore();
        super.disconnectedCallback();
    }

    protected bindToMap(): void {
        this.releaseStore();
        const adapter = resolveMapAdapter(this);
        if (!adapter) {
            this.subscribeToMapReady();
            return;
        }

        this.adapter = adapter;
        this.store = adapter.store;
        this.unsubscribe = this.store.subscribe(this.handleStateChange.bind(this));

        // Initial state sync
        this.onStateChanged(this.store.getState());
    }

    protected releaseStore(): void {
        this.unsubscribeFromMapReady();
        if (this.unsubscribe) {
            this.unsubscribe();
            this.unsubscribe = null;
        }
        this.store = null;
        this.adapter = null;
    }

    private subscribeToMapReady(): void {
        if (this.mapReadyHandler) return;

        const mapElement = resolveMapElement(this);
        if (!mapElement) return;

        this.mapReadyHandler = () => {
            this.unsubscribeFromMapReady();
            this.bindToMap();
        };

        mapElement.addEventListener('brewmap-map-ready', this.mapReadyHandler);
    }

    private unsubscribeFromMapReady(): void {
        if (!this.mapReadyHandler) return;
        resolveMapElement(this)?.removeEventListener('brewmap-map-ready', this.mapReadyHandler);
        this.mapReadyHandler = null;
    }

    private handleStateChange(state: IAppState): void {
        this.onStateChanged(state);
    }

    /**
     * Called when the store state changes.
     * Override this to update your component's reactive properties.
     */
    protected abstract onStateChanged(state: IAppState): void;
}
