// src/app/portal-loader.ts

import type { PortalConfig } from '../config/types';
import type { IMapSdk, IPortalItem } from '../map/IMapInterfaces';
import { whenDoneLoading } from '../map/Loadable';
import type { MapStateStore } from '../store/map-state-store';
import type { AlertPresenter } from './alerts';

/** The step that takes over once the portal item is available. */
export interface LayerAttacher {
    attachLayer(item: IPortalItem): Promise<void>;
}

/**
 * Resolves the configured portal item and hands it to the layer attacher.
 * A failed load is terminal: one dialog, no retry, no map.
 * After `stop()` a pending load is still awaited but its result is dropped.
 */
export class PortalLoader {
    private item: IPortalItem | null = null;
    private stopped = false;

    constructor(
        private readonly sdk: IMapSdk,
        private readonly store: MapStateStore,
        private readonly alerts: AlertPresenter,
        private readonly attacher: LayerAttacher,
        private readonly portal: PortalConfig
    ) {}

    public get portalItem(): IPortalItem | null {
        return this.item;
    }

    public stop(): void {
        this.stopped = true;
    }

    public async start(): Promise<void> {
        if (this.stopped) {
            console.warn('[PORTAL LOADER] Stopped, not loading.');
            return;
        }
        if (this.item) {
            console.warn('[PORTAL LOADER] Already started, ignoring.');
            return;
        }

        const item = this.sdk.createPortalItem(this.portal.url, this.portal.itemId);
        this.item = item;

        console.log(`[PORTAL LOADER] Loading portal item ${item.itemId}`);
        this.store.dispatch({ portalItemStatus: 'loading' }, 'INIT');
        const status = await whenDoneLoading(item);
        this.store.dispatch({ portalItemStatus: status }, 'MAP');

        if (this.stopped) {
            console.warn(`[PORTAL LOADER] Portal item ${status} after stop, ignoring.`);
            return;
        }
        if (status === 'loaded') {
            await this.attacher.attachLayer(item);
            return;
        }

        const message = `Portal Item: ${item.loadError?.message ?? 'Unknown error'}`;
        console.error('[PORTAL LOADER] Portal item failed to load.', item.loadError);
        this.store.dispatch({ lastError: message }, 'MAP');
        this.alerts.showError(message);
    }
}
