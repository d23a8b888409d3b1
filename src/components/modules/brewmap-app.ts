import { LitElement, html, nothing } from 'lit';
import { customElement, property, query } from 'lit/decorators.js';
import { styleMap } from 'lit/directives/style-map.js';

import './brewmap-map';
import './brewmap-spinner';
import './brewmap-error-dialog';
import type { BrewmapMapElement } from './brewmap-map';
import type { BrewmapErrorDialog } from './brewmap-error-dialog';
import type { AppConfig } from '../../config/types';
import { MapInteractionController } from '../../app/map-interaction-controller';
import { PortalLoader } from '../../app/portal-loader';

/**
 * Application shell: the titled map area plus the error dialog.
 * Starts the portal loader once a configuration is set and tears the
 * controller down when removed from the document.
 */
@customElement('brewmap-app')
export class BrewmapApp extends LitElement {
    @property({ attribute: false }) config: AppConfig | null = null;

    @query('brewmap-map') private mapHost!: BrewmapMapElement;
    @query('brewmap-error-dialog') private dialog!: BrewmapErrorDialog;

    private controller: MapInteractionController | null = null;
    private loader: PortalLoader | null = null;
    private started = false;

    // Light DOM so the map library and overlays share the document styles.
    protected createRenderRoot(): HTMLElement {
        return this;
    }

    disconnectedCallback(): void {
        super.disconnectedCallback();
        this.loader?.stop();
        this.loader = null;
        this.controller?.teardown();
        this.controller = null;
    }

    protected updated(): void {
        const config = this.config;
        if (!config || this.started) {
            return;
        }
        this.started = true;
        this.start(config).catch((error: unknown) => {
            console.error('[brewmap-app] Startup failed.', error);
        });
    }

    private async start(config: AppConfig): Promise<void> {
        document.title = config.app.title;

        const adapter = await this.mapHost.getAdapterAsync();
        const surface = this.mapHost.mapElement;
        if (!adapter || !surface) {
            this.dialog.showError('Map: no map engine available');
            return;
        }
        if (!this.isConnected) {
            return;
        }

        const controller = new MapInteractionController(adapter, adapter.store, this.dialog, {
            layer: config.layer,
            basemap: config.map.basemap,
            identify: config.identify,
            callout: config.callout,
        });
        this.controller = controller;
        controller.mountView(surface);

        const loader = new PortalLoader(adapter, adapter.store, this.dialog, controller, config.portal);
        this.loader = loader;
        await loader.start();
    }

    render() {
        const app = this.config?.app;
        if (!app) {
            return nothing;
        }
        const size = {
            position: 'relative',
            display: 'block',
            width: `${app.width}px`,
            height: `${app.height}px`,
        };
        return html`
            <brewmap-map style=${styleMap(size)}>
                <div slot="map-view"></div>
                <brewmap-spinner></brewmap-spinner>
            </brewmap-map>
            <brewmap-error-dialog></brewmap-error-dialog>
        `;
    }
}

declare global {
    interface HTMLElementTagNameMap {
        'brewmap-app': BrewmapApp;
    }
}
