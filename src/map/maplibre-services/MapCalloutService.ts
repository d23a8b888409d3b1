// src/map/maplibre-services/MapCalloutService.ts

import * as maplibregl from 'maplibre-gl';
import type { CalloutContent, ICallout, MapPoint } from '../IMapInterfaces';
import { mapPointToLngLat } from '../../utils/geo-calculations';

const CALLOUT_CLASS = 'brewmap-callout';

/**
 * ICallout backed by a single MapLibre Popup.
 * Content is written as text nodes, never as HTML.
 */
export class MapCalloutService implements ICallout {
    private readonly popup: maplibregl.Popup;
    private currentContent: CalloutContent | null = null;
    private currentAnchor: MapPoint | null = null;

    constructor(private readonly map: maplibregl.Map) {
        this.popup = new maplibregl.Popup({
            closeButton: false,
            closeOnClick: false,
            closeOnMove: false,
            className: CALLOUT_CLASS,
            maxWidth: '260px',
        });
    }

    public get visible(): boolean {
        return this.popup.isOpen();
    }

    public get content(): CalloutContent | null {
        return this.visible ? this.currentContent : null;
    }

    public get anchor(): MapPoint | null {
        return this.visible ? this.currentAnchor : null;
    }

    public show(content: CalloutContent, anchor: MapPoint, animationMs: number): void {
        if (this.visible) {
            this.dismiss();
        }

        this.currentContent = content;
        this.currentAnchor = anchor;

        this.popup
            .setLngLat(mapPointToLngLat(anchor))
            .setDOMContent(this.renderContent(content))
            .addTo(this.map);

        this.animateIn(animationMs);
    }

    public dismiss(): void {
        if (!this.visible) {
            return;
        }
        this.popup.remove();
        this.currentContent = null;
        this.currentAnchor = null;
    }

    private renderContent(content: CalloutContent): HTMLElement {
        const container = document.createElement('div');
        container.className = `${CALLOUT_CLASS}__content`;

        const title = document.createElement('div');
        title.className = `${CALLOUT_CLASS}__title`;
        title.style.fontWeight = '700';
        title.textContent = content.title;

        const detail = document.createElement('div');
        detail.className = `${CALLOUT_CLASS}__detail`;
        detail.style.fontVariantNumeric = 'tabular-nums';
        detail.textContent = content.detail;

        container.append(title, detail);
        return container;
    }

    private animateIn(animationMs: number): void {
        const element = this.popup.getElement();
        if (!element || animationMs <= 0) {
            return;
        }
        element.animate([{ opacity: 0 }, { opacity: 1 }], { duration: animationMs, easing: 'ease-out' });
    }
}
