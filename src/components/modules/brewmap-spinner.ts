import { html, css } from 'lit';
import { customElement, state } from 'lit/decorators.js';
import '@shoelace-style/shoelace/dist/components/spinner/spinner.js';

import { BrewmapBaseTool } from './brewmap-base-tool';
import type { IAppState } from '../../store/IState';

/**
 * A spinner overlay that shows while the portal item or the layer is loading,
 * or while the map is busy loading tiles or rendering.
 *
 * @example
 * ```html
 * <brewmap-map>
 *   <div slot="map-view"></div>
 *   <brewmap-spinner></brewmap-spinner>
 * </brewmap-map>
 * ```
 */
@customElement('brewmap-spinner')
export class BrewmapSpinner extends BrewmapBaseTool {
    @state() private busy = false;

    static styles = css`
        :host {
            position: absolute;
            top: 50%;
            left: 50%;
            transform: translate(-50%, -50%);
            pointer-events: none;
        }
        .spinner-container {
            z-index: 1000;
            opacity: 0;
            transition: opacity 0.2s ease-in-out;
        }
        .spinner-container.visible {
            opacity: 1;
        }
        sl-spinner {
            font-size: 2rem;
            --track-width: 3px;
            --indicator-color: var(--sl-color-primary-600);
            --track-color: var(--sl-color-neutral-200);
        }
    `;

    protected onStateChanged(state: IAppState): void {
        this.busy = isBusy(state);
    }

    render() {
        return html`
            <div class="spinner-container ${this.busy ? 'visible' : ''}">
                <sl-spinner></sl-spinner>
            </div>
        `;
    }
}

export function isBusy(state: IAppState): boolean {
    return state.mapBusy || state.portalItemStatus === 'loading' || state.layerStatus === 'loading';
}

declare global {
    interface HTMLElementTagNameMap {
        'brewmap-spinner': BrewmapSpinner;
    }
}
