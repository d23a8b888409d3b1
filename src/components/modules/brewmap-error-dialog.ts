import { LitElement, html, css } from 'lit';
import { customElement, state } from 'lit/decorators.js';
import '@shoelace-style/shoelace/dist/components/dialog/dialog.js';
import '@shoelace-style/shoelace/dist/components/button/button.js';
import type { SlRequestCloseEvent } from '@shoelace-style/shoelace';

import type { AlertPresenter } from '../../app/alerts';

/**
 * Modal error dialog. Messages arriving while one is open are shown in turn.
 * Clicking the overlay does not dismiss it; the OK button or Escape does.
 */
@customElement('brewmap-error-dialog')
export class BrewmapErrorDialog extends LitElement implements AlertPresenter {
    @state() private message = '';
    @state() private open = false;
    private pending: string[] = [];

    static styles = css`
        .message {
            margin: 0;
            white-space: pre-wrap;
        }
    `;

    public showError(message: string): void {
        if (this.open) {
            this.pending.push(message);
            return;
        }
        this.message = message;
        this.open = true;
    }

    private handleRequestClose = (event: SlRequestCloseEvent): void => {
        if (event.detail.source === 'overlay') {
            event.preventDefault();
            return;
        }
        this.open = false;
    };

    private handleAfterHide = (): void => {
        const next = this.pending.shift();
        if (next !== undefined) {
            this.showError(next);
        }
    };

    private close = (): void => {
        this.open = false;
    };

    render() {
        return html`
            <sl-dialog
                label="Error"
                ?open=${this.open}
                @sl-request-close=${this.handleRequestClose}
                @sl-after-hide=${this.handleAfterHide}
            >
                <p class="message">${this.message}</p>
                <sl-button slot="footer" variant="primary" @click=${this.close}>OK</sl-button>
            </sl-dialog>
        `;
    }
}

declare global {
    interface HTMLElementTagNameMap {
        'brewmap-error-dialog': BrewmapErrorDialog;
    }
}
