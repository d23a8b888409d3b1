import type { IMapAdapter } from '../../map/IMapAdapter';
import { createMapAdapter, DEFAULT_ADAPTER_NAME } from '../../map/adapter-registry';

const MAP_VIEW_SLOT = 'map-view';
const MAP_SURFACE_CLASS = 'brewmap-map__surface';
const MAP_ADAPTER_ATTRIBUTE = 'adapter';

/** Event detail for brewmap-map-ready */
export interface MapReadyEventDetail {
  adapter: IMapAdapter;
  map: BrewmapMapElement;
}

/**
 * Lightweight map wrapper that keeps the map canvas and overlay components grouped
 * without using Shadow DOM. Consumers provide one child with slot="map-view"
 * for the mapping library plus any number of default children for overlays.
 *
 * The adapter engine is loaded lazily; listen for `brewmap-map-ready` or
 * await `getAdapterAsync()`.
 */
export class BrewmapMapElement extends HTMLElement {
  private surfaceObserver?: MutationObserver;
  private currentSurface: HTMLElement | null = null;
  private adapterInstance: IMapAdapter | null = null;
  private adapterPromise: Promise<IMapAdapter | null> | null = null;

  connectedCallback(): void {
    this.upsertAndStyleSurface();
    this.observeSurfaceChanges();
    this.getAdapterAsync().catch((error: unknown) => {
      console.error('[brewmap-map] Adapter initialization failed.', error);
    });
  }

  disconnectedCallback(): void {
    this.surfaceObserver?.disconnect();
    this.surfaceObserver = undefined;
  }

  /** Returns the adapter owned by this map instance, once it has been created. */
  public get adapter(): IMapAdapter | null {
    return this.adapterInstance;
  }

  /** Returns the element that should host the mapping library instance. */
  public get mapElement(): HTMLElement | null {
    return this.querySelector<HTMLElement>(`[slot="${MAP_VIEW_SLOT}"]`);
  }

  /** Resolves with the adapter, creating it on first use. */
  public getAdapterAsync(): Promise<IMapAdapter | null> {
    if (!this.adapterPromise) {
      const requestedAdapter = this.getAttribute(MAP_ADAPTER_ATTRIBUTE) ?? DEFAULT_ADAPTER_NAME;
      this.adapterPromise = createMapAdapter(requestedAdapter).then((adapter) => {
        if (!adapter) {
          console.error(`[brewmap-map] No adapter available for "${requestedAdapter}".`);
          return null;
        }
        this.adapterInstance = adapter;
        this.dispatchEvent(new CustomEvent<MapReadyEventDetail>('brewmap-map-ready', {
          detail: { adapter, map: this },
          bubbles: true,
          composed: true,
        }));
        return adapter;
      });
    }
    return this.adapterPromise;
  }

  private upsertAndStyleSurface(): void {
    const surface = this.ensureMapViewElement();
    this.decorateMapSurface(surface);
    this.currentSurface = surface;
  }

  private ensureMapViewElement(): HTMLElement {
    const existing = this.mapElement;
    if (existing) {
      return existing;
    }

    const fallback = document.createElement('div');
    fallback.setAttribute('slot', MAP_VIEW_SLOT);
    fallback.classList.add('brewmap-map__auto-view');
    this.prepend(fallback);
    return fallback;
  }

  private decorateMapSurface(target: HTMLElement): void {
    target.classList.add(MAP_SURFACE_CLASS);
    const defaults: Record<string, string> = {
      position: 'absolute',
      top: '0',
      right: '0',
      bottom: '0',
      left: '0',
    };
    Object.entries(defaults).forEach(([property, value]) => {
      if (!target.style.getPropertyValue(property)) {
        target.style.setProperty(property, value);
      }
    });
    if (!target.style.background) {
      target.style.setProperty('background', 'var(--sl-color-neutral-100, #f4f4f4)');
    }
  }

  private observeSurfaceChanges(): void {
    if (this.surfaceObserver) {
      return;
    }

    this.surfaceObserver = new MutationObserver(() => {
      const surface = this.mapElement;

      if (!surface) {
        this.upsertAndStyleSurface();
        return;
      }

      if (surface !== this.currentSurface) {
        this.decorateMapSurface(surface);
        this.currentSurface = surface;
      }
    });

    this.surfaceObserver.observe(this, { childList: true });
  }
}

if (!customElements.get('brewmap-map')) {
  customElements.define('brewmap-map', BrewmapMapElement);
}

declare global {
  interface HTMLElementTagNameMap {
    'brewmap-map': BrewmapMapElement;
  }
}
