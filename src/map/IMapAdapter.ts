import type { MapStateStore } from '../store/map-state-store';
import type { MapEventBus } from '../store/map-events';
import type { IMapSdk } from './IMapInterfaces';

/**
 * Everything the application needs from a mapping engine, composed in one object:
 * the resource constructors plus the shared state store and event bus.
 */
export interface IMapAdapter extends IMapSdk {
  readonly store: MapStateStore;

  /**
   * Event bus for normalized map events.
   *
   * @example
   * adapter.events.on('click', (e) => {
   *   console.log(`Clicked at ${e.pixel[0]}, ${e.pixel[1]}`);
   * });
   */
  readonly events: MapEventBus;
}
