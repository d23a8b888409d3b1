// src/store/map-events.ts
// Normalized map events that are library-agnostic.
// Controllers subscribe to these events without knowing which map library is underneath.

export type LngLat = [number, number];  // [longitude, latitude]
export type Pixel = [number, number];   // [x, y] screen coordinates

/**
 * Mouse button that produced a click.
 */
export type PointerButton = 'primary' | 'middle' | 'secondary' | 'other';

/**
 * Base interface for all map events.
 */
interface BaseMapEvent {
    /** Original event from the map library (for advanced use cases) */
    originalEvent?: unknown;
}

/**
 * Click event - emitted when a pointer button is released over the map.
 * Emitted for every button, and for releases that ended a pan.
 */
export interface MapClickEvent extends BaseMapEvent {
    coords: LngLat;
    pixel: Pixel;
    button: PointerButton;
    /** True when the pointer did not move (pan/drag) between press and release */
    stillSincePress: boolean;
}

/**
 * Map of event types to their corresponding event interfaces.
 */
export interface MapEventMap {
    'click': MapClickEvent;
}

export type MapEventType = keyof MapEventMap;

/**
 * Event listener callback type.
 */
export type MapEventListener<T extends MapEventType> = (event: MapEventMap[T]) => void;

type ListenerRegistry = {
    [K in MapEventType]?: Set<MapEventListener<K>>;
};

/**
 * MapEventBus - A typed event emitter for normalized map events.
 *
 * @example
 * const unsubscribe = eventBus.on('click', (e) => {
 *     console.log(`Clicked at ${e.pixel[0]}, ${e.pixel[1]}`);
 * });
 *
 * // In an adapter:
 * eventBus.emit('click', { coords: [lng, lat], pixel: [x, y], button: 'primary', stillSincePress: true });
 */
export class MapEventBus {
    private readonly listeners: ListenerRegistry = {};

    /**
     * Subscribe to a specific event type.
     * @returns Unsubscribe function
     */
    on<T extends MapEventType>(eventType: T, listener: MapEventListener<T>): () => void {
        const registered: Set<MapEventListener<T>> = this.listeners[eventType] ?? new Set<MapEventListener<T>>();
        registered.add(listener);
        this.listeners[eventType] = registered;

        return () => {
            this.off(eventType, listener);
        };
    }

    /**
     * Unsubscribe from a specific event type.
     */
    off<T extends MapEventType>(eventType: T, listener: MapEventListener<T>): void {
        const registered: Set<MapEventListener<T>> | undefined = this.listeners[eventType];
        registered?.delete(listener);
    }

    /**
     * Emit an event to all subscribers.
     */
    emit<T extends MapEventType>(eventType: T, event: MapEventMap[T]): void {
        const registered: Set<MapEventListener<T>> | undefined = this.listeners[eventType];
        if (registered) {
            [...registered].forEach(listener => {
                try {
                    listener(event);
                } catch (err) {
                    console.error(`[MapEventBus] Error in listener for "${eventType}":`, err);
                }
            });
        }
    }
}
