import { describe, expect, it, vi } from 'vitest';
import { MapEventBus } from './map-events';
import type { MapClickEvent } from './map-events';

const click: MapClickEvent = { coords: [-123.07, 49.27], pixel: [5, 6], button: 'primary', stillSincePress: true };

describe('MapEventBus', () => {
    it('delivers events to every subscriber', () => {
        const bus = new MapEventBus();
        const first = vi.fn();
        const second = vi.fn();
        bus.on('click', first);
        bus.on('click', second);

        bus.emit('click', click);

        expect(first).toHaveBeenCalledWith(click);
        expect(second).toHaveBeenCalledWith(click);
    });

    it('stops delivering after unsubscribe', () => {
        const bus = new MapEventBus();
        const listener = vi.fn();
        const unsubscribe = bus.on('click', listener);

        unsubscribe();
        bus.emit('click', click);

        expect(listener).not.toHaveBeenCalled();
    });

    it('logs a failing listener and keeps notifying the others', () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const bus = new MapEventBus();
        const failure = new Error('listener broke');
        const after = vi.fn();
        bus.on('click', () => {
            throw failure;
        });
        bus.on('click', after);

        bus.emit('click', click);

        expect(after).toHaveBeenCalledTimes(1);
        expect(errorSpy).toHaveBeenCalledWith('[MapEventBus] Error in listener for "click":', failure);
    });
});
