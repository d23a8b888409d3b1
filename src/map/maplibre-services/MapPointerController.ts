import type { MapEventBus } from '../../store/map-events';
import type { LngLat, Pixel } from '../../store/map-events';
import { ClickGestureTracker, toPointerButton } from './ClickGestureTracker';
import type * as maplibregl from 'maplibre-gl';

/**
 * MapPointerController - Normalizes MapLibre pointer events into generic map events.
 *
 * This is the only place that knows about MapLibre's mouse event API.
 * MapLibre's own 'click' only fires for the primary button, so clicks are
 * rebuilt from mousedown/mouseup to report every button together with
 * whether the pointer stayed still since the press.
 */
export class MapPointerController {
  private map: maplibregl.Map | null = null;
  private detachFns: Array<() => void> = [];
  private readonly tracker = new ClickGestureTracker();

  constructor(private readonly eventBus: MapEventBus) {}

  public attach(map: maplibregl.Map): void {
    if (this.map === map) {
      return;
    }

    this.detach();
    this.map = map;

    const handleMouseDown = (event: maplibregl.MapMouseEvent) => {
      this.tracker.press(toPixel(event), toPointerButton(event.originalEvent.button));
    };

    const handleMouseMove = (event: maplibregl.MapMouseEvent) => {
      this.tracker.move(toPixel(event));
    };

    const handleDragStart = () => {
      this.tracker.markPanned();
    };

    const handleMouseUp = (event: maplibregl.MapMouseEvent) => {
      const pixel = toPixel(event);
      const gesture = this.tracker.release(pixel, toPointerButton(event.originalEvent.button));
      if (!gesture) {
        return;
      }

      const coords: LngLat = [event.lngLat.lng, event.lngLat.lat];
      this.eventBus.emit('click', {
        coords,
        pixel,
        button: gesture.button,
        stillSincePress: gesture.stillSincePress,
        originalEvent: event.originalEvent
      });
    };

    const handleMouseOut = () => {
      this.tracker.reset();
    };

    map.on('mousedown', handleMouseDown);
    map.on('mousemove', handleMouseMove);
    map.on('dragstart', handleDragStart);
    map.on('mouseup', handleMouseUp);
    map.on('mouseout', handleMouseOut);

    this.detachFns = [
      () => map.off('mousedown', handleMouseDown),
      () => map.off('mousemove', handleMouseMove),
      () => map.off('dragstart', handleDragStart),
      () => map.off('mouseup', handleMouseUp),
      () => map.off('mouseout', handleMouseOut),
    ];
  }

  public detach(): void {
    this.detachFns.forEach((fn) => fn());
    this.detachFns = [];
    this.tracker.reset();
    this.map = null;
  }
}

function toPixel(event: maplibregl.MapMouseEvent): Pixel {
  return [event.point.x, event.point.y];
}
