// src/map/maplibre-services/ClickGestureTracker.ts

import type { Pixel, PointerButton } from '../../store/map-events';

/** Same default as MapLibre's clickTolerance. */
const DEFAULT_CLICK_TOLERANCE_PX = 3;

export interface ReleasedGesture {
  button: PointerButton;
  stillSincePress: boolean;
}

/**
 * Maps a DOM MouseEvent.button value to a PointerButton.
 */
export function toPointerButton(domButton: number): PointerButton {
  switch (domButton) {
    case 0:
      return 'primary';
    case 1:
      return 'middle';
    case 2:
      return 'secondary';
    default:
      return 'other';
  }
}

/**
 * Tracks press / move / release to tell a genuine click from the end of a pan.
 * A release counts as still when the pointer stayed within the tolerance of the
 * press position and no pan started in between.
 */
export class ClickGestureTracker {
  private pressPixel: Pixel | null = null;
  private pressButton: PointerButton | null = null;
  private moved = false;

  constructor(private readonly tolerancePx: number = DEFAULT_CLICK_TOLERANCE_PX) {}

  public press(pixel: Pixel, button: PointerButton): void {
    this.pressPixel = pixel;
    this.pressButton = button;
    this.moved = false;
  }

  public move(pixel: Pixel): void {
    if (!this.pressPixel || this.moved) {
      return;
    }
    const dx = pixel[0] - this.pressPixel[0];
    const dy = pixel[1] - this.pressPixel[1];
    if (Math.hypot(dx, dy) > this.tolerancePx) {
      this.moved = true;
    }
  }

  /** Marks the current press as a pan regardless of distance (e.g. on dragstart). */
  public markPanned(): void {
    if (this.pressPixel) {
      this.moved = true;
    }
  }

  /**
   * Completes the gesture. Returns null when no press was recorded.
   */
  public release(pixel: Pixel, button: PointerButton): ReleasedGesture | null {
    if (!this.pressPixel) {
      return null;
    }
    this.move(pixel);
    const stillSincePress = !this.moved && this.pressButton === button;
    this.reset();
    return { button, stillSincePress };
  }

  public reset(): void {
    this.pressPixel = null;
    this.pressButton = null;
    this.moved = false;
  }
}
