// src/utils/format.ts

import type { MapPoint } from '../map/IMapInterfaces';

/**
 * Formats a number with a fixed count of decimals, rounding half away from zero
 * on the shortest decimal representation of the value (12.345 -> "12.35").
 * `Number.prototype.toFixed` rounds the binary value instead (12.345 -> "12.34").
 */
export function formatFixed(value: number, decimals: number): string {
    if (!isFinite(value)) {
        return String(value);
    }

    const sign = value < 0 || Object.is(value, -0) ? '-' : '';
    const magnitude = Math.abs(value);
    const text = String(magnitude);

    // Exponent notation cannot be shifted by appending another exponent.
    if (text.includes('e')) {
        return `${sign}${magnitude.toFixed(decimals)}`;
    }

    const shifted = Math.round(Number(`${text}e${decimals}`));
    const rounded = Number(`${shifted}e-${decimals}`);
    return `${sign}${rounded.toFixed(decimals)}`;
}

/**
 * Callout detail text for a map location: "x: 12.35, y: -0.50".
 */
export function formatLocation(point: MapPoint): string {
    return `x: ${formatFixed(point.x, 2)}, y: ${formatFixed(point.y, 2)}`;
}
