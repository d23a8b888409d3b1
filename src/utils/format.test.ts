import { describe, expect, it } from 'vitest';
import { formatFixed, formatLocation } from './format';
import { WEB_MERCATOR } from '../map/IMapInterfaces';

describe('formatFixed', () => {
    it('rounds half up on the decimal representation', () => {
        expect(formatFixed(12.345, 2)).toBe('12.35');
        expect(formatFixed(1.005, 2)).toBe('1.01');
    });

    it('rounds negative halves away from zero', () => {
        expect(formatFixed(-2.345, 2)).toBe('-2.35');
    });

    it('pads to the requested decimals', () => {
        expect(formatFixed(-0.5, 2)).toBe('-0.50');
        expect(formatFixed(40, 2)).toBe('40.00');
    });

    it('keeps the sign of negative zero', () => {
        expect(formatFixed(-0, 2)).toBe('-0.00');
    });

    it('formats Web Mercator sized values', () => {
        expect(formatFixed(-13702545.6789, 2)).toBe('-13702545.68');
    });

    it('passes non-finite values through', () => {
        expect(formatFixed(Number.NaN, 2)).toBe('NaN');
        expect(formatFixed(Number.NEGATIVE_INFINITY, 2)).toBe('-Infinity');
    });
});

describe('formatLocation', () => {
    it('renders x and y with two decimals', () => {
        expect(formatLocation({ x: 12.345, y: -0.5, spatialReference: WEB_MERCATOR })).toBe('x: 12.35, y: -0.50');
    });
});
