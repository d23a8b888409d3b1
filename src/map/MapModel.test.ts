import { describe, expect, it, vi } from 'vitest';
import { MapModel } from './MapModel';
import { DEFAULT_APP_CONFIG } from '../config/loader';
import { FakeFeatureLayer, FakePortalItem, succeed } from '../test/fakes';

describe('MapModel', () => {
    const item = new FakePortalItem('https://www.arcgis.com', 'abc123', succeed);

    it('keeps the basemap it was created with', () => {
        const map = new MapModel(DEFAULT_APP_CONFIG.map.basemap);

        expect(map.basemap.id).toBe('light-gray-canvas');
        expect(map.operationalLayers).toEqual([]);
    });

    it('adds operational layers in order', () => {
        const map = new MapModel(DEFAULT_APP_CONFIG.map.basemap);
        const first = new FakeFeatureLayer(item, 0, succeed);
        const second = new FakeFeatureLayer(item, 1, succeed);

        map.addOperationalLayer(first);
        map.addOperationalLayer(second);

        expect(map.operationalLayers).toEqual([first, second]);
    });

    it('ignores a layer that is already on the map', () => {
        const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const map = new MapModel(DEFAULT_APP_CONFIG.map.basemap);
        const layer = new FakeFeatureLayer(item, 0, succeed);

        map.addOperationalLayer(layer);
        map.addOperationalLayer(layer);

        expect(map.operationalLayers).toHaveLength(1);
        expect(warnSpy).toHaveBeenCalledWith('[MAP MODEL] Layer "abc123-0" is already part of the map.');
    });
});
