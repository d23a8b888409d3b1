import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MapViewService } from './MapViewService';
import { MapModel } from '../MapModel';
import { WEB_MERCATOR, WGS84 } from '../IMapInterfaces';
import { DEFAULT_APP_CONFIG } from '../../config/loader';
import { MapStateStore } from '../../store/map-state-store';
import { MapEventBus } from '../../store/map-events';
import { FakeFeatureLayer, FakePortalItem, makeFeature, succeed } from '../../test/fakes';
import { resetStubs, stubMaps } from '../../test/maplibre-stub';
import type { RenderedHit, StubMap } from '../../test/maplibre-stub';

vi.mock('maplibre-gl', () => import('../../test/maplibre-stub'));

const BASEMAP = DEFAULT_APP_CONFIG.map.basemap;
const COLORS = { color: '#e07b39', selectionColor: '#00ffff' };
const LAYER_ID = 'abc123-0';

function hit(id: number): RenderedHit {
    return {
        id,
        properties: { name: `Brewery ${id}` },
        geometry: { type: 'Point', coordinates: [-123.07, 49.27] },
    };
}

describe('MapViewService', () => {
    let store: MapStateStore;
    let bus: MapEventBus;
    let container: HTMLElement;
    let view: MapViewService;
    let map: StubMap;
    let layer: FakeFeatureLayer;

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        resetStubs();
        store = new MapStateStore();
        bus = new MapEventBus();
        container = document.createElement('div');
        view = new MapViewService(container, store, bus, COLORS);
        map = stubMaps[0];
        const item = new FakePortalItem('https://www.arcgis.com', 'abc123', succeed);
        layer = new FakeFeatureLayer(item, 0, succeed);
        layer.geometryType = 'polygon';
    });

    function showLayer(): MapModel {
        const model = new MapModel(BASEMAP);
        model.addOperationalLayer(layer);
        view.setMap(model);
        map.fire('style.load');
        return model;
    }

    it('starts with an empty style and nothing drawn', () => {
        expect(stubMaps).toHaveLength(1);
        expect(map.options).toEqual({
            container,
            center: [0, 0],
            zoom: 1,
            style: { version: 8, sources: {}, layers: [] },
            attributionControl: { compact: true },
        });
        expect(view.map).toBeNull();
        expect(map.layerIds).toEqual([]);
    });

    it('tracks tile loading in the store', () => {
        map.fire('dataloading');
        expect(store.getState().mapBusy).toBe(true);

        map.fire('idle');
        expect(store.getState().mapBusy).toBe(false);
    });

    describe('setMap', () => {
        it('loads the basemap style and draws the layers once the style has loaded', () => {
            const model = new MapModel(BASEMAP);
            model.addOperationalLayer(layer);

            view.setMap(model);

            expect(map.setStyle).toHaveBeenCalledWith(BASEMAP.styleUrl, { diff: false });
            expect(map.layerIds).toEqual([]);
            expect(view.map).toBe(model);
            expect(store.getState().mapAttached).toBe(true);

            map.fire('style.load');

            expect(map.sourceIds).toEqual([`src-${LAYER_ID}`]);
            expect(map.layerIds).toEqual([`${LAYER_ID}-fill`, `${LAYER_ID}-outline`]);
        });

        it('draws the selection through feature state', () => {
            showLayer();
            const feature = makeFeature(LAYER_ID, 4);

            layer.selectFeatures([feature]);

            expect(map.removeFeatureState).toHaveBeenCalledWith({ source: `src-${LAYER_ID}` });
            expect(map.setFeatureState).toHaveBeenCalledWith({ source: `src-${LAYER_ID}`, id: 4 }, { selected: true });
        });
    });

    it('fits the viewpoint to an extent without animation', () => {
        view.setViewpoint({ xmin: -123.1, ymin: 49.2, xmax: -123.0, ymax: 49.3, spatialReference: WGS84 });

        expect(map.fitBounds).toHaveBeenCalledWith(
            [[-123.1, 49.2], [-123.0, 49.3]],
            { padding: 40, maxZoom: 16, animate: false }
        );
    });

    it('converts screen points to Web Mercator map points', () => {
        const point = view.screenToLocation([180, 0]);

        expect(point.x).toBeCloseTo(20037508.34, 2);
        expect(point.y).toBeCloseTo(0, 6);
        expect(point.spatialReference).toEqual(WEB_MERCATOR);
    });

    it('reports a still primary press and release as a click', () => {
        const onClick = vi.fn();
        view.onClick(onClick);
        const originalEvent = { button: 0 };
        const mouse = { point: { x: 5, y: 6 }, lngLat: { lng: -123.07, lat: 49.27 }, originalEvent };

        map.fire('mousedown', mouse);
        map.fire('mouseup', mouse);

        expect(onClick).toHaveBeenCalledWith({
            coords: [-123.07, 49.27],
            pixel: [5, 6],
            button: 'primary',
            stillSincePress: true,
            originalEvent,
        });
    });

    describe('identifyLayer', () => {
        it('rejects a layer that is not displayed', async () => {
            await expect(view.identifyLayer(layer, [100, 50], 10, false, 10)).rejects.toThrow(
                'Layer "abc123-0" is not displayed in this view'
            );

            view.setMap(new MapModel(BASEMAP));
            await expect(view.identifyLayer(layer, [100, 50], 10, false, 10)).rejects.toThrow(
                'Layer "abc123-0" is not displayed in this view'
            );
            expect(map.queryRenderedFeatures).not.toHaveBeenCalled();
        });

        it('queries the drawn layers in a box of the tolerance around the point', async () => {
            showLayer();

            const result = await view.identifyLayer(layer, [100, 50], 10, false, 10);

            expect(map.queryRenderedFeatures).toHaveBeenCalledWith(
                [[90, 40], [110, 60]],
                { layers: [`${LAYER_ID}-fill`, `${LAYER_ID}-outline`] }
            );
            expect(result).toEqual({ layer, elements: [] });
        });

        it('stops at the maximum number of results', async () => {
            showLayer();
            map.renderedHits = Array.from({ length: 15 }, (_, i) => hit(i + 1));

            const result = await view.identifyLayer(layer, [100, 50], 10, false, 10);

            expect(result.elements).toHaveLength(10);
        });

        it('reports a polygon hit on both fill and outline once', async () => {
            showLayer();
            const first = makeFeature(LAYER_ID, 1);
            const second = makeFeature(LAYER_ID, 2);
            layer.featuresById.set(1, first);
            layer.featuresById.set(2, second);
            map.renderedHits = [hit(1), hit(2), hit(1), hit(2)];

            const result = await view.identifyLayer(layer, [100, 50], 10, false, 10);

            expect(result.elements).toEqual([first, second]);
        });

        it('returns layer features, and graphics for hits the layer does not know', async () => {
            showLayer();
            const known = makeFeature(LAYER_ID, 1);
            layer.featuresById.set(1, known);
            map.renderedHits = [
                hit(1),
                { id: 99, properties: { name: 'Pop-up bar' }, geometry: null },
                { properties: { label: 'Commercial Drive' }, geometry: { type: 'Point', coordinates: [-123.07, 49.28] } },
            ];

            const result = await view.identifyLayer(layer, [100, 50], 10, false, 10);

            expect(result.elements[0]).toBe(known);
            expect(result.elements.slice(1)).toEqual([
                { kind: 'graphic', attributes: { name: 'Pop-up bar' }, geometry: null },
                {
                    kind: 'graphic',
                    attributes: { label: 'Commercial Drive' },
                    geometry: { type: 'Point', coordinates: [-123.07, 49.28] },
                },
            ]);
        });
    });

    it('releases the map once and stops listening to the pointer', () => {
        showLayer();

        view.dispose();
        view.dispose();

        expect(map.remove).toHaveBeenCalledTimes(1);
        expect(map.listenerCount('mouseup')).toBe(0);
        expect(map.listenerCount('mousedown')).toBe(0);
    });
});
