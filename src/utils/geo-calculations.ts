// src/utils/geo-calculations.ts
// Projection and extent helpers shared by the map view and the feature layer

import type { FeatureCollection, Geometry, Position } from 'geojson';
import type { Extent, MapPoint, SpatialReference } from '../map/IMapInterfaces';
import { WEB_MERCATOR, WGS84 } from '../map/IMapInterfaces';

export type LngLat = [number, number]; // [longitude, latitude]

/**
 * Semi-major axis of the WGS84 ellipsoid, used as sphere radius by Web Mercator.
 */
const EARTH_RADIUS_M = 6378137;

/** Latitude where Web Mercator turns the map into a square. */
const MAX_MERCATOR_LAT = 85.0511287798066;

/** Wkids that denote Web Mercator (102100 is the legacy Esri code). */
const WEB_MERCATOR_WKIDS = [3857, 102100, 102113, 900913];

export function isWebMercator(sr: SpatialReference): boolean {
    return WEB_MERCATOR_WKIDS.includes(sr.wkid);
}

export function isWgs84(sr: SpatialReference): boolean {
    return sr.wkid === WGS84.wkid;
}

/**
 * Projects a geographic coordinate to Web Mercator meters.
 * Latitudes beyond the Mercator limit are clamped.
 */
export function lngLatToWebMercator([lng, lat]: LngLat): MapPoint {
    const toRad = (deg: number) => deg * Math.PI / 180;
    const clampedLat = Math.max(-MAX_MERCATOR_LAT, Math.min(MAX_MERCATOR_LAT, lat));

    return {
        x: EARTH_RADIUS_M * toRad(lng),
        y: EARTH_RADIUS_M * Math.log(Math.tan(Math.PI / 4 + toRad(clampedLat) / 2)),
        spatialReference: WEB_MERCATOR,
    };
}

/**
 * Inverse of lngLatToWebMercator.
 */
export function webMercatorToLngLat(point: Pick<MapPoint, 'x' | 'y'>): LngLat {
    const toDeg = (rad: number) => rad * 180 / Math.PI;

    return [
        toDeg(point.x / EARTH_RADIUS_M),
        toDeg(2 * Math.atan(Math.exp(point.y / EARTH_RADIUS_M)) - Math.PI / 2),
    ];
}

/**
 * Converts a map point in WGS84 or Web Mercator to [lng, lat].
 */
export function mapPointToLngLat(point: MapPoint): LngLat {
    if (isWgs84(point.spatialReference)) {
        return [point.x, point.y];
    }
    if (isWebMercator(point.spatialReference)) {
        return webMercatorToLngLat(point);
    }
    throw new Error(`Unsupported spatial reference wkid ${point.spatialReference.wkid}`);
}

/**
 * Converts an extent to [[west, south], [east, north]] in degrees.
 */
export function extentToLngLatBounds(extent: Extent): [LngLat, LngLat] {
    const sw = mapPointToLngLat({ x: extent.xmin, y: extent.ymin, spatialReference: extent.spatialReference });
    const ne = mapPointToLngLat({ x: extent.xmax, y: extent.ymax, spatialReference: extent.spatialReference });
    return [sw, ne];
}

/**
 * Bounding box of every coordinate in a WGS84 feature collection.
 * Returns null when the collection has no coordinates.
 */
export function extentOfFeatureCollection(collection: FeatureCollection<Geometry | null>): Extent | null {
    let xmin = Infinity;
    let ymin = Infinity;
    let xmax = -Infinity;
    let ymax = -Infinity;

    const visit = (position: Position) => {
        const [x, y] = position;
        xmin = Math.min(xmin, x);
        ymin = Math.min(ymin, y);
        xmax = Math.max(xmax, x);
        ymax = Math.max(ymax, y);
    };

    collection.features.forEach((feature) => {
        if (feature.geometry) {
            collectPositions(feature.geometry).forEach(visit);
        }
    });

    if (!isFinite(xmin) || !isFinite(ymin)) {
        return null;
    }

    return { xmin, ymin, xmax, ymax, spatialReference: WGS84 };
}

function collectPositions(geometry: Geometry): Position[] {
    switch (geometry.type) {
        case 'Point':
            return [geometry.coordinates];
        case 'MultiPoint':
        case 'LineString':
            return geometry.coordinates;
        case 'MultiLineString':
        case 'Polygon':
            return geometry.coordinates.flat();
        case 'MultiPolygon':
            return geometry.coordinates.flat(2);
        case 'GeometryCollection':
            return geometry.geometries.flatMap(collectPositions);
    }
}
