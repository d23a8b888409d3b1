import type { LoadStatus, MapPoint } from '../map/IMapInterfaces';

/**
 * The single source of truth for the application state.
 * Any property added here must be initialized in the map-state-store.ts file.
 */
export interface IAppState {
    /** Load status of the portal item */
    portalItemStatus: LoadStatus;
    /** Load status of the feature layer */
    layerStatus: LoadStatus;
    /** True once a map has been set on the view */
    mapAttached: boolean;
    /** True when the map is busy loading tiles/data or rendering */
    mapBusy: boolean;
    selectedFeatureCount: number;
    /** Anchor of the visible callout, null when hidden */
    calloutLocation: MapPoint | null;
    /** Message of the last load failure shown to the user */
    lastError: string | null;
}

/** Defines who initiated the state change for loop prevention. */
export type StateSource = 'UI' | 'MAP' | 'INIT';
