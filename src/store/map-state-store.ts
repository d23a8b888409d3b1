// Role: This store calculates new state and notifies all subscribed UI
// components. State changes are tagged with their source ('UI', 'MAP' or 'INIT').

// src/store/map-state-store.ts

import type { IAppState, StateSource } from './IState';

// Simple Observer pattern setup
type Listener = (state: IAppState, source: StateSource) => void;

export const INITIAL_APP_STATE: IAppState = {
    portalItemStatus: 'not-loaded',
    layerStatus: 'not-loaded',
    mapAttached: false,
    mapBusy: false,
    selectedFeatureCount: 0,
    calloutLocation: null,
    lastError: null,
};

export class MapStateStore {
    private state: IAppState = { ...INITIAL_APP_STATE };
    private listeners: Listener[] = [];

    public getState(): IAppState {
        return Object.freeze({ ...this.state });
    }

    public dispatch(newState: Partial<IAppState>, source: StateSource): void {
        const previousState = this.state;
        this.state = {
            ...previousState,
            ...newState
        };

        // Notify subscribers
        this.listeners.forEach(listener => listener(this.getState(), source));
    }

    public subscribe(listener: Listener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }
}
