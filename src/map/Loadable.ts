// src/map/Loadable.ts

import type { ILoadable, LoadStatus } from './IMapInterfaces';

/**
 * Base class for resources with a one-shot asynchronous load.
 * Subclasses implement `doLoad()`; status bookkeeping lives here.
 */
export abstract class Loadable implements ILoadable {
    private status: LoadStatus = 'not-loaded';
    private error: Error | null = null;
    private pending: Promise<void> | null = null;

    public get loadStatus(): LoadStatus {
        return this.status;
    }

    public get loadError(): Error | null {
        return this.error;
    }

    public load(): Promise<void> {
        if (!this.pending) {
            this.status = 'loading';
            this.pending = this.doLoad().then(
                () => {
                    this.status = 'loaded';
                },
                (reason: unknown) => {
                    this.error = toError(reason);
                    this.status = 'failed';
                    throw this.error;
                }
            );
        }
        return this.pending;
    }

    protected abstract doLoad(): Promise<void>;
}

/**
 * Starts (or joins) the load and resolves with the terminal status.
 * Never rejects; inspect `loadError` when the status is `failed`.
 */
export function whenDoneLoading(loadable: ILoadable): Promise<LoadStatus> {
    return loadable.load().then(
        () => loadable.loadStatus,
        () => loadable.loadStatus
    );
}

/** Normalizes anything thrown into an Error with a message. */
export function toError(reason: unknown): Error {
    if (reason instanceof Error) {
        return reason;
    }
    if (typeof reason === 'string') {
        return new Error(reason);
    }
    return new Error(`Unexpected failure: ${String(reason)}`);
}
