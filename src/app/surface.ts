import type { SurfaceSize } from '@tracescope/core';

export interface SurfaceListener {
    onReady(size: SurfaceSize): void;
    onResize(size: SurfaceSize): void;
    /** Resolves once nothing will paint into the surface any more. */
    onDestroyed(): Promise<void>;
}

/** The host window system side of a scope. */
export interface DrawSurface<TTarget> {
    /** Returns `null` when no target is available right now. */
    acquireDrawTarget(): TTarget | null;
    present(target: TTarget): void;
    /** Returns a function that removes the listener. */
    subscribe(listener: SurfaceListener): () => void;
}
