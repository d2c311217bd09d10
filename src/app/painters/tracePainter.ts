import type { SampleStore, ScaleState, SurfaceSize, VisibleWindow } from '@tracescope/core';
import type { FrameMeasurer } from '../renderProfiler';

export interface TraceStyle {
    strokeWidth: number;
    strokeColor: string;
    /** `null` clears to transparent. */
    backgroundColor: string | null;
}

export interface TraceState {
    readonly store: SampleStore;
    window: VisibleWindow;
    readonly scale: ScaleState;
    style: TraceStyle;
}

export type TraceView = Readonly<TraceState>;

/**
 * A renderer back-end. Every method is invoked with the scope state locked.
 */
export interface TracePainter<TTarget> {
    /** Rebuilds any cached primitive after the data or the scale changed. */
    update?(trace: TraceView): void;
    /** Clears the target and draws the trace; returns whether a trace was drawn. */
    paint(target: TTarget, trace: TraceView, profiler: FrameMeasurer): boolean;
    /** Drops any cached primitive. */
    reset?(): void;
    resize?(size: SurfaceSize): void;
    dispose?(): void;
}
