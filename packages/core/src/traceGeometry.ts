import type { ScaleState } from './coordinateTransform';
import type { SampleStore } from './sampleStore';
import type { VisibleWindow } from './visibleWindow';
import { visibleCount } from './visibleWindow';

export interface LineStrip {
    /** Interleaved clip-space x/y pairs, one per visible sample. */
    readonly vertices: Float32Array;
    /** Vertices handed to the draw call; one fewer than the points held. */
    readonly vertexCount: number;
}

export const emptyLineStrip: LineStrip = {
    vertices: new Float32Array(0),
    vertexCount: 0,
};

export type SegmentSink = (x0: number, y0: number, x1: number, y1: number) => void;

export function buildLineStrip(
    store: SampleStore,
    window: VisibleWindow,
    scale: ScaleState,
    reuse?: Float32Array
): LineStrip {
    if (store.size === 0) {
        return emptyLineStrip;
    }

    const pointCount = visibleCount(window) + 1;
    const floatCount = pointCount * 2;
    const vertices = reuse && reuse.length >= floatCount
        ? reuse.subarray(0, floatCount)
        : new Float32Array(floatCount);

    let offset = 0;
    for (let i = window.beginIndex; i <= window.endIndex; i++) {
        vertices[offset++] = scale.planeX(scale.sampleTimePx(store, window, i));
        vertices[offset++] = scale.planeY(scale.sampleAmpPx(store, window, i));
    }

    return { vertices, vertexCount: visibleCount(window) };
}

export function forEachSegment(
    store: SampleStore,
    window: VisibleWindow,
    scale: ScaleState,
    emit: SegmentSink
): number {
    if (store.size < 2) {
        return 0;
    }

    let x0 = scale.sampleTimePx(store, window, window.beginIndex);
    let y0 = scale.sampleAmpPx(store, window, window.beginIndex);
    let count = 0;
    for (let i = window.beginIndex + 1; i <= window.endIndex; i++) {
        const x1 = scale.sampleTimePx(store, window, i);
        const y1 = scale.sampleAmpPx(store, window, i);
        emit(x0, y0, x1, y1);
        x0 = x1;
        y0 = y1;
        count++;
    }
    return count;
}
