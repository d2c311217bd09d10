import type { SampleStore } from './sampleStore';

export interface VisibleWindow {
    readonly beginIndex: number;
    readonly endIndex: number;
    /** Shift of the time axis origin, in seconds. */
    readonly timeTranslation: number;
    readonly minAmp: number;
    readonly maxAmp: number;
    readonly ampRange: number;
}

export function createInitialWindow(): VisibleWindow {
    return {
        beginIndex: 0,
        endIndex: 0,
        timeTranslation: 0,
        minAmp: 0,
        maxAmp: 0,
        ampRange: 0,
    };
}

/** Number of line segments spanned by the window. */
export function visibleCount(window: VisibleWindow): number {
    return window.endIndex - window.beginIndex;
}

/**
 * Recomputes the visible part of the signal after an append.
 *
 * The first visible index is estimated from the mean sample period rather than
 * searched for, so it is approximate for irregular sampling. It never moves
 * backwards within a session.
 */
export function selectVisibleWindow(
    store: SampleStore,
    timeScaleFactor: number,
    previous: VisibleWindow
): VisibleWindow {
    const lastIndex = store.lastIndex;
    if (lastIndex < 0) {
        return createInitialWindow();
    }

    let beginIndex = previous.beginIndex;
    let timeTranslation = previous.timeTranslation;

    const signalTime = store.timeAt(lastIndex) - store.originTime;
    const subTime = signalTime - timeScaleFactor;
    if (subTime > 0) {
        const meanPeriod = signalTime / store.size;
        const estimate = Math.floor(subTime / meanPeriod) - 1;
        timeTranslation = subTime;
        beginIndex = Math.max(beginIndex, clampIndex(estimate, lastIndex));
    }
    beginIndex = Math.max(Math.min(beginIndex, lastIndex), store.firstRetainedIndex);

    let min = store.amplitudeAt(beginIndex);
    let max = min;
    for (let i = beginIndex + 1; i <= lastIndex; i++) {
        const amplitude = store.amplitudeAt(i);
        if (amplitude < min) min = amplitude;
        if (amplitude > max) max = amplitude;
    }

    return {
        beginIndex,
        endIndex: lastIndex,
        timeTranslation,
        minAmp: min,
        maxAmp: max,
        ampRange: max - min,
    };
}

function clampIndex(index: number, lastIndex: number): number {
    if (!Number.isFinite(index) || index < 0) return 0;
    return Math.min(index, lastIndex);
}
