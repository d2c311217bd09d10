import type { SampleStore } from './sampleStore';
import type { VisibleWindow } from './visibleWindow';

export interface SurfaceSize {
    width: number;
    height: number;
}

export function timeToPx(time: number, originTime: number, timeTranslation: number, timeInPx: number): number {
    return (time - originTime - timeTranslation) / timeInPx;
}

/** A flat window (zero range) is treated as a unit range. */
export function ampToPx(amplitude: number, minAmp: number, ampRange: number, ampTranslation: number, ampInPx: number): number {
    const range = ampRange === 0 ? 1 : ampRange;
    return ((amplitude - minAmp) / range + ampTranslation) / ampInPx;
}

/** Maps a pixel centre onto the [-1, 1] clip-space axis of the given extent. */
export function pxToPlane(px: number, extent: number): number {
    return 2 * (px + 0.5) / extent - 1;
}

/**
 * Scale factors plus the surface size they are spread over.
 *
 * The per-pixel values are recomputed by every setter, never lazily.
 */
export class ScaleState {
    private _timeScaleFactor: number;
    private _ampScaleFactor: number;
    private _width = 0;
    private _height = 0;
    private _timeInPx = 0;
    private _ampInPx = 0;

    ampTranslation: number;

    constructor(timeScaleFactor: number, ampScaleFactor: number, ampTranslation: number) {
        this._timeScaleFactor = timeScaleFactor;
        this._ampScaleFactor = ampScaleFactor;
        this.ampTranslation = ampTranslation;
        this.recompute();
    }

    get timeScaleFactor(): number {
        return this._timeScaleFactor;
    }

    set timeScaleFactor(value: number) {
        this._timeScaleFactor = value;
        this.recompute();
    }

    get ampScaleFactor(): number {
        return this._ampScaleFactor;
    }

    set ampScaleFactor(value: number) {
        this._ampScaleFactor = value;
        this.recompute();
    }

    /** Seconds covered by one horizontal pixel. */
    get timeInPx(): number {
        return this._timeInPx;
    }

    /** Amplitude units covered by one vertical pixel. */
    get ampInPx(): number {
        return this._ampInPx;
    }

    get width(): number {
        return this._width;
    }

    get height(): number {
        return this._height;
    }

    get hasSurface(): boolean {
        return this._width > 0 && this._height > 0;
    }

    resize(size: SurfaceSize): void {
        this._width = size.width;
        this._height = size.height;
        this.recompute();
    }

    sampleTimePx(store: SampleStore, window: VisibleWindow, index: number): number {
        return timeToPx(store.timeAt(index), store.originTime, window.timeTranslation, this._timeInPx);
    }

    sampleAmpPx(store: SampleStore, window: VisibleWindow, index: number): number {
        return ampToPx(store.amplitudeAt(index), window.minAmp, window.ampRange, this.ampTranslation, this._ampInPx);
    }

    planeX(px: number): number {
        return pxToPlane(px, this._width);
    }

    planeY(px: number): number {
        return pxToPlane(px, this._height);
    }

    private recompute(): void {
        this._timeInPx = this._timeScaleFactor / this._width;
        this._ampInPx = this._ampScaleFactor / this._height;
    }
}
