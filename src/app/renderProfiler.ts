export interface MeasureInfo {
    name: string;
    startTime: number;
    endTime?: number;
}

export interface FrameInfo {
    startTime: number;
    endTime: number;
    frameTime: number;
    measures: MeasureInfo[][];
}

export interface FrameMeasurer {
    startMeasure(name: string): void;
    endMeasure(): void;
}

export interface ReadOnlyRenderProfiler extends FrameMeasurer {
    readonly lastFrame: FrameInfo | null;
    readonly framesPainted: number;
    getFilteredFrameRenderTime(): number;
}

/**
 * Times painted frames as a tree of named measures.
 *
 * `measures[depth]` lists, in start order, every measure opened while `depth`
 * others were open; the frame itself is the single entry at depth 0.
 */
export class RenderProfiler implements ReadOnlyRenderProfiler {
    private averageFrameTime = 0;
    private _lastFrame: FrameInfo | null = null;
    private _framesPainted = 0;
    private levels: MeasureInfo[][] = [];
    private open: MeasureInfo[] = [];

    constructor(private readonly now: () => number = () => performance.now()) {}

    get lastFrame(): FrameInfo | null {
        return this._lastFrame;
    }

    get framesPainted(): number {
        return this._framesPainted;
    }

    startFrame(): void {
        if (this.open.length > 0) {
            throw new Error(`Frame started while measure "${this.open[this.open.length - 1].name}" is open`);
        }
        this.levels = [];
        this.startMeasure('frame');
    }

    startMeasure(name: string): void {
        const measure: MeasureInfo = { name, startTime: this.now() };
        (this.levels[this.open.length] ??= []).push(measure);
        this.open.push(measure);
    }

    endMeasure(): void {
        const measure = this.open.pop();
        if (!measure) {
            throw new Error('No open measure to end');
        }
        measure.endTime = this.now();
    }

    endFrame(): void {
        if (this.open.length === 0) {
            throw new Error('No frame in progress');
        }
        if (this.open.length > 1) {
            throw new Error(`Frame ended with ${this.open.length - 1} unclosed measure(s)`);
        }
        const frame = this.open[0];
        this.open = [];
        const endTime = this.now();
        frame.endTime = endTime;

        const frameTime = endTime - frame.startTime;
        this._lastFrame = {
            startTime: frame.startTime,
            endTime,
            frameTime,
            measures: this.levels,
        };
        this._framesPainted++;
        this.averageFrameTime = this.averageFrameTime * 0.9 + frameTime * 0.1;
    }

    /** Discards the frame in progress, leaving the last completed one. */
    abortFrame(): void {
        this.open = [];
        this.levels = [];
    }

    getFilteredFrameRenderTime(): number {
        return this.averageFrameTime;
    }
}
