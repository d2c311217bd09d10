export interface Sample {
    readonly time: number;
    readonly amplitude: number;
}

const initialCapacity = 1024;

/**
 * Append-only signal history addressed by absolute index.
 *
 * Samples before a given index may be evicted; absolute indices, {@link size}
 * and {@link originTime} stay what they were, so windowing over the retained
 * tail is unaffected.
 */
export class SampleStore {
    private _times = new Float64Array(initialCapacity);
    private _amplitudes = new Float64Array(initialCapacity);
    private _retained = 0;
    private _evicted = 0;
    private _originTime = 0;

    get size(): number {
        return this._evicted + this._retained;
    }

    get lastIndex(): number {
        return this.size - 1;
    }

    /** Absolute index of the oldest sample still held. */
    get firstRetainedIndex(): number {
        return this._evicted;
    }

    get originTime(): number {
        return this._originTime;
    }

    append(time: number, amplitude: number): void {
        if (this.size === 0) {
            this._originTime = time;
        }
        if (this._retained === this._times.length) {
            this.grow();
        }
        this._times[this._retained] = time;
        this._amplitudes[this._retained] = amplitude;
        this._retained++;
    }

    clear(): void {
        this._retained = 0;
        this._evicted = 0;
        this._originTime = 0;
    }

    timeAt(index: number): number {
        return this._times[this.slot(index)];
    }

    amplitudeAt(index: number): number {
        return this._amplitudes[this.slot(index)];
    }

    get(index: number): Sample {
        const slot = this.slot(index);
        return { time: this._times[slot], amplitude: this._amplitudes[slot] };
    }

    first(): Sample | null {
        return this.size === 0 ? null : this.get(this.firstRetainedIndex);
    }

    last(): Sample | null {
        return this.size === 0 ? null : this.get(this.lastIndex);
    }

    evictBefore(index: number): void {
        const count = Math.min(index, this.size) - this._evicted;
        if (count <= 0) return;

        this._times.copyWithin(0, count, this._retained);
        this._amplitudes.copyWithin(0, count, this._retained);
        this._retained -= count;
        this._evicted += count;
    }

    private slot(index: number): number {
        if (!Number.isInteger(index) || index < this._evicted || index >= this.size) {
            throw new RangeError(`Sample index ${index} outside retained range [${this._evicted}, ${this.size})`);
        }
        return index - this._evicted;
    }

    private grow(): void {
        const capacity = Math.max(this._times.length * 2, initialCapacity);
        const times = new Float64Array(capacity);
        const amplitudes = new Float64Array(capacity);
        times.set(this._times.subarray(0, this._retained));
        amplitudes.set(this._amplitudes.subarray(0, this._retained));
        this._times = times;
        this._amplitudes = amplitudes;
    }
}
