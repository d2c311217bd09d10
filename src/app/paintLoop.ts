import { setImmediate } from 'node:timers/promises';
import type { Logger } from '@tracescope/core';
import type { DrawSurface } from './surface';

export type PaintLoopState = 'created' | 'running' | 'cancelled' | 'destroyed';

export type FrameScheduler = () => Promise<void>;

export interface PaintLoopOptions {
    /** Awaited between iterations; defaults to yielding one event loop turn. */
    scheduleNext?: FrameScheduler;
    logger?: Logger;
}

const yieldToEventLoop: FrameScheduler = async () => {
    await setImmediate();
};

/**
 * Paints frames back to back into a surface until stopped.
 *
 * An iteration with no available target is skipped and retried on the next
 * one. {@link stop} resolves only after the running iteration has finished and
 * the loop has exited.
 */
export class PaintLoop<TTarget> {
    private _state: PaintLoopState = 'created';
    private _failure: unknown = undefined;
    private controller: AbortController | null = null;
    private task: Promise<void> | null = null;
    private readonly scheduleNext: FrameScheduler;
    private readonly logger: Logger;

    constructor(
        private readonly surface: DrawSurface<TTarget>,
        private readonly paintFrame: (target: TTarget) => void,
        options: PaintLoopOptions = {}
    ) {
        this.scheduleNext = options.scheduleNext ?? yieldToEventLoop;
        this.logger = options.logger ?? console;
    }

    get state(): PaintLoopState {
        return this._state;
    }

    /** The error that ended the loop early, if any. */
    get failure(): unknown {
        return this._failure;
    }

    start(): void {
        if (this._state !== 'created') {
            throw new Error(`Cannot start a paint loop that is ${this._state}`);
        }
        const controller = new AbortController();
        this.controller = controller;
        this._state = 'running';
        this.task = this.run(controller.signal);
    }

    async stop(): Promise<void> {
        if (this._state === 'created') {
            this._state = 'destroyed';
            return;
        }
        if (this._state === 'running') {
            this._state = 'cancelled';
            this.controller?.abort();
        }
        await this.task;
        this._state = 'destroyed';
    }

    private async run(signal: AbortSignal): Promise<void> {
        try {
            await this.scheduleNext();
            while (!signal.aborted) {
                const target = this.surface.acquireDrawTarget();
                if (target !== null) {
                    try {
                        this.paintFrame(target);
                    } finally {
                        this.surface.present(target);
                    }
                }
                await this.scheduleNext();
            }
        } catch (error) {
            if (this._state === 'running') {
                this._state = 'cancelled';
            }
            this._failure = error;
            this.logger.error('Paint loop stopped after an error:', error);
        }
    }
}
