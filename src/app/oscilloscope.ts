import {
    Guarded,
    InvalidSampleOrderError,
    SampleStore,
    ScaleState,
    ScopeConfigManager,
    ScopeLockError,
    createInitialWindow,
    selectVisibleWindow,
    type Logger,
    type Sample,
    type ScopeConfig,
    type SurfaceSize,
    type VisibleWindow,
} from '@tracescope/core';
import { PaintLoop, type FrameScheduler } from './paintLoop';
import type { TracePainter, TraceState, TraceStyle } from './painters/tracePainter';
import { RenderProfiler, type ReadOnlyRenderProfiler } from './renderProfiler';
import type { DrawSurface } from './surface';

export type AttachMode = 'external' | 'loop';

export interface AttachOptions {
    /**
     * `external`: the host calls {@link Oscilloscope.paintFrame} from its own
     * paint callback. `loop`: frames are painted continuously while the surface
     * is alive.
     */
    mode: AttachMode;
    scheduleNext?: FrameScheduler;
}

export interface OscilloscopeOptions {
    /** Raw configuration merged over the defaults. */
    config?: unknown;
    logger?: Logger;
    profiler?: RenderProfiler;
}

function styleOf(config: Readonly<ScopeConfig>): TraceStyle {
    return {
        strokeWidth: config.strokeWidth,
        strokeColor: config.strokeColor,
        backgroundColor: config.backgroundColor,
    };
}

/**
 * A live time-amplitude trace drawn by one painter.
 *
 * Samples, the visible window, scale and style live behind one lock shared by
 * {@link append}, {@link setActive}, configuration changes and painting.
 */
export class Oscilloscope<TTarget> {
    private readonly state: Guarded<TraceState>;
    private readonly configManager: ScopeConfigManager;
    private readonly profiler: RenderProfiler;
    private readonly logger: Logger;
    private active = true;
    private released = false;
    private unsubscribe: (() => void) | null = null;
    private loop: PaintLoop<TTarget> | null = null;

    constructor(private readonly painter: TracePainter<TTarget>, options: OscilloscopeOptions = {}) {
        this.logger = options.logger ?? console;
        this.profiler = options.profiler ?? new RenderProfiler();
        this.configManager = new ScopeConfigManager(options.config, this.logger);

        const config = this.configManager.config;
        this.state = new Guarded<TraceState>({
            store: new SampleStore(),
            window: createInitialWindow(),
            scale: new ScaleState(config.timeScaleFactor, config.ampScaleFactor, config.ampTranslation),
            style: styleOf(config),
        });

        this.configManager.onConfigChanged((next, previous) => this.applyConfig(next, previous));
    }

    get config(): Readonly<ScopeConfig> {
        return this.configManager.config;
    }

    get stats(): ReadOnlyRenderProfiler {
        return this.profiler;
    }

    get isActive(): boolean {
        return this.active;
    }

    get size(): number {
        return this.state.lock(state => state.store.size);
    }

    get visibleWindow(): VisibleWindow {
        return this.state.lock(state => ({ ...state.window }));
    }

    append(sample: Sample): void;
    append(time: number, amplitude: number): void;
    append(sampleOrTime: Sample | number, amplitude?: number): void {
        const time = typeof sampleOrTime === 'number' ? sampleOrTime : sampleOrTime.time;
        const value = typeof sampleOrTime === 'number' ? amplitude ?? 0 : sampleOrTime.amplitude;
        const { sampleOrder, evictOffscreenSamples } = this.configManager.config;

        this.state.lock(state => {
            const { store } = state;
            if (sampleOrder === 'strict') {
                const last = store.last();
                if (last && time < last.time) {
                    throw new InvalidSampleOrderError(time, last.time);
                }
            }

            store.append(time, value);
            state.window = selectVisibleWindow(store, state.scale.timeScaleFactor, state.window);
            if (evictOffscreenSamples) {
                store.evictBefore(state.window.beginIndex);
            }
            this.painter.update?.(state);
        });
    }

    /** Enabling starts a fresh session; disabling keeps the last frame on screen. */
    setActive(enabled: boolean): void {
        this.state.lock(state => {
            this.active = enabled;
            if (!enabled) return;

            state.store.clear();
            state.window = createInitialWindow();
            this.painter.reset?.();
        });
    }

    setTimeScaleFactor(value: number): void {
        this.assertUnlocked();
        this.configManager.update({ timeScaleFactor: value });
    }

    setAmpScaleFactor(value: number): void {
        this.assertUnlocked();
        this.configManager.update({ ampScaleFactor: value });
    }

    setAmpTranslation(value: number): void {
        this.assertUnlocked();
        this.configManager.update({ ampTranslation: value });
    }

    setStrokeWidth(value: number): void {
        this.assertUnlocked();
        this.configManager.update({ strokeWidth: value });
    }

    setStrokeColor(value: string): void {
        this.assertUnlocked();
        this.configManager.update({ strokeColor: value });
    }

    setBackgroundColor(value: string | null): void {
        this.assertUnlocked();
        this.configManager.update({ backgroundColor: value });
    }

    /** Applies every valid key of `delta`; invalid keys are logged and skipped. */
    configure(delta: unknown): Readonly<ScopeConfig> {
        this.assertUnlocked();
        return this.configManager.merge(delta);
    }

    exportConfig(): Partial<ScopeConfig> {
        return this.configManager.exportDelta();
    }

    /** Paints one frame; returns whether a trace was drawn. */
    paintFrame(target: TTarget): boolean {
        if (this.released) return false;

        return this.state.lock(state => {
            this.profiler.startFrame();
            let drawn: boolean;
            try {
                drawn = this.painter.paint(target, state, this.profiler);
            } catch (error) {
                this.profiler.abortFrame();
                throw error;
            }
            this.profiler.endFrame();
            return drawn;
        });
    }

    attach(surface: DrawSurface<TTarget>, options: AttachOptions): void {
        if (this.released) {
            throw new Error('Cannot attach a released oscilloscope');
        }
        if (this.unsubscribe) {
            throw new Error('Oscilloscope is already attached to a surface');
        }

        this.unsubscribe = surface.subscribe({
            onReady: (size) => {
                this.resize(size);
                if (options.mode === 'loop') {
                    this.startLoop(surface, options.scheduleNext);
                }
            },
            onResize: (size) => this.resize(size),
            onDestroyed: () => this.stopLoop(),
        });
    }

    /** Detaches from the surface; resolves once the paint loop has exited. */
    async release(): Promise<void> {
        if (this.released) return;
        this.released = true;

        this.unsubscribe?.();
        this.unsubscribe = null;
        await this.stopLoop();
        this.painter.dispose?.();
    }

    private resize(size: SurfaceSize): void {
        this.state.lock(state => {
            state.scale.resize(size);
            this.painter.resize?.(size);
            this.painter.update?.(state);
        });
    }

    private startLoop(surface: DrawSurface<TTarget>, scheduleNext: FrameScheduler | undefined): void {
        if (this.loop && this.loop.state === 'running') {
            this.logger.warn('Surface reported ready while its paint loop is still running');
            return;
        }
        this.loop = new PaintLoop(surface, (target) => { this.paintFrame(target); }, {
            scheduleNext,
            logger: this.logger,
        });
        this.loop.start();
    }

    private async stopLoop(): Promise<void> {
        const loop = this.loop;
        this.loop = null;
        if (loop) {
            await loop.stop();
        }
    }

    /** Configuration is only changed from outside a locked section. */
    private assertUnlocked(): void {
        if (this.state.isLocked) {
            throw new ScopeLockError();
        }
    }

    private applyConfig(config: Readonly<ScopeConfig>, previous: Readonly<ScopeConfig>): void {
        this.state.lock(state => {
            state.scale.timeScaleFactor = config.timeScaleFactor;
            state.scale.ampScaleFactor = config.ampScaleFactor;
            state.scale.ampTranslation = config.ampTranslation;
            state.style = styleOf(config);
            if (config.timeScaleFactor !== previous.timeScaleFactor) {
                // A new span restarts the first-index floor.
                state.window = selectVisibleWindow(state.store, config.timeScaleFactor, createInitialWindow());
            }
            this.painter.update?.(state);
        });
    }
}
