import { describe, it, expect, vi } from 'vitest';
import { InvalidSampleOrderError, ScopeLockError, createInitialWindow } from '@tracescope/core';
import { Oscilloscope } from './oscilloscope';
import { CanvasTracePainter, type TraceCanvasContext } from './painters/canvasTracePainter';
import { GlTracePainter, type GlDrawTarget } from './painters/glTracePainter';
import type { TracePainter } from './painters/tracePainter';
import {
    FakeCanvasContext,
    FakeGl,
    FakeSurface,
    ManualScheduler,
    createMemoryShaderLoader,
    createSilentLogger,
    traceShaderSources,
} from './testUtils';

function createScope(config?: unknown): Oscilloscope<TraceCanvasContext> {
    return new Oscilloscope(new CanvasTracePainter(), { config, logger: createSilentLogger() });
}

function attachExternal(scope: Oscilloscope<TraceCanvasContext>): FakeSurface<TraceCanvasContext> {
    const surface = new FakeSurface<TraceCanvasContext>(() => new FakeCanvasContext());
    scope.attach(surface, { mode: 'external' });
    surface.ready({ width: 4, height: 2 });
    return surface;
}

function paintSegments(scope: Oscilloscope<TraceCanvasContext>): number[][] {
    const ctx = new FakeCanvasContext();
    scope.paintFrame(ctx);
    return ctx.segments;
}

describe('Oscilloscope', () => {
    describe('append', () => {
        it('should store samples and follow the newest one', () => {
            const scope = createScope();

            scope.append(0, 0);
            scope.append({ time: 1, amplitude: 3 });
            scope.append(2, -1);

            expect(scope.size).toBe(3);
            expect(scope.visibleWindow).toEqual({
                beginIndex: 0,
                endIndex: 2,
                timeTranslation: 0,
                minAmp: -1,
                maxAmp: 3,
                ampRange: 4,
            });
        });

        it('should accept out-of-order times by default', () => {
            const scope = createScope();

            scope.append(1, 0);
            scope.append(0.5, 0);

            expect(scope.size).toBe(2);
        });

        it('should reject a time before the previous one in strict order', () => {
            const scope = createScope({ sampleOrder: 'strict' });
            scope.append(1, 0);
            scope.append(1, 2);

            expect(() => scope.append(0.5, 0)).toThrow(InvalidSampleOrderError);
            expect(scope.size).toBe(2);
        });

        it('should select the same window when offscreen samples are evicted', () => {
            const keeping = createScope();
            const evicting = createScope({ evictOffscreenSamples: true });

            for (let i = 0; i < 200; i++) {
                keeping.append(i * 0.1, Math.sin(i / 5));
                evicting.append(i * 0.1, Math.sin(i / 5));
            }

            expect(evicting.visibleWindow).toEqual(keeping.visibleWindow);
            expect(evicting.size).toBe(200);
        });

        it('should reject appending from inside a paint', () => {
            const painter: TracePainter<string> = {
                paint: () => {
                    scope.append(1, 1);
                    return false;
                },
            };
            const scope = new Oscilloscope(painter, { logger: createSilentLogger() });

            expect(() => scope.paintFrame('target')).toThrow(ScopeLockError);
        });

        it('should reject configuration changes from inside a paint', () => {
            const painter: TracePainter<string> = {
                paint: () => {
                    scope.setTimeScaleFactor(8);
                    return false;
                },
            };
            const logger = createSilentLogger();
            const scope = new Oscilloscope(painter, { logger });

            expect(() => scope.paintFrame('target')).toThrow(ScopeLockError);
            expect(scope.config.timeScaleFactor).toBe(4);
            expect(logger.error).not.toHaveBeenCalled();
        });

        it('should reject a bulk configure from inside a paint', () => {
            const painter: TracePainter<string> = {
                paint: () => {
                    scope.configure({ strokeWidth: 2 });
                    return false;
                },
            };
            const scope = new Oscilloscope(painter, { logger: createSilentLogger() });

            expect(() => scope.paintFrame('target')).toThrow(ScopeLockError);
            expect(scope.config.strokeWidth).toBe(7);
        });
    });

    describe('setActive', () => {
        it('should keep the last frame while inactive', () => {
            const scope = createScope();
            attachExternal(scope);
            scope.append(0, 0);
            scope.append(1, 1);
            scope.append(2, 2);

            const before = paintSegments(scope);
            scope.setActive(false);
            const after = paintSegments(scope);

            expect(scope.isActive).toBe(false);
            expect(before).toEqual([
                [0, 0.5, 1, 1],
                [1, 1, 2, 1.5],
            ]);
            expect(after).toEqual(before);
        });

        it('should start a fresh session when enabled', () => {
            const scope = createScope();
            attachExternal(scope);
            scope.append(0, 0);
            scope.append(1, 1);

            scope.setActive(false);
            scope.setActive(true);

            expect(scope.isActive).toBe(true);
            expect(scope.size).toBe(0);
            expect(scope.visibleWindow).toEqual(createInitialWindow());
            expect(scope.paintFrame(new FakeCanvasContext())).toBe(false);
        });
    });

    describe('configuration', () => {
        it('should apply setters to the config and the next frame', () => {
            const scope = createScope();
            attachExternal(scope);
            scope.append(0, 0);
            scope.append(1, 1);

            scope.setStrokeWidth(2);
            scope.setStrokeColor('#ff0000');
            scope.setBackgroundColor('#101010');
            const ctx = new FakeCanvasContext();
            scope.paintFrame(ctx);

            expect(ctx.ops).toContain('fillRect 0 0 4 2 #101010');
            expect(ctx.ops).toContain('stroke #ff0000 2');
        });

        it('should rescale amplitudes when the translation changes', () => {
            const scope = createScope();
            attachExternal(scope);
            scope.append(0, 0);
            scope.append(1, 1);

            scope.setAmpTranslation(0);

            expect(paintSegments(scope)).toEqual([[0, 0, 1, 1]]);
        });

        it('should reject invalid setter values and keep the config', () => {
            const scope = createScope();

            expect(() => scope.setTimeScaleFactor(0)).toThrow(TypeError);
            expect(() => scope.setStrokeColor('red')).toThrow(TypeError);
            expect(scope.config.timeScaleFactor).toBe(4);
            expect(scope.config.strokeColor).toBe('#000000');
        });

        it('should widen the visible span with the time scale factor', () => {
            const scope = createScope();
            scope.setTimeScaleFactor(8);
            scope.setAmpScaleFactor(4);
            for (let i = 0; i < 60; i++) {
                scope.append(i * 0.1, 0);
            }

            expect(scope.config.ampScaleFactor).toBe(4);
            expect(scope.visibleWindow.beginIndex).toBe(0);
            expect(scope.visibleWindow.timeTranslation).toBe(0);
        });

        it('should widen a sliding window as soon as the time scale grows', () => {
            const scope = createScope();
            for (let i = 0; i < 100; i++) {
                scope.append(i * 0.1, i);
            }
            expect(scope.visibleWindow.beginIndex).toBe(58);

            scope.setTimeScaleFactor(8);
            expect(scope.visibleWindow.beginIndex).toBe(18);
            expect(scope.visibleWindow.timeTranslation).toBeCloseTo(1.9, 10);

            scope.append(10, 100);
            expect(scope.visibleWindow).toEqual({
                beginIndex: 19,
                endIndex: 100,
                timeTranslation: 2,
                minAmp: 19,
                maxAmp: 100,
                ampRange: 81,
            });
        });

        it('should merge partial config and export the changes', () => {
            const logger = createSilentLogger();
            const scope = new Oscilloscope(new CanvasTracePainter(), { logger });

            scope.configure({ strokeWidth: 3, unknown: true });

            expect(scope.exportConfig()).toEqual({ strokeWidth: 3 });
            expect(logger.warn).toHaveBeenCalledWith('Ignoring unknown scope config key "unknown"');
        });
    });

    describe('painting', () => {
        it('should count painted frames', () => {
            const scope = createScope();

            scope.paintFrame(new FakeCanvasContext());
            scope.paintFrame(new FakeCanvasContext());

            expect(scope.stats.framesPainted).toBe(2);
            expect(scope.stats.lastFrame?.measures[1].map(m => m.name)).toEqual(['background']);
        });

        it('should drop the frame of a failed paint', () => {
            let failing = true;
            const painter: TracePainter<string> = {
                paint: (_target, _trace, profiler) => {
                    profiler.startMeasure('trace');
                    if (failing) {
                        throw new Error('paint failed');
                    }
                    profiler.endMeasure();
                    return true;
                },
            };
            const scope = new Oscilloscope(painter, { logger: createSilentLogger() });

            expect(() => scope.paintFrame('target')).toThrow('paint failed');
            failing = false;

            expect(scope.paintFrame('target')).toBe(true);
            expect(scope.stats.framesPainted).toBe(1);
            expect(scope.stats.lastFrame?.measures[1].map(m => m.name)).toEqual(['trace']);
        });

        it('should paint continuously in loop mode while the surface lives', async () => {
            const scope = createScope();
            const ctx = new FakeCanvasContext();
            const surface = new FakeSurface<TraceCanvasContext>(() => ctx);
            const scheduler = new ManualScheduler();
            scope.attach(surface, { mode: 'loop', scheduleNext: scheduler.schedule });

            surface.ready({ width: 800, height: 400 });
            await scheduler.tick();
            surface.resize({ width: 400, height: 200 });
            await scheduler.tick();

            expect(surface.presented).toEqual([ctx, ctx]);
            expect(ctx.ops.filter(op => op.startsWith('translate'))).toEqual(['translate 0 400', 'translate 0 200']);

            const destroyed = surface.destroy();
            await scheduler.tick();
            await destroyed;
            await scheduler.tick();

            expect(surface.presented).toHaveLength(2);
            expect(scheduler.waiting).toBe(0);
        });

        it('should not start a loop in external mode', () => {
            const scope = createScope();
            const scheduler = new ManualScheduler();
            const surface = new FakeSurface<TraceCanvasContext>(() => new FakeCanvasContext());

            scope.attach(surface, { mode: 'external', scheduleNext: scheduler.schedule });
            surface.ready({ width: 4, height: 2 });

            expect(scheduler.waiting).toBe(0);
            expect(surface.acquisitions).toBe(0);
        });
    });

    describe('attach and release', () => {
        it('should refuse a second surface', () => {
            const scope = createScope();
            attachExternal(scope);

            expect(() => attachExternal(scope)).toThrow('Oscilloscope is already attached to a surface');
        });

        it('should detach and stop painting on release', async () => {
            const scope = createScope();
            const surface = attachExternal(scope);

            await scope.release();

            expect(surface.listenerCount).toBe(0);
            expect(scope.paintFrame(new FakeCanvasContext())).toBe(false);
            expect(() => attachExternal(scope)).toThrow('Cannot attach a released oscilloscope');
        });

        it('should wait for the loop and dispose the painter on release', async () => {
            const gl = new FakeGl();
            const painter = await GlTracePainter.create(gl, createMemoryShaderLoader(traceShaderSources), createSilentLogger());
            const scope = new Oscilloscope<GlDrawTarget>(painter, { logger: createSilentLogger() });
            const surface = new FakeSurface<GlDrawTarget>(() => ({ framebuffer: null }));
            const scheduler = new ManualScheduler();
            const dispose = vi.spyOn(painter, 'dispose');
            scope.attach(surface, { mode: 'loop', scheduleNext: scheduler.schedule });
            surface.ready({ width: 4, height: 2 });
            await scheduler.tick();

            const released = scope.release();
            expect(dispose).not.toHaveBeenCalled();
            await scheduler.tick();
            await released;

            expect(dispose).toHaveBeenCalledTimes(1);
            expect(gl.deleted).toContain('buffer');
            expect(gl.clears).toBe(1);
        });
    });
});
