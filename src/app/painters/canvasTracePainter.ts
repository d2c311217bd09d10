import { forEachSegment } from '@tracescope/core';
import type { FrameMeasurer } from '../renderProfiler';
import type { TracePainter, TraceView } from './tracePainter';

export type TraceCanvasContext = Pick<
    CanvasRenderingContext2D,
    | 'save'
    | 'restore'
    | 'translate'
    | 'scale'
    | 'clearRect'
    | 'fillRect'
    | 'beginPath'
    | 'moveTo'
    | 'lineTo'
    | 'stroke'
    | 'fillStyle'
    | 'strokeStyle'
    | 'lineWidth'
    | 'lineCap'
    | 'lineJoin'
>;

/**
 * Immediate-mode painter. Nothing is cached between frames: segments are walked
 * from the visible window on every paint, in a y-up coordinate system.
 */
export class CanvasTracePainter implements TracePainter<TraceCanvasContext> {
    paint(ctx: TraceCanvasContext, trace: TraceView, profiler: FrameMeasurer): boolean {
        const { store, scale, style } = trace;
        const { width, height } = scale;

        ctx.save();
        ctx.translate(0, height);
        ctx.scale(1, -1);

        profiler.startMeasure('background');
        ctx.clearRect(0, 0, width, height);
        if (style.backgroundColor !== null) {
            ctx.fillStyle = style.backgroundColor;
            ctx.fillRect(0, 0, width, height);
        }
        profiler.endMeasure();

        let segments = 0;
        if (store.size > 1 && scale.hasSurface) {
            profiler.startMeasure('trace');
            ctx.beginPath();
            segments = forEachSegment(store, trace.window, scale, (x0, y0, x1, y1) => {
                ctx.moveTo(x0, y0);
                ctx.lineTo(x1, y1);
            });
            ctx.strokeStyle = style.strokeColor;
            ctx.lineWidth = style.strokeWidth;
            ctx.lineJoin = 'round';
            ctx.lineCap = 'round';
            ctx.stroke();
            profiler.endMeasure();
        }

        ctx.restore();
        return segments > 0;
    }
}
