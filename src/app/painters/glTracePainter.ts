import {
    ScopeConfigurationError,
    buildLineStrip,
    emptyLineStrip,
    hexToRgba,
    type LineStrip,
    type Logger,
    type Rgba,
    type SurfaceSize,
} from '@tracescope/core';
import type { FrameMeasurer } from '../renderProfiler';
import { traceShaderIds, type ShaderLoader } from '../shaderLoader';
import { TypedProgram, type TypedProgramGl, type TypedVAO } from '../typedProgram';
import { compileProgram, type ShaderGl } from '../webGLUtils';
import type { TracePainter, TraceView } from './tracePainter';

export type TraceGl = ShaderGl & TypedProgramGl & Pick<
    WebGL2RenderingContext,
    | 'createBuffer'
    | 'deleteBuffer'
    | 'bufferData'
    | 'bindFramebuffer'
    | 'viewport'
    | 'clearColor'
    | 'clear'
    | 'lineWidth'
    | 'drawArrays'
    | 'FRAMEBUFFER'
    | 'COLOR_BUFFER_BIT'
    | 'DYNAMIC_DRAW'
    | 'LINE_STRIP'
>;

export interface GlDrawTarget {
    /** `null` draws into the default drawing buffer. */
    readonly framebuffer: WebGLFramebuffer | null;
}

type TraceUniforms = {
    u_color: Rgba;
};

type TraceAttributes = {
    a_position: { buffer: WebGLBuffer; size: 2 };
};

const transparent: Rgba = [0, 0, 0, 0];

/**
 * GPU painter drawing the visible window as one line strip.
 *
 * The vertex array is rebuilt in full on every {@link update} and uploaded on
 * the next paint. Without a valid program the painter only clears.
 */
export class GlTracePainter implements TracePainter<GlDrawTarget> {
    private strip: LineStrip = emptyLineStrip;
    private scratch = new Float32Array(0);
    private uploaded = true;
    private size: SurfaceSize = { width: 0, height: 0 };

    private constructor(
        private readonly gl: TraceGl,
        private readonly program: TypedProgram<TraceUniforms, TraceAttributes> | null,
        private readonly vao: TypedVAO<TraceAttributes> | null,
        private readonly vertexBuffer: WebGLBuffer
    ) {}

    static async create(gl: TraceGl, loader: ShaderLoader, logger: Logger = console): Promise<GlTracePainter> {
        const [vertexSource, fragmentSource] = await Promise.all([
            loader.loadText(traceShaderIds.vertex),
            loader.loadText(traceShaderIds.fragment),
        ]);

        const vertexBuffer = gl.createBuffer();
        if (!vertexBuffer) {
            throw new ScopeConfigurationError('Failed to create vertex buffer');
        }

        const compiled = compileProgram(gl, vertexSource, fragmentSource, logger);
        if (!compiled) {
            return new GlTracePainter(gl, null, null, vertexBuffer);
        }

        const program = new TypedProgram<TraceUniforms, TraceAttributes>(gl, compiled);
        const vao = program.createVAO({ a_position: { buffer: vertexBuffer, size: 2 } });
        return new GlTracePainter(gl, program, vao, vertexBuffer);
    }

    get hasProgram(): boolean {
        return this.program !== null;
    }

    /** The primitive the next paint draws. */
    get lineStrip(): LineStrip {
        return this.strip;
    }

    update(trace: TraceView): void {
        const { store, window, scale } = trace;
        this.strip = scale.hasSurface ? buildLineStrip(store, window, scale, this.scratch) : emptyLineStrip;
        if (this.strip.vertices.buffer !== this.scratch.buffer) {
            this.scratch = this.strip.vertices;
        }
        this.uploaded = false;
    }

    reset(): void {
        this.strip = emptyLineStrip;
        this.uploaded = false;
    }

    resize(size: SurfaceSize): void {
        this.size = { width: size.width, height: size.height };
    }

    paint(target: GlDrawTarget, trace: TraceView, profiler: FrameMeasurer): boolean {
        const gl = this.gl;
        const { style } = trace;

        gl.bindFramebuffer(gl.FRAMEBUFFER, target.framebuffer);
        gl.viewport(0, 0, this.size.width, this.size.height);

        profiler.startMeasure('background');
        const [r, g, b, a] = style.backgroundColor === null ? transparent : hexToRgba(style.backgroundColor);
        gl.clearColor(r, g, b, a);
        gl.clear(gl.COLOR_BUFFER_BIT);
        profiler.endMeasure();

        if (!this.program || !this.vao || this.strip.vertexCount === 0) {
            return false;
        }

        profiler.startMeasure('trace');
        if (!this.uploaded) {
            gl.bindBuffer(gl.ARRAY_BUFFER, this.vertexBuffer);
            gl.bufferData(gl.ARRAY_BUFFER, this.strip.vertices, gl.DYNAMIC_DRAW);
            gl.bindBuffer(gl.ARRAY_BUFFER, null);
            this.uploaded = true;
        }

        gl.lineWidth(style.strokeWidth);
        this.program.bind({ u_color: hexToRgba(style.strokeColor) }, this.vao);
        gl.drawArrays(gl.LINE_STRIP, 0, this.strip.vertexCount);
        this.program.unbind();
        profiler.endMeasure();

        return true;
    }

    dispose(): void {
        this.vao?.delete();
        if (this.program) {
            this.gl.deleteProgram(this.program.program);
        }
        this.gl.deleteBuffer(this.vertexBuffer);
        this.strip = emptyLineStrip;
    }
}
