import { setImmediate } from 'node:timers/promises';
import { vi } from 'vitest';
import type { Logger, SurfaceSize } from '@tracescope/core';
import type { FrameScheduler } from './paintLoop';
import type { ShaderLoader } from './shaderLoader';
import type { DrawSurface, SurfaceListener } from './surface';

export function createSilentLogger(): Logger {
    return {
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    };
}

export function createMemoryShaderLoader(sources: Record<string, string>): ShaderLoader {
    return {
        loadText: async (resourceId: string) => {
            const text = sources[resourceId];
            if (text === undefined) {
                throw new Error(`No shader named ${resourceId}`);
            }
            return text;
        },
    };
}

export const traceShaderSources = {
    'trace.vert': 'vertex source',
    'trace.frag': 'fragment source',
};

export interface DrawCall {
    mode: number;
    first: number;
    count: number;
}

/** Records what a WebGL2 context was asked to do. */
export class FakeGl {
    readonly VERTEX_SHADER = 0x8B31;
    readonly FRAGMENT_SHADER = 0x8B30;
    readonly COMPILE_STATUS = 0x8B81;
    readonly LINK_STATUS = 0x8B82;
    readonly ACTIVE_UNIFORMS = 0x8B86;
    readonly ACTIVE_ATTRIBUTES = 0x8B89;
    readonly ARRAY_BUFFER = 0x8892;
    readonly FLOAT = 0x1406;
    readonly FRAMEBUFFER = 0x8D40;
    readonly COLOR_BUFFER_BIT = 0x4000;
    readonly DYNAMIC_DRAW = 0x88E8;
    readonly LINE_STRIP = 0x0003;

    compileSucceeds = true;
    linkSucceeds = true;
    bufferAvailable = true;
    activeUniforms = ['u_color'];
    activeAttributes = ['a_position'];

    readonly draws: DrawCall[] = [];
    readonly uploads: number[][] = [];
    readonly clearColors: number[][] = [];
    readonly colors: number[][] = [];
    readonly lineWidths: number[] = [];
    readonly viewports: number[][] = [];
    readonly attributePointers: (number | boolean)[][] = [];
    readonly deleted: string[] = [];
    clears = 0;

    createShader(_type: number): WebGLShader | null {
        return {};
    }

    shaderSource(_shader: WebGLShader, _source: string): void {}

    compileShader(_shader: WebGLShader): void {}

    getShaderParameter(_shader: WebGLShader, _pname: number): boolean {
        return this.compileSucceeds;
    }

    getShaderInfoLog(_shader: WebGLShader): string | null {
        return 'ERROR: 0:1: syntax error';
    }

    deleteShader(_shader: WebGLShader | null): void {
        this.deleted.push('shader');
    }

    createProgram(): WebGLProgram {
        return {};
    }

    attachShader(_program: WebGLProgram, _shader: WebGLShader): void {}

    linkProgram(_program: WebGLProgram): void {}

    getProgramParameter(_program: WebGLProgram, pname: number): boolean | number {
        if (pname === this.ACTIVE_UNIFORMS) return this.activeUniforms.length;
        if (pname === this.ACTIVE_ATTRIBUTES) return this.activeAttributes.length;
        return this.linkSucceeds;
    }

    getProgramInfoLog(_program: WebGLProgram): string | null {
        return 'link failed';
    }

    deleteProgram(_program: WebGLProgram | null): void {
        this.deleted.push('program');
    }

    getActiveUniform(_program: WebGLProgram, index: number): WebGLActiveInfo | null {
        const name = this.activeUniforms[index];
        return name === undefined ? null : { name, size: 1, type: 0x8B52 };
    }

    getUniformLocation(_program: WebGLProgram, _name: string): WebGLUniformLocation | null {
        return {};
    }

    getActiveAttrib(_program: WebGLProgram, index: number): WebGLActiveInfo | null {
        const name = this.activeAttributes[index];
        return name === undefined ? null : { name, size: 1, type: 0x8B50 };
    }

    getAttribLocation(_program: WebGLProgram, name: string): number {
        return this.activeAttributes.indexOf(name);
    }

    useProgram(_program: WebGLProgram | null): void {}

    createVertexArray(): WebGLVertexArrayObject {
        return {};
    }

    bindVertexArray(_vao: WebGLVertexArrayObject | null): void {}

    deleteVertexArray(_vao: WebGLVertexArrayObject | null): void {
        this.deleted.push('vertex-array');
    }

    createBuffer(): WebGLBuffer | null {
        return this.bufferAvailable ? {} : null;
    }

    deleteBuffer(_buffer: WebGLBuffer | null): void {
        this.deleted.push('buffer');
    }

    bindBuffer(_target: number, _buffer: WebGLBuffer | null): void {}

    bufferData(_target: number, data: unknown, _usage: number): void {
        if (data instanceof Float32Array) {
            this.uploads.push(Array.from(data));
        }
    }

    enableVertexAttribArray(_index: number): void {}

    vertexAttribPointer(index: number, size: number, type: number, normalized: boolean, stride: number, offset: number): void {
        this.attributePointers.push([index, size, type, normalized, stride, offset]);
    }

    uniform4f(_location: WebGLUniformLocation | null, x: number, y: number, z: number, w: number): void {
        this.colors.push([x, y, z, w]);
    }

    bindFramebuffer(_target: number, _framebuffer: WebGLFramebuffer | null): void {}

    viewport(x: number, y: number, width: number, height: number): void {
        this.viewports.push([x, y, width, height]);
    }

    clearColor(red: number, green: number, blue: number, alpha: number): void {
        this.clearColors.push([red, green, blue, alpha]);
    }

    clear(_mask: number): void {
        this.clears++;
    }

    lineWidth(width: number): void {
        this.lineWidths.push(width);
    }

    drawArrays(mode: number, first: number, count: number): void {
        this.draws.push({ mode, first, count });
    }
}

/** Records 2D canvas operations as short strings. */
export class FakeCanvasContext {
    fillStyle: string | CanvasGradient | CanvasPattern = '#000000';
    strokeStyle: string | CanvasGradient | CanvasPattern = '#000000';
    lineWidth = 1;
    lineCap: CanvasLineCap = 'butt';
    lineJoin: CanvasLineJoin = 'miter';

    readonly ops: string[] = [];
    readonly segments: number[][] = [];
    private pendingMove: number[] | null = null;

    save(): void {
        this.ops.push('save');
    }

    restore(): void {
        this.ops.push('restore');
    }

    translate(x: number, y: number): void {
        this.ops.push(`translate ${x} ${y}`);
    }

    scale(x: number, y: number): void {
        this.ops.push(`scale ${x} ${y}`);
    }

    clearRect(x: number, y: number, w: number, h: number): void {
        this.ops.push(`clearRect ${x} ${y} ${w} ${h}`);
    }

    fillRect(x: number, y: number, w: number, h: number): void {
        this.ops.push(`fillRect ${x} ${y} ${w} ${h} ${String(this.fillStyle)}`);
    }

    beginPath(): void {
        this.ops.push('beginPath');
    }

    moveTo(x: number, y: number): void {
        this.pendingMove = [x, y];
    }

    lineTo(x: number, y: number): void {
        if (this.pendingMove) {
            this.segments.push([...this.pendingMove, x, y]);
            this.pendingMove = null;
        }
    }

    stroke(): void {
        this.ops.push(`stroke ${String(this.strokeStyle)} ${this.lineWidth}`);
    }
}

/** A surface whose lifecycle events and targets are driven by the test. */
export class FakeSurface<TTarget> implements DrawSurface<TTarget> {
    private listeners: SurfaceListener[] = [];
    readonly presented: TTarget[] = [];
    acquisitions = 0;

    constructor(private nextTarget: () => TTarget | null) {}

    get listenerCount(): number {
        return this.listeners.length;
    }

    setTargetSource(nextTarget: () => TTarget | null): void {
        this.nextTarget = nextTarget;
    }

    acquireDrawTarget(): TTarget | null {
        this.acquisitions++;
        return this.nextTarget();
    }

    present(target: TTarget): void {
        this.presented.push(target);
    }

    subscribe(listener: SurfaceListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    ready(size: SurfaceSize): void {
        this.listeners.forEach(l => l.onReady(size));
    }

    resize(size: SurfaceSize): void {
        this.listeners.forEach(l => l.onResize(size));
    }

    async destroy(): Promise<void> {
        await Promise.all(this.listeners.map(l => l.onDestroyed()));
    }
}

/** Lets a test decide when each paint loop iteration may proceed. */
export class ManualScheduler {
    private pending: (() => void)[] = [];

    readonly schedule: FrameScheduler = () => new Promise<void>(resolve => {
        this.pending.push(resolve);
    });

    get waiting(): number {
        return this.pending.length;
    }

    /** Releases every waiting iteration and lets it run up to its next wait. */
    async tick(): Promise<void> {
        const resolvers = this.pending;
        this.pending = [];
        resolvers.forEach(resolve => resolve());
        await setImmediate();
    }
}
