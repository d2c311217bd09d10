import { ShaderCompileError, type Logger } from '@tracescope/core';

export type ShaderGl = Pick<
    WebGL2RenderingContext,
    | 'createShader'
    | 'shaderSource'
    | 'compileShader'
    | 'getShaderParameter'
    | 'getShaderInfoLog'
    | 'deleteShader'
    | 'createProgram'
    | 'attachShader'
    | 'linkProgram'
    | 'getProgramParameter'
    | 'getProgramInfoLog'
    | 'deleteProgram'
    | 'VERTEX_SHADER'
    | 'FRAGMENT_SHADER'
    | 'COMPILE_STATUS'
    | 'LINK_STATUS'
>;

export type ShaderStage = 'fragment-shader' | 'vertex-shader';

export function createShader(gl: ShaderGl, type: ShaderStage, source: string): WebGLShader {
    const shader = gl.createShader(type === 'fragment-shader' ? gl.FRAGMENT_SHADER : gl.VERTEX_SHADER);
    if (!shader) {
        throw new ShaderCompileError(type, 'Failed to create WebGL shader');
    }

    gl.shaderSource(shader, source);
    gl.compileShader(shader);

    if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
        const err = gl.getShaderInfoLog(shader) ?? '';
        gl.deleteShader(shader);
        throw new ShaderCompileError(type, err);
    }

    return shader;
}

export function createProgram(gl: ShaderGl, vertexShader: WebGLShader, fragmentShader: WebGLShader): WebGLProgram {
    const program = gl.createProgram();
    if (!program) {
        throw new ShaderCompileError('link', 'Failed to create WebGL program');
    }

    gl.attachShader(program, vertexShader);
    gl.attachShader(program, fragmentShader);
    gl.linkProgram(program);

    if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
        const err = gl.getProgramInfoLog(program) ?? '';
        gl.deleteProgram(program);
        throw new ShaderCompileError('link', err);
    }

    return program;
}

/**
 * Compiles and links a program from two shader sources.
 *
 * Returns `null` when any stage fails; the failure is logged, never thrown.
 */
export function compileProgram(
    gl: ShaderGl,
    vertexSource: string,
    fragmentSource: string,
    logger: Logger = console
): WebGLProgram | null {
    let vertexShader: WebGLShader | null = null;
    let fragmentShader: WebGLShader | null = null;
    try {
        vertexShader = createShader(gl, 'vertex-shader', vertexSource);
        fragmentShader = createShader(gl, 'fragment-shader', fragmentSource);
        return createProgram(gl, vertexShader, fragmentShader);
    } catch (error) {
        if (error instanceof ShaderCompileError) {
            logger.error(error.message);
            return null;
        }
        throw error;
    } finally {
        // A linked program keeps its shaders alive; the handles are no longer needed.
        if (vertexShader) gl.deleteShader(vertexShader);
        if (fragmentShader) gl.deleteShader(fragmentShader);
    }
}
