import { ScopeConfigurationError, type Rgba } from '@tracescope/core';

/** Every uniform of the trace shaders is a `vec4`. */
export type UniformValue = Rgba;

/** A tightly packed float attribute read from the start of its buffer. */
export type AttributeConfig = {
    buffer: WebGLBuffer;
    size: 1 | 2 | 3 | 4;
};

export type TypedProgramGl = Pick<
    WebGL2RenderingContext,
    | 'getProgramParameter'
    | 'getActiveUniform'
    | 'getUniformLocation'
    | 'getActiveAttrib'
    | 'getAttribLocation'
    | 'useProgram'
    | 'bindVertexArray'
    | 'createVertexArray'
    | 'deleteVertexArray'
    | 'bindBuffer'
    | 'enableVertexAttribArray'
    | 'vertexAttribPointer'
    | 'uniform4f'
    | 'ACTIVE_UNIFORMS'
    | 'ACTIVE_ATTRIBUTES'
    | 'ARRAY_BUFFER'
    | 'FLOAT'
>;

export class TypedVAO<TAttributes extends Record<string, AttributeConfig>> {
    constructor(
        private gl: TypedProgramGl,
        readonly vao: WebGLVertexArrayObject,
        readonly attributes: TAttributes
    ) {}

    delete(): void {
        this.gl.deleteVertexArray(this.vao);
    }
}

export class TypedProgram<
    TUniforms extends Record<string, UniformValue>,
    TAttributes extends Record<string, AttributeConfig>
> {
    private uniformLocations: Map<string, WebGLUniformLocation>;
    private attributeLocations: Map<string, number>;

    constructor(
        private gl: TypedProgramGl,
        public readonly program: WebGLProgram
    ) {
        this.uniformLocations = new Map();
        const numUniforms: number = gl.getProgramParameter(program, gl.ACTIVE_UNIFORMS);
        for (let i = 0; i < numUniforms; i++) {
            const info = gl.getActiveUniform(program, i);
            if (info) {
                const location = gl.getUniformLocation(program, info.name);
                if (location) this.uniformLocations.set(info.name, location);
            }
        }

        this.attributeLocations = new Map();
        const numAttributes: number = gl.getProgramParameter(program, gl.ACTIVE_ATTRIBUTES);
        for (let i = 0; i < numAttributes; i++) {
            const info = gl.getActiveAttrib(program, i);
            if (info) {
                this.attributeLocations.set(info.name, gl.getAttribLocation(program, info.name));
            }
        }
    }

    bind(uniforms: TUniforms, vao: TypedVAO<TAttributes>): void {
        const gl = this.gl;
        gl.useProgram(this.program);
        gl.bindVertexArray(vao.vao);

        const provided = new Map<string, UniformValue>();
        for (const name in uniforms) {
            provided.set(name, uniforms[name]);
        }

        for (const [name, location] of this.uniformLocations) {
            const value = provided.get(name);
            if (value === undefined) {
                throw new Error(`Uniform ${name} required by shader but not provided.`);
            }

            gl.uniform4f(location, value[0], value[1], value[2], value[3]);
        }
    }

    createVAO(attributes: TAttributes): TypedVAO<TAttributes> {
        const gl = this.gl;
        const vao = gl.createVertexArray();
        if (!vao) {
            throw new ScopeConfigurationError('Failed to create vertex array object');
        }
        gl.bindVertexArray(vao);

        for (const [name, location] of this.attributeLocations) {
            const config: AttributeConfig | undefined = attributes[name];
            if (!config) {
                throw new Error(`Attribute ${name} required by shader but not provided.`);
            }

            gl.bindBuffer(gl.ARRAY_BUFFER, config.buffer);
            gl.enableVertexAttribArray(location);
            gl.vertexAttribPointer(location, config.size, gl.FLOAT, false, 0, 0);
        }

        gl.bindVertexArray(null);
        return new TypedVAO(gl, vao, attributes);
    }

    unbind(): void {
        this.gl.bindVertexArray(null);
        this.gl.useProgram(null);
    }
}
