export class ScopeConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ScopeConfigurationError';
    }
}

export class ShaderCompileError extends Error {
    constructor(readonly stage: 'vertex-shader' | 'fragment-shader' | 'link', readonly infoLog: string) {
        super(stage === 'link' ? `Program linking error: ${infoLog}` : `Shader compilation error (${stage}): ${infoLog}`);
        this.name = 'ShaderCompileError';
    }
}

export class InvalidSampleOrderError extends Error {
    constructor(readonly time: number, readonly previousTime: number) {
        super(`Sample time ${time} precedes previous sample time ${previousTime}`);
        this.name = 'InvalidSampleOrderError';
    }
}

export class ScopeLockError extends Error {
    constructor() {
        super('Scope state is already locked by the current call stack');
        this.name = 'ScopeLockError';
    }
}
