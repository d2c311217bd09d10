import { readFile } from 'node:fs/promises';

export interface ShaderLoader {
    loadText(resourceId: string): Promise<string>;
}

export const traceShaderIds = {
    vertex: 'trace.vert',
    fragment: 'trace.frag',
} as const;

export const bundledShaderDirectory = new URL('./shaders/', import.meta.url);

/** Every line of the returned text, the last included, ends in CRLF. */
export function normalizeLineEndings(text: string): string {
    const lines = text.split(/\r?\n/);
    if (lines[lines.length - 1] === '') {
        lines.pop();
    }
    return lines.map(line => `${line}\r\n`).join('');
}

/** Reads `<resourceId>.glsl` from `directory`. */
export function createFileShaderLoader(directory: URL = bundledShaderDirectory): ShaderLoader {
    return {
        async loadText(resourceId: string): Promise<string> {
            const text = await readFile(new URL(`${resourceId}.glsl`, directory), 'utf8');
            return normalizeLineEndings(text);
        },
    };
}
