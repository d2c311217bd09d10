export * from '@tracescope/core';
export { Oscilloscope, type AttachMode, type AttachOptions, type OscilloscopeOptions } from './oscilloscope';
export { PaintLoop, type FrameScheduler, type PaintLoopOptions, type PaintLoopState } from './paintLoop';
export { CanvasTracePainter, type TraceCanvasContext } from './painters/canvasTracePainter';
export { GlTracePainter, type GlDrawTarget, type TraceGl } from './painters/glTracePainter';
export type { TracePainter, TraceState, TraceStyle, TraceView } from './painters/tracePainter';
export { RenderProfiler, type FrameInfo, type FrameMeasurer, type MeasureInfo, type ReadOnlyRenderProfiler } from './renderProfiler';
export { bundledShaderDirectory, createFileShaderLoader, normalizeLineEndings, traceShaderIds, type ShaderLoader } from './shaderLoader';
export type { DrawSurface, SurfaceListener } from './surface';
export { compileProgram, createProgram, createShader, type ShaderGl, type ShaderStage } from './webGLUtils';
export { TypedProgram, TypedVAO, type AttributeConfig, type UniformValue } from './typedProgram';
