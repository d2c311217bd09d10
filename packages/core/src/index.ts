export { SampleStore, type Sample } from './sampleStore';
export { createInitialWindow, selectVisibleWindow, visibleCount, type VisibleWindow } from './visibleWindow';
export { ScaleState, ampToPx, pxToPlane, timeToPx, type SurfaceSize } from './coordinateTransform';
export { buildLineStrip, emptyLineStrip, forEachSegment, type LineStrip, type SegmentSink } from './traceGeometry';
export { Guarded } from './guarded';
export { hexToRgba, type Rgba } from './color';
export {
    Finite,
    HexColor,
    Positive,
    decodeScopeConfig,
    defaultScopeConfig,
    isScopeConfigKey,
    scopeConfigSchema,
    type ScopeConfig,
    type ScopeConfigKey,
} from './scopeConfig';
export { ScopeConfigManager, type ConfigChangeCallback, type Logger } from './scopeConfigManager';
export { InvalidSampleOrderError, ScopeConfigurationError, ScopeLockError, ShaderCompileError } from './errors';
