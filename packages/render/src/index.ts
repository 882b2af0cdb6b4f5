// ANSI utilities
export { ANSIBuilder } from './ansi/builder.js';
export * from './ansi/codes.js';
export * from './ansi/colors.js';
export { styleCode, fg } from './ansi/style.js';

// Span buffer
export { Span, type SpanView } from './buffer/span.js';
export { Layer } from './buffer/layer.js';
export { glyphWidth, cellText } from './buffer/glyph-width.js';

// Canvas
export { Canvas, CanvasConfigError, type CanvasConfig } from './canvas/canvas.js';

// Renderer
export { SpanRenderer, type EncodedFrame } from './renderer/span-renderer.js';
export { FrameStats, type FrameSample, type FrameStatsSnapshot } from './stats/frame-stats.js';

// Transport (backpressure handling)
export { OutputPump, type OutputPumpMetrics } from './transport/output-pump.js';
