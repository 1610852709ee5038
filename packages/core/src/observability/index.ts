export { getTracer, startSpan, endSpan, recordStage, SpanStatusCode } from './tracing.js';
export type { Span, StageAttributes } from './tracing.js';
