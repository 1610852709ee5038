import { trace, type Span, SpanStatusCode } from '@opentelemetry/api';

const TRACER_NAME = 'history-injector';

export function getTracer() {
  return trace.getTracer(TRACER_NAME);
}

export function startSpan(name: string, attributes?: Record<string, string | number>): Span {
  const tracer = getTracer();
  const span = tracer.startSpan(name);
  if (attributes) {
    for (const [key, value] of Object.entries(attributes)) {
      span.setAttribute(key, value);
    }
  }
  return span;
}

export function endSpan(span: Span, error?: Error): void {
  if (error) {
    span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    span.recordException(error);
  } else {
    span.setStatus({ code: SpanStatusCode.OK });
  }
  span.end();
}

export type StageAttributes = Record<string, string | number | boolean>;

/**
 * Marks a record reaching a pipeline stage on the message span. Events are
 * named `record.<stage>` and carry the record's index within the message.
 */
export function recordStage(span: Span, stage: string, index: number, attributes: StageAttributes = {}): void {
  span.addEvent(`record.${stage}`, { 'record.index': index, ...attributes });
}

export { SpanStatusCode } from '@opentelemetry/api';
export type { Span } from '@opentelemetry/api';
