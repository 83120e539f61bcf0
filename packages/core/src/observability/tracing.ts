import { trace, type Span, SpanStatusCode } from '@opentelemetry/api';

const TRACER_NAME = 'cohort-match';

function getTracer() {
  return trace.getTracer(TRACER_NAME);
}

function startSpan(name: string, attributes?: Record<string, string>): Span {
  const tracer = getTracer();
  const span = tracer.startSpan(name);
  if (attributes) {
    for (const [key, value] of Object.entries(attributes)) {
      span.setAttribute(key, value);
    }
  }
  return span;
}

function endSpan(span: Span, error?: Error): void {
  if (error) {
    span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    span.recordException(error);
  } else {
    span.setStatus({ code: SpanStatusCode.OK });
  }
  span.end();
}

/**
 * Run a synchronous step inside a span, recording any thrown error.
 */
export function withSpan<T>(name: string, attributes: Record<string, string>, fn: () => T): T {
  const span = startSpan(name, attributes);
  try {
    const result = fn();
    endSpan(span);
    return result;
  } catch (err) {
    endSpan(span, err instanceof Error ? err : new Error(String(err)));
    throw err;
  }
}
