/**
 * Span helpers for the bundle operations.
 * @module telemetry/tracing
 */

import { type Attributes, type Span, SpanStatusCode, trace } from "@opentelemetry/api";

export const TRACER_NAME = "codebundle";

/**
 * Run `fn` inside an active span so log entries written during it carry
 * its trace and span ids. Without a registered provider the span is a no-op.
 */
export function withSpan<T>(name: string, attributes: Attributes, fn: (span: Span) => T): T {
  return trace.getTracer(TRACER_NAME).startActiveSpan(name, { attributes }, (span) => {
    try {
      const result = fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      recordError(span, error);
      throw error;
    } finally {
      span.end();
    }
  });
}

function recordError(span: Span, error: unknown): void {
  span.setStatus({ code: SpanStatusCode.ERROR, message: String(error) });
  if (error instanceof Error) {
    span.recordException(error);
  } else {
    span.recordException(new Error(String(error)));
  }
}
