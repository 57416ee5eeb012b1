/**
 * Span helper: runs an async operation inside an OpenTelemetry span.
 *
 * The callback receives the active span so it can add result attributes
 * (counts, names) once they are known. Failures are recorded on the span
 * and re-thrown unchanged.
 */

import { type Span, SpanStatusCode, trace } from "@opentelemetry/api";
import type { SpanAttributes } from "./types.js";

export const TRACER_NAME = "feature-provisioner";

/**
 * Execute `fn` within a span named `name`.
 *
 * With no tracer provider registered, OTel hands out a no-op span and
 * `fn` runs exactly as it would without the wrapper.
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}
