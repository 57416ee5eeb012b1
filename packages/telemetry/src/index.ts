/**
 * @provisioner/telemetry: OpenTelemetry tracing helpers.
 *
 * Registering a tracer provider is left to the host process; without one
 * every span is a no-op.
 */

export { SpanStatusCode, trace } from "@opentelemetry/api";
export { TRACER_NAME, withSpan } from "./span-helpers.js";
export type { SpanAttributes, SpanAttributeValue } from "./types.js";
