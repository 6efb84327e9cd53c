import { SpanStatusCode, trace, type Span, type SpanAttributes, type Tracer } from "@opentelemetry/api";

import type { CoreInstrumentationOptions } from "./metrics.js";

export type CoreTracer = Tracer;

export const getCoreTracer = (options: CoreInstrumentationOptions = {}): Tracer =>
  trace.getTracerProvider().getTracer(options.name ?? "credential-core", options.version, { schemaUrl: options.schemaUrl });

/**
 * Runs `callback` inside an active span. A throw marks the span as failed, is recorded on it and
 * propagates unchanged.
 */
export const runWithSpan = <T>(
  tracer: Tracer,
  name: string,
  callback: (span: Span) => Promise<T> | T,
  attributes: SpanAttributes = {},
): Promise<T> =>
  tracer.startActiveSpan(name, { attributes }, async (span): Promise<T> => {
    try {
      const result = await callback(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      span.recordException(error instanceof Error ? error : message);
      throw error;
    } finally {
      span.end();
    }
  });

export { SpanStatusCode };
