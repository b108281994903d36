/**
 * Tracing utilities — thin wrapper around the OpenTelemetry API.
 *
 * No SDK is registered by this project; without one every span is a no-op,
 * so these helpers are safe to call unconditionally.
 */
import { trace, context, SpanStatusCode, type Span, type Tracer } from '@opentelemetry/api';

const TRACER_NAME = 'toolloop';

function getTracer(): Tracer {
  return trace.getTracer(TRACER_NAME);
}

/**
 * Wrap an async function in an OTel span.
 * Records errors and sets span status.
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = getTracer();
  return context.with(context.active(), () => {
    return tracer.startActiveSpan(name, { attributes }, async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: error instanceof Error ? error.message : String(error),
        });
        span.recordException(error instanceof Error ? error : new Error(String(error)));
        throw error;
      } finally {
        span.end();
      }
    });
  });
}
