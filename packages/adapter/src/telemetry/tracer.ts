import { trace, SpanStatusCode, type Attributes, type Span, type Tracer } from '@opentelemetry/api';
import type { Config } from '@/config';

let tracer: Tracer | null = null;

export const initTracer = (config: Config): Tracer => {
  tracer = trace.getTracer(config.telemetry.serviceName, config.telemetry.serviceVersion);
  return tracer;
};

export const getTracer = (): Tracer => {
  if (tracer) {
    return tracer;
  }
  return trace.getTracer('objectfs');
};

/**
 * Runs `fn` inside an active span; the span records the exception and is
 * marked as failed when `fn` rejects.
 */
export const withSpan = async <T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> => {
  return getTracer().startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof Error) {
        span.recordException(error);
      }
      throw error;
    } finally {
      span.end();
    }
  });
};
