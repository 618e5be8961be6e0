/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Wraps dispatches and task waits in spans when the host application has
 * registered a tracer provider. No-op by default.
 *
 * Enable via environment variables:
 * - OTEL_ENABLED=1
 */

import { trace, SpanStatusCode, SpanKind, Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'hosted-search-client';

/**
 * Check if OpenTelemetry is enabled
 */
export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Generate a unique correlation ID for request tracing
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 * @returns Result of fn
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err.message,
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Create a span for one logical dispatch (all attempts)
 */
export async function withDispatchSpan<T>(
  method: string,
  hostClass: string,
  path: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Dispatch ${method}`, fn, {
    'http.method': method,
    'search.host_class': hostClass,
    'search.path': path,
    'span.kind': SpanKind.CLIENT,
  });
}

export async function withTaskSpan<T>(
  indexName: string,
  taskID: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan('Task wait', fn, {
    'search.index': indexName,
    'search.task_id': taskID,
  });
}
