/**
 * OpenTelemetry tracing helpers
 *
 * Only the API package is used here. Without a registered SDK every tracer is
 * a no-op, so the helpers are safe to call in tests and in development; an
 * SDK can be registered by the host process (e.g. via `--import`) to export
 * spans.
 */

import { trace, context, SpanStatusCode } from '@opentelemetry/api';
import type { Span, Tracer, SpanOptions } from '@opentelemetry/api';

import type { Result } from './types/result.js';

/**
 * Get a tracer for a specific component
 */
export function getTracer(name: string, version = '0.1.0'): Tracer {
  return trace.getTracer(name, version);
}

/**
 * Span attribute keys for the school registry
 */
export const SpanAttributes = {
  SCHOOL_ID: 'school.id',
  SCHOOL_OPERATION: 'school.operation',
  RESULT_ERROR_CODE: 'result.error_code',
  GATEWAY_POOL: 'gateway.pool',
  GATEWAY_TARGET: 'gateway.target',
  CORRELATION_ID: 'correlation_id',
} as const;

export type SpanAttributeOptions = SpanOptions & { correlationId?: string };

/**
 * Start a span, tagging it with the correlation id when one is given
 */
export function createSpan(tracer: Tracer, name: string, options: SpanAttributeOptions = {}): Span {
  const { correlationId, ...spanOptions } = options;
  const span = tracer.startSpan(name, spanOptions);

  if (correlationId) {
    span.setAttribute(SpanAttributes.CORRELATION_ID, correlationId);
  }

  return span;
}

/**
 * Execute a Result-returning function within a span
 *
 * An Err result marks the span as failed and records the error code; the
 * result itself is returned unchanged.
 */
export async function withResultSpan<T, E extends { readonly code: string }>(
  tracer: Tracer,
  name: string,
  fn: (span: Span) => Promise<Result<T, E>>,
  options: SpanAttributeOptions = {}
): Promise<Result<T, E>> {
  const span = createSpan(tracer, name, options);

  try {
    const result = await context.with(trace.setSpan(context.active(), span), () => fn(span));
    if (result._tag === 'Err') {
      span.setAttribute(SpanAttributes.RESULT_ERROR_CODE, result.error.code);
      span.setStatus({ code: SpanStatusCode.ERROR, message: result.error.code });
    } else {
      span.setStatus({ code: SpanStatusCode.OK });
    }
    return result;
  } catch (error) {
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: error instanceof Error ? error.message : 'Unknown error',
    });
    span.recordException(error instanceof Error ? error : new Error(String(error)));
    throw error;
  } finally {
    span.end();
  }
}

export { SpanStatusCode } from '@opentelemetry/api';
export type { Span, Tracer, SpanOptions } from '@opentelemetry/api';
