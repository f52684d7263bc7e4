/**
 * OpenTelemetry Integration
 *
 * Span helpers for dispatch and storage operations. Spans go through
 * the global `@opentelemetry/api` tracer, so they are recorded only when
 * the host process registers an SDK and sets OTEL_ENABLED=true.
 *
 * @module
 */

import {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  INVALID_SPAN_CONTEXT,
  type Tracer,
  type Span,
  type Attributes,
} from '@opentelemetry/api';

/**
 * Check if OpenTelemetry is enabled via OTEL_ENABLED
 */
export function isOTELEnabled(): boolean {
  return process.env.OTEL_ENABLED === 'true';
}

/** Cached tracer instance */
let _tracer: Tracer | undefined;

/**
 * Get the OpenTelemetry tracer for the framework
 *
 * @param name - Tracer name (default: 'trellis')
 * @param version - Tracer version (default: '0.1.0')
 */
export function getOTELTracer(name = 'trellis', version = '0.1.0'): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(name, version);
  }
  return _tracer;
}

/**
 * Options for creating a new span
 */
export interface CreateSpanOptions {
  /** Span kind (default: INTERNAL) */
  kind?: SpanKind;
  /** Initial attributes */
  attributes?: Attributes;
}

/**
 * Create a new span and run an async function within its context.
 * The span is ended when the function settles.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {},
): Promise<T> {
  if (!isOTELEnabled()) {
    return await fn(trace.wrapSpanContext(INVALID_SPAN_CONTEXT));
  }

  return getOTELTracer().startActiveSpan(
    name,
    { kind: options.kind ?? SpanKind.INTERNAL, attributes: options.attributes },
    context.active(),
    async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        recordError(span, error);
        throw error;
      } finally {
        span.end();
      }
    },
  );
}

/**
 * Create a new span and run a synchronous function within it
 */
export function withSpanSync<T>(
  name: string,
  fn: (span: Span) => T,
  options: CreateSpanOptions = {},
): T {
  if (!isOTELEnabled()) {
    return fn(trace.wrapSpanContext(INVALID_SPAN_CONTEXT));
  }

  const span = getOTELTracer().startSpan(name, {
    kind: options.kind ?? SpanKind.INTERNAL,
    attributes: options.attributes,
  });

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
}

/**
 * Create a database statement span
 *
 * @param operation - Statement shape (select, insert, update, begin...)
 * @param table - Table the statement targets, if any
 */
export function withDbSpan<T>(
  operation: string,
  table: string | undefined,
  fn: (span: Span) => T,
): T {
  const attributes: Attributes = {
    'db.system': 'sqlite',
    'db.operation': operation,
  };
  if (table) {
    attributes['db.sql.table'] = table;
  }

  return withSpanSync(`db.${operation}`, fn, { kind: SpanKind.CLIENT, attributes });
}

function recordError(span: Span, error: unknown): void {
  const exception = error instanceof Error ? error : new Error(String(error));
  span.recordException(exception);
  span.setStatus({ code: SpanStatusCode.ERROR, message: exception.message });
}

export { SpanKind, SpanStatusCode, type Span, type Attributes };
