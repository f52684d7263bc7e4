/**
 * Layer 18: Telemetry & Observability
 *
 * Responsibilities:
 * - Structured logging (JSON or pretty)
 * - Spans around dispatch and storage statements
 */

export {
  Logger,
  getLogger,
  setLogger,
  createLogger,
  formatPretty,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './logger.ts';

export {
  isOTELEnabled,
  getOTELTracer,
  withSpan,
  withSpanSync,
  withDbSpan,
  SpanKind,
  SpanStatusCode,
  type CreateSpanOptions,
  type Span,
  type Attributes,
} from './otel.ts';
