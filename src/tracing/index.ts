/**
 * Tracing
 *
 * Per-execution trace/span lifecycle:
 *
 * - Trace and span factories
 * - TraceRecorder (strict LIFO span stack, scoped withTrace/withSpan)
 * - Branch recorders for concurrent sibling spans
 * - Contract-violation errors
 */

export { TraceStateError, SpanStackError } from './errors';

export {
  createSpan,
  finalizeSpan,
  addSpanEvent,
  spanDurationMs,
  createTrace,
  finalizeTrace,
  sealTrace,
} from './spans';

export { TraceRecorder, OPEN_SPAN_ERROR } from './recorder';
export type { BeginTraceOptions } from './recorder';
