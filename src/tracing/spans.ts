/**
 * Tracing - Span and Trace Factory Functions
 *
 * Helpers to create, finalize, and seal spans and traces. These are plain
 * data operations; stack discipline lives in TraceRecorder.
 */
import { v4 as uuidv4 } from 'uuid';
import { Span, SpanStatus, SpanType, Trace, TraceStatus } from '../types';

/**
 * Create a running span.
 *
 * @param parentSpanId - The span on top of the stack, if any
 */
export function createSpan(
  name: string,
  type: SpanType,
  parentSpanId?: string,
  attributes: Record<string, unknown> = {},
): Span {
  return {
    span_id: uuidv4(),
    ...(parentSpanId !== undefined && { parent_span_id: parentSpanId }),
    name,
    type,
    start_time: new Date(),
    status: 'running',
    attributes: { ...attributes },
    events: [],
  };
}

/**
 * Finalize a span by setting its end time and status.
 *
 * @param error - Failure description, recorded as attributes.error
 */
export function finalizeSpan(
  span: Span,
  status: Exclude<SpanStatus, 'running'>,
  error?: string,
  endTime: Date = new Date(),
): Span {
  span.end_time = endTime;
  span.status = status;
  if (error !== undefined) {
    span.attributes.error = error;
  }
  return span;
}

/**
 * Record a point-in-time event on a running span.
 */
export function addSpanEvent(
  span: Span,
  name: string,
  attributes: Record<string, unknown> = {},
): void {
  span.events.push({ name, timestamp: new Date(), attributes });
}

/**
 * Elapsed milliseconds, or 0 while the span is still open.
 */
export function spanDurationMs(span: Span): number {
  if (!span.end_time) {
    return 0;
  }
  return span.end_time.getTime() - span.start_time.getTime();
}

export function createTrace(params: {
  agentId: string;
  sessionId: string;
  userId?: string;
  metadata?: Record<string, unknown>;
}): Trace {
  return {
    trace_id: uuidv4(),
    agent_id: params.agentId,
    session_id: params.sessionId,
    ...(params.userId !== undefined && { user_id: params.userId }),
    start_time: new Date(),
    status: 'running',
    spans: [],
    security_signals: [],
    metadata: { ...params.metadata },
  };
}

export function finalizeTrace(
  trace: Trace,
  status: Exclude<TraceStatus, 'running'>,
  error?: string,
): Trace {
  trace.end_time = new Date();
  trace.status = status;
  if (error !== undefined) {
    trace.metadata.error = error;
  }
  return trace;
}

/**
 * Freeze a finalized trace for handoff to exporters. Signal objects stay
 * writable so that `mitigated` can still be flipped.
 */
export function sealTrace(trace: Trace): Readonly<Trace> {
  for (const span of trace.spans) {
    Object.freeze(span.attributes);
    Object.freeze(span.events);
    Object.freeze(span);
  }
  Object.freeze(trace.spans);
  Object.freeze(trace.security_signals);
  Object.freeze(trace.metadata);
  return Object.freeze(trace);
}
