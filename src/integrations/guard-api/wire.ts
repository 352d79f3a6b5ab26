/**
 * Trace -> ingestion wire shape (ISO-8601 timestamps, nested arrays).
 */
import { SecuritySignal, Span, Trace } from '../../types';
import { spanDurationMs } from '../../tracing/spans';
import { SecuritySignalWire, SpanWire, TraceWire } from './types';

export function spanToWire(span: Span): SpanWire {
  return {
    span_id: span.span_id,
    parent_span_id: span.parent_span_id ?? null,
    name: span.name,
    type: span.type,
    start_time: span.start_time.toISOString(),
    end_time: span.end_time ? span.end_time.toISOString() : null,
    duration_ms: spanDurationMs(span),
    status: span.status,
    attributes: { ...span.attributes },
    events: span.events.map((event) => ({
      name: event.name,
      timestamp: event.timestamp.toISOString(),
      attributes: { ...event.attributes },
    })),
  };
}

export function signalToWire(signal: SecuritySignal): SecuritySignalWire {
  return {
    id: signal.id,
    type: signal.type,
    severity: signal.severity,
    title: signal.title,
    description: signal.description,
    evidence: { ...signal.evidence },
    timestamp: signal.timestamp.toISOString(),
    mitigated: signal.mitigated,
  };
}

export function traceToWire(trace: Trace): TraceWire {
  return {
    trace_id: trace.trace_id,
    agent_id: trace.agent_id,
    session_id: trace.session_id,
    user_id: trace.user_id ?? null,
    start_time: trace.start_time.toISOString(),
    end_time: trace.end_time ? trace.end_time.toISOString() : null,
    status: trace.status,
    spans: trace.spans.map(spanToWire),
    security_signals: trace.security_signals.map(signalToWire),
    metadata: { ...trace.metadata },
  };
}
