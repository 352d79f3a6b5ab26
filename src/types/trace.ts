/**
 * Trace and span model.
 *
 * A Trace is the full record of one agent invocation. It owns its spans and
 * security signals exclusively. Spans form a tree via parent_span_id and are
 * stored in creation order, not hierarchy order.
 */
import { SecuritySignal } from './signal';

export type SpanType = 'llm' | 'retrieval' | 'tool' | 'chain' | 'agent' | 'policy';

export type SpanStatus = 'running' | 'completed' | 'error';

export type TraceStatus = 'running' | 'completed' | 'failed';

/**
 * A point-in-time event recorded while a span is running.
 */
export interface SpanEvent {
  name: string;
  timestamp: Date;
  attributes: Record<string, unknown>;
}

/**
 * One timed operation inside a trace.
 */
export interface Span {
  /** Unique identifier for this span */
  span_id: string;
  /** Span that was on top of the stack when this one began; fixed at creation */
  parent_span_id?: string;
  name: string;
  type: SpanType;
  start_time: Date;
  /** Set when the span is closed */
  end_time?: Date;
  status: SpanStatus;
  attributes: Record<string, unknown>;
  events: SpanEvent[];
}

export interface Trace {
  trace_id: string;
  agent_id: string;
  session_id: string;
  user_id?: string;
  start_time: Date;
  end_time?: Date;
  status: TraceStatus;
  /** Creation order */
  spans: Span[];
  security_signals: SecuritySignal[];
  metadata: Record<string, unknown>;
}

/**
 * How a traced region ended. A failure carries whatever was thrown.
 */
export type Outcome = { ok: true } | { ok: false; error: unknown };

export const SUCCESS: Outcome = { ok: true };

export function failure(error: unknown): Outcome {
  return { ok: false, error };
}
