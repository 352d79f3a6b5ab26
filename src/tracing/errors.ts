/**
 * Tracing - Error Classes
 *
 * Contract violations in the trace/span lifecycle. These indicate a bug in the
 * caller, never a runtime condition, and are never silently corrected.
 */
import { GuardError } from '../utils/errors';

/**
 * Thrown when a trace is begun, ended or written to out of order
 * (a second trace while one is current, ending a trace twice, ...).
 */
export class TraceStateError extends GuardError {
  constructor(message: string, details?: unknown) {
    super(message, 'TRACE_STATE_ERROR', 500, details);
    this.name = 'TraceStateError';
  }
}

/**
 * Thrown when span stack discipline is broken: closing a span that is not
 * the top of the stack, or ending a trace with spans still open.
 */
export class SpanStackError extends GuardError {
  constructor(message: string, details?: unknown) {
    super(message, 'SPAN_STACK_ERROR', 500, details);
    this.name = 'SpanStackError';
  }
}
