/**
 * Tracing - Trace Recorder
 *
 * Manages the lifecycle of one Trace and its span stack for a single logical
 * execution. A recorder is never shared between unrelated invocations: each
 * invocation constructs its own and passes it down the call chain, so two
 * agent calls running concurrently cannot write into each other's trace.
 */
import { Outcome, SecuritySignal, Span, SpanType, SUCCESS, Trace, failure } from '../types';
import { describeError } from '../utils/errors';
import { recordSignal, recordSpanDuration, recordTraceFinished } from '../utils/metrics';
import logger from '../utils/logger';
import { TraceStateError, SpanStackError } from './errors';
import { createSpan, createTrace, finalizeSpan, finalizeTrace, sealTrace, spanDurationMs } from './spans';

export const OPEN_SPAN_ERROR = 'span still open when trace ended';

export interface BeginTraceOptions {
  sessionId: string;
  userId?: string;
  metadata?: Record<string, unknown>;
}

/**
 * The trace binding shared by a root recorder and its branches.
 */
interface TraceBinding {
  trace?: Trace;
}

export class TraceRecorder {
  private readonly stack: Span[] = [];

  constructor(
    readonly agentId: string,
    private readonly binding: TraceBinding = {},
    private readonly root: boolean = true,
    private readonly baseParentId?: string,
  ) {}

  /**
   * The trace this execution is currently recording into, if any.
   */
  get currentTrace(): Trace | undefined {
    return this.binding.trace;
  }

  /**
   * Top of this recorder's span stack.
   */
  get activeSpan(): Span | undefined {
    return this.stack[this.stack.length - 1];
  }

  get depth(): number {
    return this.stack.length;
  }

  beginTrace(options: BeginTraceOptions): Trace {
    if (!this.root) {
      throw new TraceStateError('A branch recorder cannot begin a trace');
    }
    if (this.binding.trace) {
      throw new TraceStateError('A trace is already active for this execution', {
        trace_id: this.binding.trace.trace_id,
      });
    }

    const trace = createTrace({
      agentId: this.agentId,
      sessionId: options.sessionId,
      userId: options.userId,
      metadata: options.metadata,
    });
    this.binding.trace = trace;
    this.stack.length = 0;

    logger.info(
      { trace_id: trace.trace_id, agent_id: trace.agent_id, session_id: trace.session_id },
      'Trace started',
    );

    return trace;
  }

  /**
   * Finalize the current trace. Spans left open are closed with status
   * 'error' so that none survives as 'running'; the trace is still finalized
   * and sealed, and the stack violation is then reported as SpanStackError.
   */
  endTrace(trace: Trace, outcome: Outcome): Trace {
    if (!this.root) {
      throw new TraceStateError('Only the root recorder may end the trace', {
        trace_id: trace.trace_id,
      });
    }
    if (this.binding.trace !== trace) {
      throw new TraceStateError(`Trace ${trace.trace_id} is not the current trace`, {
        trace_id: trace.trace_id,
        status: trace.status,
      });
    }

    const openSpans = trace.spans.filter((span) => span.status === 'running');
    for (const span of openSpans) {
      this.closeSpan(span, 'error', OPEN_SPAN_ERROR);
    }
    this.stack.length = 0;

    if (!outcome.ok) {
      finalizeTrace(trace, 'failed', describeError(outcome.error));
    } else if (openSpans.length > 0) {
      finalizeTrace(trace, 'failed', `${openSpans.length} span(s) still open when trace ended`);
    } else {
      finalizeTrace(trace, 'completed');
    }

    this.binding.trace = undefined;
    sealTrace(trace);
    recordTraceFinished(trace.status);

    logger.info(
      {
        trace_id: trace.trace_id,
        status: trace.status,
        spans: trace.spans.length,
        security_signals: trace.security_signals.length,
      },
      'Trace finished',
    );

    if (openSpans.length > 0) {
      throw new SpanStackError(`Trace ended with ${openSpans.length} open span(s)`, {
        trace_id: trace.trace_id,
        span_ids: openSpans.map((span) => span.span_id),
      });
    }

    return trace;
  }

  beginSpan(name: string, type: SpanType, attributes?: Record<string, unknown>): Span {
    const parentSpanId = this.activeSpan?.span_id ?? this.baseParentId;
    const span = createSpan(name, type, parentSpanId, attributes);

    this.stack.push(span);
    this.binding.trace?.spans.push(span);

    logger.debug(
      { span_id: span.span_id, parent_span_id: parentSpanId, name, type },
      'Span started',
    );

    return span;
  }

  /**
   * Close the top span. Stack discipline is strict LIFO: anything other than
   * the current top is rejected and the stack is left untouched.
   */
  endSpan(span: Span, outcome: Outcome): Span {
    const top = this.activeSpan;
    if (top !== span) {
      throw new SpanStackError(`Span ${span.span_id} is not the top of the span stack`, {
        span_id: span.span_id,
        top_span_id: top?.span_id,
      });
    }

    this.stack.pop();

    if (span.status !== 'running') {
      throw new SpanStackError(`Span ${span.span_id} was already closed`, {
        span_id: span.span_id,
        status: span.status,
      });
    }

    if (outcome.ok) {
      this.closeSpan(span, 'completed');
    } else {
      this.closeSpan(span, 'error', describeError(outcome.error));
    }
    return span;
  }

  /**
   * Run `fn` inside a span that is closed on every exit path. Whatever `fn`
   * throws is re-thrown unchanged once the span is closed.
   */
  async withSpan<T>(
    name: string,
    type: SpanType,
    fn: (span: Span) => Promise<T> | T,
    attributes?: Record<string, unknown>,
  ): Promise<T> {
    const span = this.beginSpan(name, type, attributes);
    let result: T;
    try {
      result = await fn(span);
    } catch (error) {
      closeAfterFailure(() => this.endSpan(span, failure(error)), error);
      throw error;
    }
    this.endSpan(span, SUCCESS);
    return result;
  }

  /**
   * Run `fn` inside a trace that is ended exactly once on every exit path.
   */
  async withTrace<T>(options: BeginTraceOptions, fn: (trace: Trace) => Promise<T> | T): Promise<T> {
    const trace = this.beginTrace(options);
    let result: T;
    try {
      result = await fn(trace);
    } catch (error) {
      closeAfterFailure(() => this.endTrace(trace, failure(error)), error);
      throw error;
    }
    this.endTrace(trace, SUCCESS);
    return result;
  }

  /**
   * A recorder for a concurrent sibling branch: it appends to the same trace
   * but owns its own stack, rooted at this recorder's current top span.
   */
  branch(): TraceRecorder {
    return new TraceRecorder(
      this.agentId,
      this.binding,
      false,
      this.activeSpan?.span_id ?? this.baseParentId,
    );
  }

  /**
   * Attach a signal to the current trace. Returns false when no trace is
   * active, in which case the signal is dropped.
   */
  addSignal(signal: SecuritySignal): boolean {
    const trace = this.binding.trace;
    if (!trace) {
      logger.debug({ signal_type: signal.type }, 'No active trace, security signal dropped');
      return false;
    }
    trace.security_signals.push(signal);
    recordSignal(signal.type, signal.severity);
    return true;
  }

  private closeSpan(span: Span, status: 'completed' | 'error', error?: string): void {
    finalizeSpan(span, status, error);
    recordSpanDuration(span.type, span.status, spanDurationMs(span));

    logger.debug(
      { span_id: span.span_id, status: span.status, duration_ms: spanDurationMs(span) },
      'Span finished',
    );
  }
}

/**
 * Bookkeeping on a failure path must not replace the original failure.
 */
function closeAfterFailure(close: () => unknown, original: unknown): void {
  try {
    close();
  } catch (bookkeepingError) {
    logger.error(
      { error: describeError(bookkeepingError), original_error: describeError(original) },
      'Trace bookkeeping failed while unwinding',
    );
  }
}
