import { SUCCESS, Trace, failure } from '../../types';
import { createSignal } from '../../detection/signals';
import { SpanStackError, TraceStateError } from '../errors';
import { OPEN_SPAN_ERROR, TraceRecorder } from '../recorder';

describe('TraceRecorder', () => {
  let recorder: TraceRecorder;

  beforeEach(() => {
    recorder = new TraceRecorder('agent-1');
  });

  describe('beginTrace', () => {
    it('should create a running trace bound to the recorder', () => {
      const trace = recorder.beginTrace({ sessionId: 'session-1', userId: 'user-1', metadata: { input: 'hi' } });

      expect(trace.agent_id).toBe('agent-1');
      expect(trace.session_id).toBe('session-1');
      expect(trace.user_id).toBe('user-1');
      expect(trace.status).toBe('running');
      expect(trace.spans).toEqual([]);
      expect(trace.security_signals).toEqual([]);
      expect(trace.metadata).toEqual({ input: 'hi' });
      expect(recorder.currentTrace).toBe(trace);
    });

    it('should reject a second trace while one is active', () => {
      recorder.beginTrace({ sessionId: 'session-1' });

      expect(() => recorder.beginTrace({ sessionId: 'session-2' })).toThrow(TraceStateError);
    });

    it('should reject beginTrace on a branch recorder', () => {
      recorder.beginTrace({ sessionId: 'session-1' });
      const branch = recorder.branch();

      expect(() => branch.beginTrace({ sessionId: 'session-2' })).toThrow(TraceStateError);
    });
  });

  describe('span stack', () => {
    it('should parent each span to the span on top of the stack', () => {
      const trace = recorder.beginTrace({ sessionId: 'session-1' });
      const outer = recorder.beginSpan('outer', 'agent');
      const inner = recorder.beginSpan('inner', 'tool');

      expect(outer.parent_span_id).toBeUndefined();
      expect(inner.parent_span_id).toBe(outer.span_id);
      expect(recorder.activeSpan).toBe(inner);
      expect(recorder.depth).toBe(2);
      expect(trace.spans).toEqual([outer, inner]);
    });

    it('should close spans in LIFO order', () => {
      recorder.beginTrace({ sessionId: 'session-1' });
      const outer = recorder.beginSpan('outer', 'agent');
      const inner = recorder.beginSpan('inner', 'tool');

      recorder.endSpan(inner, SUCCESS);
      recorder.endSpan(outer, SUCCESS);

      expect(inner.status).toBe('completed');
      expect(outer.status).toBe('completed');
      expect(inner.end_time).toBeInstanceOf(Date);
      expect(recorder.depth).toBe(0);
    });

    it('should reject ending a span that is not on top and leave the stack untouched', () => {
      recorder.beginTrace({ sessionId: 'session-1' });
      const outer = recorder.beginSpan('outer', 'agent');
      const inner = recorder.beginSpan('inner', 'tool');

      expect(() => recorder.endSpan(outer, SUCCESS)).toThrow(SpanStackError);
      expect(recorder.activeSpan).toBe(inner);
      expect(recorder.depth).toBe(2);
      expect(outer.status).toBe('running');
    });

    it('should record the failure description on an errored span', () => {
      recorder.beginTrace({ sessionId: 'session-1' });
      const span = recorder.beginSpan('call', 'llm');

      recorder.endSpan(span, failure(new Error('model overloaded')));

      expect(span.status).toBe('error');
      expect(span.attributes.error).toBe('model overloaded');
    });

    it('should record spans without a trace when none is active', () => {
      const span = recorder.beginSpan('detached', 'chain');
      recorder.endSpan(span, SUCCESS);

      expect(span.status).toBe('completed');
      expect(recorder.currentTrace).toBeUndefined();
    });
  });

  describe('endTrace', () => {
    it('should complete and seal a trace whose spans are all closed', () => {
      const trace = recorder.beginTrace({ sessionId: 'session-1' });
      const span = recorder.beginSpan('step', 'chain');
      recorder.endSpan(span, SUCCESS);

      recorder.endTrace(trace, SUCCESS);

      expect(trace.status).toBe('completed');
      expect(trace.end_time).toBeInstanceOf(Date);
      expect(recorder.currentTrace).toBeUndefined();
      expect(Object.isFrozen(trace)).toBe(true);
      expect(Object.isFrozen(trace.spans)).toBe(true);
      expect(Object.isFrozen(span)).toBe(true);
    });

    it('should mark the trace failed with the error description', () => {
      const trace = recorder.beginTrace({ sessionId: 'session-1' });

      recorder.endTrace(trace, failure(new Error('agent crashed')));

      expect(trace.status).toBe('failed');
      expect(trace.metadata.error).toBe('agent crashed');
    });

    it('should close open spans, fail the trace and report the stack violation', () => {
      const trace = recorder.beginTrace({ sessionId: 'session-1' });
      const open = recorder.beginSpan('forgotten', 'tool');

      expect(() => recorder.endTrace(trace, SUCCESS)).toThrow(SpanStackError);

      expect(open.status).toBe('error');
      expect(open.attributes.error).toBe(OPEN_SPAN_ERROR);
      expect(trace.status).toBe('failed');
      expect(trace.metadata.error).toBe('1 span(s) still open when trace ended');
      expect(Object.isFrozen(trace)).toBe(true);
    });

    it('should reject ending a trace that is not current', () => {
      const trace = recorder.beginTrace({ sessionId: 'session-1' });
      recorder.endTrace(trace, SUCCESS);

      expect(() => recorder.endTrace(trace, SUCCESS)).toThrow(TraceStateError);
    });
  });

  describe('withSpan', () => {
    it('should return the result and close the span', async () => {
      recorder.beginTrace({ sessionId: 'session-1' });

      const result = await recorder.withSpan('lookup', 'retrieval', async (span) => {
        span.attributes.hits = 3;
        return 'found';
      });

      const [span] = recorder.currentTrace?.spans ?? [];
      expect(result).toBe('found');
      expect(span?.status).toBe('completed');
      expect(span?.attributes.hits).toBe(3);
      expect(recorder.depth).toBe(0);
    });

    it('should re-throw the original error after closing the span', async () => {
      recorder.beginTrace({ sessionId: 'session-1' });
      const boom = new Error('boom');

      await expect(
        recorder.withSpan('lookup', 'retrieval', () => {
          throw boom;
        }),
      ).rejects.toBe(boom);

      const [span] = recorder.currentTrace?.spans ?? [];
      expect(span?.status).toBe('error');
      expect(span?.attributes.error).toBe('boom');
      expect(recorder.depth).toBe(0);
    });
  });

  describe('withTrace', () => {
    it('should end the trace as completed', async () => {
      let captured: string | undefined;
      await recorder.withTrace({ sessionId: 'session-1' }, (trace) => {
        captured = trace.trace_id;
      });

      expect(captured).toBeDefined();
      expect(recorder.currentTrace).toBeUndefined();
    });

    it('should end the trace as failed and re-throw', async () => {
      const boom = new Error('boom');
      const seen: Trace[] = [];

      await expect(
        recorder.withTrace({ sessionId: 'session-1' }, async (trace) => {
          seen.push(trace);
          throw boom;
        }),
      ).rejects.toBe(boom);

      expect(seen[0]?.status).toBe('failed');
      expect(seen[0]?.metadata.error).toBe('boom');
      expect(recorder.currentTrace).toBeUndefined();
    });
  });

  describe('branch', () => {
    it('should let concurrent siblings share a parent without touching each other', async () => {
      const trace = recorder.beginTrace({ sessionId: 'session-1' });
      const root = recorder.beginSpan('plan', 'agent');

      const left = recorder.branch();
      const right = recorder.branch();
      const leftSpan = left.beginSpan('search', 'tool');
      const rightSpan = right.beginSpan('fetch', 'tool');

      // closing in start order would break a shared stack
      left.endSpan(leftSpan, SUCCESS);
      right.endSpan(rightSpan, SUCCESS);
      recorder.endSpan(root, SUCCESS);

      expect(leftSpan.parent_span_id).toBe(root.span_id);
      expect(rightSpan.parent_span_id).toBe(root.span_id);
      expect(trace.spans.map((span) => span.name)).toEqual(['plan', 'search', 'fetch']);
    });

    it('should not allow a branch to end the trace', () => {
      const trace = recorder.beginTrace({ sessionId: 'session-1' });

      expect(() => recorder.branch().endTrace(trace, SUCCESS)).toThrow(TraceStateError);
    });
  });

  describe('addSignal', () => {
    const signal = () =>
      createSignal({ type: 'tool_abuse', severity: 'medium', title: 't', description: 'd' });

    it('should attach a signal to the active trace', () => {
      const trace = recorder.beginTrace({ sessionId: 'session-1' });

      expect(recorder.addSignal(signal())).toBe(true);
      expect(trace.security_signals).toHaveLength(1);
    });

    it('should drop the signal when no trace is active', () => {
      expect(recorder.addSignal(signal())).toBe(false);
    });
  });
});
