import {
  addSpanEvent,
  createSpan,
  createTrace,
  finalizeSpan,
  finalizeTrace,
  sealTrace,
  spanDurationMs,
} from '../spans';

describe('Trace Spans', () => {
  describe('createSpan', () => {
    it('should create a running span with a copy of the attributes', () => {
      const attributes = { model: 'test-model' };
      const span = createSpan('generate', 'llm', 'parent-1', attributes);

      expect(span.name).toBe('generate');
      expect(span.type).toBe('llm');
      expect(span.parent_span_id).toBe('parent-1');
      expect(span.status).toBe('running');
      expect(span.events).toEqual([]);
      expect(span.end_time).toBeUndefined();
      expect(span.attributes).toEqual(attributes);
      expect(span.attributes).not.toBe(attributes);
    });

    it('should omit parent_span_id for a root span', () => {
      const span = createSpan('root', 'agent');

      expect('parent_span_id' in span).toBe(false);
    });

    it('should generate unique span IDs', () => {
      expect(createSpan('a', 'chain').span_id).not.toBe(createSpan('a', 'chain').span_id);
    });
  });

  describe('finalizeSpan', () => {
    it('should set end_time and status', () => {
      const span = createSpan('step', 'chain');
      const endTime = new Date(span.start_time.getTime() + 250);

      finalizeSpan(span, 'completed', undefined, endTime);

      expect(span.status).toBe('completed');
      expect(span.end_time).toBe(endTime);
      expect(span.attributes.error).toBeUndefined();
      expect(spanDurationMs(span)).toBe(250);
    });

    it('should record the error as an attribute', () => {
      const span = createSpan('step', 'chain');

      finalizeSpan(span, 'error', 'timeout');

      expect(span.status).toBe('error');
      expect(span.attributes.error).toBe('timeout');
    });
  });

  describe('spanDurationMs', () => {
    it('should be 0 while the span is open', () => {
      expect(spanDurationMs(createSpan('step', 'chain'))).toBe(0);
    });
  });

  describe('addSpanEvent', () => {
    it('should append a timestamped event', () => {
      const span = createSpan('step', 'chain');

      addSpanEvent(span, 'retry', { attempt: 2 });

      expect(span.events).toHaveLength(1);
      expect(span.events[0]?.name).toBe('retry');
      expect(span.events[0]?.attributes).toEqual({ attempt: 2 });
      expect(span.events[0]?.timestamp).toBeInstanceOf(Date);
    });
  });

  describe('createTrace / finalizeTrace', () => {
    it('should create a running trace', () => {
      const trace = createTrace({ agentId: 'agent-1', sessionId: 'session-1' });

      expect(trace.status).toBe('running');
      expect('user_id' in trace).toBe(false);
      expect(trace.metadata).toEqual({});
    });

    it('should record the error in metadata on failure', () => {
      const trace = createTrace({ agentId: 'agent-1', sessionId: 'session-1' });

      finalizeTrace(trace, 'failed', 'crashed');

      expect(trace.status).toBe('failed');
      expect(trace.metadata.error).toBe('crashed');
      expect(trace.end_time).toBeInstanceOf(Date);
    });
  });

  describe('sealTrace', () => {
    it('should freeze spans and metadata but leave signals writable', () => {
      const trace = createTrace({ agentId: 'agent-1', sessionId: 'session-1' });
      const span = createSpan('step', 'chain');
      trace.spans.push(span);
      trace.security_signals.push({
        id: 'signal-1',
        type: 'tool_abuse',
        severity: 'medium',
        title: 't',
        description: 'd',
        evidence: {},
        timestamp: new Date(),
        mitigated: false,
      });

      sealTrace(trace);

      expect(Object.isFrozen(trace)).toBe(true);
      expect(Object.isFrozen(span.attributes)).toBe(true);
      expect(Object.isFrozen(trace.metadata)).toBe(true);
      expect(Object.isFrozen(trace.security_signals)).toBe(true);
      expect(Object.isFrozen(trace.security_signals[0])).toBe(false);
    });
  });
});
