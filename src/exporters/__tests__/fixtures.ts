import { SecuritySignal, Span, Trace } from '../../types';

export const ROOT_SPAN: Span = {
  span_id: '0f8fad5b-d9cb-469f-a165-70867728950e',
  name: 'agent-run',
  type: 'agent',
  start_time: new Date('2024-05-01T10:00:00.000Z'),
  end_time: new Date('2024-05-01T10:00:02.500Z'),
  status: 'completed',
  attributes: {},
  events: [],
};

export const LLM_SPAN: Span = {
  span_id: '7c9e6679-7425-40de-944b-e07fc1f90ae7',
  parent_span_id: ROOT_SPAN.span_id,
  name: 'generate',
  type: 'llm',
  start_time: new Date('2024-05-01T10:00:00.100Z'),
  end_time: new Date('2024-05-01T10:00:01.100Z'),
  status: 'error',
  attributes: { model: 'test-model', prompt_tokens: 12, error: 'rate limited' },
  events: [{ name: 'retry', timestamp: new Date('2024-05-01T10:00:00.600Z'), attributes: { attempt: 2 } }],
};

export const SIGNAL: SecuritySignal = {
  id: 'signal-1',
  type: 'injection_attempt',
  severity: 'high',
  title: 'Potential Prompt Injection Detected',
  description: 'Pattern matched',
  evidence: { pattern: 'jailbreak' },
  timestamp: new Date('2024-05-01T10:00:00.050Z'),
  mitigated: false,
};

export function sampleTrace(overrides: Partial<Trace> = {}): Trace {
  return {
    trace_id: '9b2f6c1e-3d4a-4b5c-8d6e-7f8091a2b3c4',
    agent_id: 'agent-1',
    session_id: 'session-1',
    start_time: new Date('2024-05-01T10:00:00.000Z'),
    end_time: new Date('2024-05-01T10:00:02.500Z'),
    status: 'completed',
    spans: [ROOT_SPAN, LLM_SPAN],
    security_signals: [SIGNAL],
    metadata: { input: 'hello' },
    ...overrides,
  };
}
