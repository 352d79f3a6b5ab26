import { RecordingTransport } from '../../../__tests__/helpers/recording-transport';
import { TraceRecorder } from '../../../tracing/recorder';
import { SUCCESS } from '../../../types';
import { hashContent } from '../../../utils/hash';
import { SDK_VERSION } from '../../../utils/config';
import { TransportError } from '../../http/transport';
import { API_PATHS, GuardApiClient, SDK_VERSION_HEADER } from '../client';

describe('GuardApiClient', () => {
  let transport: RecordingTransport;
  let client: GuardApiClient;

  beforeEach(() => {
    transport = new RecordingTransport(() => ({ status: 200, data: { allow: true, decision: 'allow' } }));
    client = new GuardApiClient({ apiKey: 'test-key', transport });
  });

  it('should send auth and version headers on every request', async () => {
    await client.preInvoke({ agentId: 'agent-1', toolName: 'search', toolParams: {}, sessionId: 's-1' });

    expect(transport.requests[0]?.headers).toEqual({
      Authorization: 'Bearer test-key',
      'Content-Type': 'application/json',
      [SDK_VERSION_HEADER]: SDK_VERSION,
    });
  });

  describe('preInvoke', () => {
    it('should post the tool call and return the raw payload', async () => {
      const payload = await client.preInvoke({
        agentId: 'agent-1',
        toolName: 'search',
        toolParams: { q: 'weather' },
        sessionId: 's-1',
      });

      expect(payload).toEqual({ allow: true, decision: 'allow' });
      expect(transport.requests[0]?.path).toBe(API_PATHS.preInvoke);
      expect(transport.bodyAt(0)).toEqual({
        agent_id: 'agent-1',
        tool: { name: 'search', parameters: { q: 'weather' } },
        session_id: 's-1',
        timestamp: expect.any(String),
      });
    });

    it('should propagate transport failures', async () => {
      const failing = new RecordingTransport(() => new TransportError('POST failed with status 500', 500));
      const failingClient = new GuardApiClient({ apiKey: 'test-key', transport: failing });

      await expect(
        failingClient.preInvoke({ agentId: 'agent-1', toolName: 'search', toolParams: {}, sessionId: 's-1' }),
      ).rejects.toBeInstanceOf(TransportError);
    });
  });

  describe('evaluatePolicy', () => {
    it('should include only the sections that were given', async () => {
      await client.evaluatePolicy({ agentId: 'agent-1', dataClassification: 'pii' });

      expect(transport.requests[0]?.path).toBe(API_PATHS.evaluate);
      expect(transport.bodyAt(0)).toEqual({ agent: { id: 'agent-1' }, data: { classification: 'pii' } });
    });

    it('should default tool parameters to an empty object', async () => {
      await client.evaluatePolicy({ agentId: 'agent-1', toolName: 'search' });

      expect(transport.bodyAt(0)).toEqual({ agent: { id: 'agent-1' }, tool: { name: 'search', parameters: {} } });
    });
  });

  describe('postInvoke', () => {
    it('should send a digest of the result instead of the result', async () => {
      const result = { rows: ['secret-row'] };

      await client.postInvoke({ agentId: 'agent-1', toolName: 'query', result, durationMs: 12, sessionId: 's-1' });

      expect(transport.requests[0]?.path).toBe(API_PATHS.postInvoke);
      expect(transport.bodyAt(0)).toEqual({
        agent_id: 'agent-1',
        tool: { name: 'query' },
        result_hash: hashContent(result),
        duration_ms: 12,
        session_id: 's-1',
        timestamp: expect.any(String),
      });
      expect(JSON.stringify(transport.bodyAt(0))).not.toContain('secret-row');
    });
  });

  describe('ingestTrace', () => {
    it('should post the trace in wire shape', async () => {
      const recorder = new TraceRecorder('agent-1');
      const trace = recorder.beginTrace({ sessionId: 's-1' });
      const span = recorder.beginSpan('search', 'tool');
      recorder.endSpan(span, SUCCESS);
      recorder.endTrace(trace, SUCCESS);

      await client.ingestTrace(trace);

      expect(transport.requests[0]?.path).toBe(API_PATHS.traces);
      expect(transport.bodyAt(0)).toMatchObject({
        trace_id: trace.trace_id,
        agent_id: 'agent-1',
        session_id: 's-1',
        user_id: null,
        status: 'completed',
        start_time: trace.start_time.toISOString(),
        spans: [
          {
            span_id: span.span_id,
            parent_span_id: null,
            name: 'search',
            type: 'tool',
            status: 'completed',
            duration_ms: expect.any(Number),
          },
        ],
        security_signals: [],
      });
    });
  });

  describe('healthCheck', () => {
    it('should report a healthy service', async () => {
      const status = await client.healthCheck();

      expect(status.healthy).toBe(true);
      expect(transport.gets).toEqual([API_PATHS.health]);
    });

    it('should report an unreachable service without throwing', async () => {
      const failing = new RecordingTransport(() => new TransportError('GET /health failed: refused'));
      const status = await new GuardApiClient({ apiKey: 'test-key', transport: failing }).healthCheck();

      expect(status.healthy).toBe(false);
      expect(status.latency_ms).toBeGreaterThanOrEqual(0);
    });
  });
});
