/**
 * Langfuse exporter (generic trace-collection format).
 *
 * Trace -> one top-level trace record; each span -> a timed observation
 * (generation for llm spans, span otherwise); each security signal -> an
 * event observation. Requests are sequential: the trace record first, then
 * one per span, then one per signal. The first failed request ends the
 * export.
 */
import { SecuritySignal, Span, Trace } from '../types';
import { SDK_VERSION } from '../utils/config';
import { describeError } from '../utils/errors';
import logger from '../utils/logger';
import { AxiosTransport, HttpTransport } from '../integrations/http/transport';
import { ExportResult, TraceExporter } from './types';

export const LANGFUSE_PATHS = {
  traces: '/api/public/traces',
  observations: '/api/public/observations',
} as const;

export interface LangfuseExporterOptions {
  publicKey: string;
  secretKey: string;
  host?: string;
  timeoutMs?: number;
  transport?: HttpTransport;
}

export interface LangfuseTraceBody {
  id: string;
  name: string;
  userId: string | null;
  sessionId: string;
  metadata: Record<string, unknown>;
  input: unknown;
  output: unknown;
}

export interface LangfuseObservationBody {
  id: string;
  traceId: string;
  type: 'generation' | 'span' | 'event';
  name: string;
  parentObservationId?: string | null;
  startTime?: string;
  endTime?: string | null;
  metadata: Record<string, unknown>;
  level: 'ERROR' | 'WARNING' | 'DEFAULT';
  model?: unknown;
  promptTokens?: unknown;
  completionTokens?: unknown;
}

export function basicAuthHeader(publicKey: string, secretKey: string): string {
  return `Basic ${Buffer.from(`${publicKey}:${secretKey}`).toString('base64')}`;
}

export function toLangfuseTrace(trace: Trace): LangfuseTraceBody {
  return {
    id: trace.trace_id,
    name: `agent-${trace.agent_id}`,
    userId: trace.user_id ?? null,
    sessionId: trace.session_id,
    metadata: {
      ...trace.metadata,
      sdk_version: SDK_VERSION,
      security_signals_count: trace.security_signals.length,
    },
    input: trace.metadata.input ?? null,
    output: trace.metadata.output ?? null,
  };
}

export function toLangfuseSpan(traceId: string, span: Span): LangfuseObservationBody {
  const body: LangfuseObservationBody = {
    id: span.span_id,
    traceId,
    type: span.type === 'llm' ? 'generation' : 'span',
    name: span.name,
    parentObservationId: span.parent_span_id ?? null,
    startTime: span.start_time.toISOString(),
    endTime: span.end_time ? span.end_time.toISOString() : null,
    metadata: { ...span.attributes },
    level: span.status === 'error' ? 'ERROR' : 'DEFAULT',
  };

  if (span.type === 'llm' && span.attributes.model) {
    body.model = span.attributes.model;
    body.promptTokens = span.attributes.prompt_tokens ?? null;
    body.completionTokens = span.attributes.completion_tokens ?? null;
  }

  return body;
}

export function toLangfuseEvent(traceId: string, signal: SecuritySignal): LangfuseObservationBody {
  return {
    id: signal.id,
    traceId,
    type: 'event',
    name: `security:${signal.type}`,
    metadata: {
      severity: signal.severity,
      title: signal.title,
      description: signal.description,
      evidence: signal.evidence,
      mitigated: signal.mitigated,
    },
    level: signal.severity === 'critical' || signal.severity === 'high' ? 'ERROR' : 'WARNING',
  };
}

export class LangfuseExporter implements TraceExporter {
  readonly name = 'langfuse';
  private readonly transport: HttpTransport;
  private readonly headers: Record<string, string>;

  constructor(options: LangfuseExporterOptions) {
    this.headers = {
      Authorization: basicAuthHeader(options.publicKey, options.secretKey),
      'Content-Type': 'application/json',
    };
    this.transport =
      options.transport ??
      new AxiosTransport({
        baseUrl: options.host ?? 'https://cloud.langfuse.com',
        timeoutMs: options.timeoutMs,
        headers: this.headers,
      });
  }

  async export(trace: Trace): Promise<ExportResult> {
    const bodies: Array<{ path: string; body: unknown }> = [
      { path: LANGFUSE_PATHS.traces, body: toLangfuseTrace(trace) },
      ...trace.spans.map((span) => ({
        path: LANGFUSE_PATHS.observations,
        body: toLangfuseSpan(trace.trace_id, span),
      })),
      ...trace.security_signals.map((signal) => ({
        path: LANGFUSE_PATHS.observations,
        body: toLangfuseEvent(trace.trace_id, signal),
      })),
    ];

    let requests = 0;
    for (const { path, body } of bodies) {
      try {
        await this.transport.post({ path, body, headers: this.headers });
        requests += 1;
      } catch (error) {
        logger.error(
          { error: describeError(error), trace_id: trace.trace_id, completed_requests: requests },
          'Langfuse export failed',
        );
        return { exporter: this.name, success: false, requests, error: describeError(error) };
      }
    }

    return { exporter: this.name, success: true, requests };
  }
}
