/**
 * OTLP/HTTP JSON exporter.
 *
 * Maps a trace onto the resourceSpans -> scopeSpans -> spans structure.
 * Identifiers are hex without hyphens, cut or right-padded with '0' to the
 * protocol's 16-byte trace id and 8-byte span id. Timestamps are nanoseconds
 * since the epoch, encoded as decimal strings (the OTLP/JSON int64 form).
 */
import { Span, SpanType, Trace } from '../types';
import { SDK_VERSION } from '../utils/config';
import { describeError } from '../utils/errors';
import logger from '../utils/logger';
import { AxiosTransport, HttpTransport } from '../integrations/http/transport';
import { ExportResult, TraceExporter } from './types';

export const OTLP_TRACES_PATH = '/v1/traces';

const TRACE_ID_HEX_LENGTH = 32;
const SPAN_ID_HEX_LENGTH = 16;

export const SPAN_KIND = {
  INTERNAL: 0,
  SERVER: 2,
  CLIENT: 3,
} as const;

export const STATUS_CODE = {
  OK: 1,
  ERROR: 2,
} as const;

const KIND_BY_SPAN_TYPE: Record<SpanType, number> = {
  llm: SPAN_KIND.CLIENT,
  tool: SPAN_KIND.CLIENT,
  retrieval: SPAN_KIND.CLIENT,
  agent: SPAN_KIND.SERVER,
  chain: SPAN_KIND.INTERNAL,
  policy: SPAN_KIND.INTERNAL,
};

export interface OtlpAttribute {
  key: string;
  value: { stringValue: string };
}

export interface OtlpSpan {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: string;
  kind: number;
  startTimeUnixNano: string;
  endTimeUnixNano?: string;
  attributes: OtlpAttribute[];
  events: Array<{ timeUnixNano: string; name: string; attributes: OtlpAttribute[] }>;
  status: { code: number; message: string };
}

export interface OtlpTracesRequest {
  resourceSpans: Array<{
    resource: { attributes: OtlpAttribute[] };
    scopeSpans: Array<{
      scope: { name: string; version: string };
      spans: OtlpSpan[];
    }>;
  }>;
}

export interface OtlpExporterOptions {
  endpoint?: string;
  serviceName?: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  transport?: HttpTransport;
}

/**
 * Strip hyphens, then truncate or right-pad with '0' to `width` characters.
 */
export function toFixedHex(id: string, width: number): string {
  return id.replace(/-/g, '').slice(0, width).padEnd(width, '0');
}

export function otlpTraceId(id: string): string {
  return toFixedHex(id, TRACE_ID_HEX_LENGTH);
}

export function otlpSpanId(id: string): string {
  return toFixedHex(id, SPAN_ID_HEX_LENGTH);
}

export function spanKind(type: SpanType): number {
  return KIND_BY_SPAN_TYPE[type] ?? SPAN_KIND.INTERNAL;
}

export function toUnixNano(date: Date): string {
  return (BigInt(date.getTime()) * 1_000_000n).toString();
}

function stringValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object' && value !== null) {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

function toAttributes(record: Record<string, unknown>): OtlpAttribute[] {
  return Object.entries(record).map(([key, value]) => ({
    key,
    value: { stringValue: stringValue(value) },
  }));
}

export function toOtlpSpan(traceId: string, span: Span): OtlpSpan {
  const error = span.attributes.error;
  return {
    traceId: otlpTraceId(traceId),
    spanId: otlpSpanId(span.span_id),
    ...(span.parent_span_id !== undefined && { parentSpanId: otlpSpanId(span.parent_span_id) }),
    name: span.name,
    kind: spanKind(span.type),
    startTimeUnixNano: toUnixNano(span.start_time),
    ...(span.end_time !== undefined && { endTimeUnixNano: toUnixNano(span.end_time) }),
    attributes: toAttributes(span.attributes),
    events: span.events.map((event) => ({
      timeUnixNano: toUnixNano(event.timestamp),
      name: event.name,
      attributes: toAttributes(event.attributes),
    })),
    status: {
      code: span.status === 'error' ? STATUS_CODE.ERROR : STATUS_CODE.OK,
      message: error === undefined ? '' : stringValue(error),
    },
  };
}

export function toOtlpRequest(trace: Trace, serviceName: string): OtlpTracesRequest {
  return {
    resourceSpans: [
      {
        resource: {
          attributes: toAttributes({
            'service.name': serviceName,
            'agent.id': trace.agent_id,
          }),
        },
        scopeSpans: [
          {
            scope: { name: 'agent-runtime-guard', version: SDK_VERSION },
            spans: trace.spans.map((span) => toOtlpSpan(trace.trace_id, span)),
          },
        ],
      },
    ],
  };
}

export class OtlpExporter implements TraceExporter {
  readonly name = 'otlp';
  private readonly transport: HttpTransport;
  private readonly serviceName: string;

  constructor(options: OtlpExporterOptions = {}) {
    this.serviceName = options.serviceName ?? 'agent-runtime-guard';
    this.transport =
      options.transport ??
      new AxiosTransport({
        baseUrl: options.endpoint ?? 'http://localhost:4318',
        timeoutMs: options.timeoutMs,
        headers: options.headers,
      });
  }

  async export(trace: Trace): Promise<ExportResult> {
    try {
      await this.transport.post({
        path: OTLP_TRACES_PATH,
        body: toOtlpRequest(trace, this.serviceName),
      });
      return { exporter: this.name, success: true, requests: 1 };
    } catch (error) {
      logger.error({ error: describeError(error), trace_id: trace.trace_id }, 'OTLP export failed');
      return { exporter: this.name, success: false, requests: 0, error: describeError(error) };
    }
  }
}
