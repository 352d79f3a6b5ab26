/**
 * Exporters
 *
 * - IngestionExporter (guard API native wire shape)
 * - LangfuseExporter (trace / observation / event records)
 * - OtlpExporter (OTLP/HTTP JSON)
 */

export type { ExportResult, TraceExporter } from './types';

export { IngestionExporter } from './ingestion';
export type { TraceIngestor } from './ingestion';

export {
  LangfuseExporter,
  LANGFUSE_PATHS,
  basicAuthHeader,
  toLangfuseTrace,
  toLangfuseSpan,
  toLangfuseEvent,
} from './langfuse';
export type { LangfuseExporterOptions, LangfuseTraceBody, LangfuseObservationBody } from './langfuse';

export {
  OtlpExporter,
  OTLP_TRACES_PATH,
  SPAN_KIND,
  STATUS_CODE,
  otlpTraceId,
  otlpSpanId,
  spanKind,
  toUnixNano,
  toOtlpSpan,
  toOtlpRequest,
} from './otlp';
export type { OtlpExporterOptions, OtlpSpan, OtlpTracesRequest, OtlpAttribute } from './otlp';
