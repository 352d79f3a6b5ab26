/**
 * Exporter contract.
 */
import { Trace } from '../types';

export interface ExportResult {
  exporter: string;
  success: boolean;
  /** Outbound requests that completed successfully */
  requests: number;
  error?: string;
}

/**
 * Translates a completed trace into an external backend's wire format and
 * sends it. Implementations never throw and never mutate the trace; a failed
 * export is reported in the result. There are no retries.
 */
export interface TraceExporter {
  readonly name: string;
  export(trace: Trace): Promise<ExportResult>;
}
