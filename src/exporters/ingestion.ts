/**
 * Ingestion exporter: one request carrying the full trace in the guard API's
 * native wire shape.
 */
import { Trace } from '../types';
import { describeError } from '../utils/errors';
import logger from '../utils/logger';
import { ExportResult, TraceExporter } from './types';

export interface TraceIngestor {
  ingestTrace(trace: Trace): Promise<void>;
}

export class IngestionExporter implements TraceExporter {
  readonly name = 'ingestion';

  constructor(private readonly client: TraceIngestor) {}

  async export(trace: Trace): Promise<ExportResult> {
    try {
      await this.client.ingestTrace(trace);
      return { exporter: this.name, success: true, requests: 1 };
    } catch (error) {
      logger.error({ error: describeError(error), trace_id: trace.trace_id }, 'Failed to ingest trace');
      return { exporter: this.name, success: false, requests: 0, error: describeError(error) };
    }
  }
}
