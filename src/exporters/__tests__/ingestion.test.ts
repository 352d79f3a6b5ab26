import { Trace } from '../../types';
import { IngestionExporter, TraceIngestor } from '../ingestion';
import { sampleTrace } from './fixtures';

describe('IngestionExporter', () => {
  it('should ingest the trace in one request', async () => {
    const received: Trace[] = [];
    const client: TraceIngestor = {
      ingestTrace: async (trace) => {
        received.push(trace);
      },
    };
    const trace = sampleTrace();

    const result = await new IngestionExporter(client).export(trace);

    expect(result).toEqual({ exporter: 'ingestion', success: true, requests: 1 });
    expect(received).toEqual([trace]);
  });

  it('should report a failed ingestion without throwing', async () => {
    const client: TraceIngestor = {
      ingestTrace: () => Promise.reject(new Error('service unavailable')),
    };

    const result = await new IngestionExporter(client).export(sampleTrace());

    expect(result).toEqual({
      exporter: 'ingestion',
      success: false,
      requests: 0,
      error: 'service unavailable',
    });
  });
});
