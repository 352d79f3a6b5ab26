/**
 * Guard
 *
 * Orchestrates one guarded invocation: opens a trace with its own recorder,
 * hands out the invocation context, and on close finalizes the trace and
 * runs the exporters. Exports are sequential and never fail the caller.
 */
import { v4 as uuidv4 } from 'uuid';
import { Outcome, SUCCESS, Trace, failure } from '../types';
import { SignalDetector } from '../detection';
import { GuardApiClient } from '../integrations/guard-api';
import { PolicyClient, PolicyGateway } from '../policy';
import { SpanStackError, TraceRecorder } from '../tracing';
import { ExportResult, IngestionExporter, LangfuseExporter, OtlpExporter, TraceExporter } from '../exporters';
import { GuardConfig } from '../utils/config';
import { ConfigurationError, describeError } from '../utils/errors';
import { recordExport } from '../utils/metrics';
import logger from '../utils/logger';
import { GuardContext, InvocationReporter } from './context';

export type GuardClient = PolicyClient & InvocationReporter;

export interface GuardOptions {
  agentId: string;
  /** When false, policy checks allow everything and nothing is exported. Default true. */
  enabled?: boolean;
  failOpen?: boolean;
  policyTimeoutMs?: number;
  exporters?: TraceExporter[];
  gateway?: PolicyGateway;
  detector?: SignalDetector;
  client?: GuardClient;
}

export interface OpenTraceOptions {
  /** Generated when absent */
  sessionId?: string;
  userId?: string;
  metadata?: Record<string, unknown>;
}

const unconfiguredClient: PolicyClient = {
  preInvoke: () => Promise.reject(new ConfigurationError('No policy client configured')),
  evaluatePolicy: () => Promise.reject(new ConfigurationError('No policy client configured')),
};

export class Guard {
  readonly agentId: string;
  readonly enabled: boolean;
  readonly gateway: PolicyGateway;
  readonly detector: SignalDetector;
  readonly exporters: readonly TraceExporter[];
  private readonly client?: GuardClient;

  constructor(options: GuardOptions) {
    this.agentId = options.agentId;
    this.enabled = options.enabled ?? true;
    this.client = options.client;
    this.detector = options.detector ?? new SignalDetector();
    this.exporters = options.exporters ?? [];

    if (options.gateway) {
      this.gateway = options.gateway;
    } else if (options.client || !this.enabled) {
      this.gateway = new PolicyGateway(options.client ?? unconfiguredClient, {
        enabled: this.enabled,
        failOpen: options.failOpen,
        timeoutMs: options.policyTimeoutMs,
      });
    } else {
      throw new ConfigurationError('An enabled guard needs a policy gateway or an API client', {
        agent_id: options.agentId,
      });
    }
  }

  /**
   * Build a guard from environment-derived configuration. The ingestion
   * exporter is always registered when the guard is enabled; Langfuse and
   * OTLP are registered when configured.
   */
  static fromConfig(config: GuardConfig, overrides: Partial<GuardOptions> = {}): Guard {
    const agentId = overrides.agentId ?? config.guard.agentId;
    if (!agentId) {
      throw new ConfigurationError('GUARD_AGENT_ID is required');
    }

    const enabled = overrides.enabled ?? config.guard.enabled;
    const apiKey = config.api.apiKey;
    if (enabled && !apiKey && !overrides.client && !overrides.gateway) {
      throw new ConfigurationError('GUARD_API_KEY is required when the guard is enabled');
    }

    const apiClient = apiKey
      ? new GuardApiClient({ apiKey, baseUrl: config.api.baseUrl, timeoutMs: config.api.timeoutMs })
      : undefined;
    const client = overrides.client ?? apiClient;

    const exporters: TraceExporter[] = [];
    if (enabled && apiClient) {
      exporters.push(new IngestionExporter(apiClient));
    }
    if (config.langfuse) {
      exporters.push(
        new LangfuseExporter({
          publicKey: config.langfuse.publicKey,
          secretKey: config.langfuse.secretKey,
          host: config.langfuse.host,
        }),
      );
    }
    if (config.otlp) {
      exporters.push(
        new OtlpExporter({ endpoint: config.otlp.endpoint, serviceName: config.otlp.serviceName }),
      );
    }

    return new Guard({
      failOpen: config.guard.failOpen,
      policyTimeoutMs: config.guard.policyTimeoutMs,
      exporters,
      ...overrides,
      agentId,
      enabled,
      client,
    });
  }

  openTrace(options: OpenTraceOptions = {}): GuardContext {
    const recorder = new TraceRecorder(this.agentId);
    const trace = recorder.beginTrace({
      sessionId: options.sessionId ?? uuidv4(),
      userId: options.userId,
      metadata: options.metadata,
    });

    return new GuardContext(trace, recorder, {
      agentId: this.agentId,
      enabled: this.enabled,
      gateway: this.gateway,
      detector: this.detector,
      reporter: this.client,
    });
  }

  /**
   * Finalize the context's trace and export it. A trace left with open spans
   * is still finalized and exported before the SpanStackError is re-thrown.
   */
  async closeTrace(context: GuardContext, outcome: Outcome = SUCCESS): Promise<ExportResult[]> {
    let stackError: SpanStackError | undefined;
    try {
      context.recorder.endTrace(context.trace, outcome);
    } catch (error) {
      if (!(error instanceof SpanStackError)) {
        throw error;
      }
      stackError = error;
    }

    const results = this.enabled ? await this.export(context.trace) : [];

    if (stackError) {
      throw stackError;
    }
    return results;
  }

  /**
   * Run `fn` inside a trace that is closed on every exit path. Whatever `fn`
   * throws is re-thrown unchanged.
   */
  async trace<T>(options: OpenTraceOptions, fn: (context: GuardContext) => Promise<T> | T): Promise<T> {
    const context = this.openTrace(options);
    let result: T;
    try {
      result = await fn(context);
    } catch (error) {
      try {
        await this.closeTrace(context, failure(error));
      } catch (closeError) {
        logger.error(
          { trace_id: context.trace.trace_id, error: describeError(closeError), original_error: describeError(error) },
          'Failed to close trace while unwinding',
        );
      }
      throw error;
    }
    await this.closeTrace(context, SUCCESS);
    return result;
  }

  private async export(trace: Trace): Promise<ExportResult[]> {
    const results: ExportResult[] = [];
    for (const exporter of this.exporters) {
      let result: ExportResult;
      try {
        result = await exporter.export(trace);
      } catch (error) {
        result = { exporter: exporter.name, success: false, requests: 0, error: describeError(error) };
      }

      recordExport(result.exporter, result.success);
      if (!result.success) {
        logger.warn(
          { trace_id: trace.trace_id, exporter: result.exporter, error: result.error },
          'Trace export failed',
        );
      }
      results.push(result);
    }
    return results;
  }
}
