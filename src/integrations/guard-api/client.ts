/**
 * Guard API Client
 *
 * Talks to the remote policy/ingestion service. Unlike the exporters, every
 * method here propagates failures: the policy gateway needs to see them to
 * apply its fail-open/fail-closed resolution, and the orchestrator decides
 * which failures are non-fatal.
 */
import { Trace } from '../../types';
import { SDK_VERSION } from '../../utils/config';
import { hashContent } from '../../utils/hash';
import logger from '../../utils/logger';
import { AxiosTransport, HttpTransport } from '../http/transport';
import {
  HealthStatus,
  PolicyEvaluationRequest,
  PostInvokeRequest,
  PreInvokeRequest,
} from './types';
import { traceToWire } from './wire';

export const API_PATHS = {
  evaluate: '/api/v1/policies/evaluate',
  preInvoke: '/api/v1/sdk/pre-invoke',
  postInvoke: '/api/v1/sdk/post-invoke',
  traces: '/api/v1/observe/traces',
  health: '/health',
} as const;

export const SDK_VERSION_HEADER = 'X-Guard-SDK-Version';

export interface GuardApiClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Replaces the default axios transport */
  transport?: HttpTransport;
}

export class GuardApiClient {
  private readonly transport: HttpTransport;
  private readonly headers: Record<string, string>;

  constructor(options: GuardApiClientOptions) {
    this.headers = {
      Authorization: `Bearer ${options.apiKey}`,
      'Content-Type': 'application/json',
      [SDK_VERSION_HEADER]: SDK_VERSION,
    };

    this.transport =
      options.transport ??
      new AxiosTransport({
        baseUrl: options.baseUrl ?? 'http://localhost:8080',
        timeoutMs: options.timeoutMs ?? 30000,
        headers: this.headers,
      });
  }

  /**
   * Evaluate policies before an action. Returns the raw response payload;
   * interpretation belongs to the policy gateway.
   */
  async evaluatePolicy(params: {
    agentId: string;
    toolName?: string;
    toolParams?: Record<string, unknown>;
    dataClassification?: string;
  }): Promise<unknown> {
    const body: PolicyEvaluationRequest = {
      agent: { id: params.agentId },
      ...(params.toolName
        ? { tool: { name: params.toolName, parameters: params.toolParams ?? {} } }
        : {}),
      ...(params.dataClassification
        ? { data: { classification: params.dataClassification } }
        : {}),
    };

    const response = await this.transport.post({
      path: API_PATHS.evaluate,
      body,
      headers: this.headers,
    });
    return response.data;
  }

  /**
   * Pre-invocation policy check for a single tool call.
   */
  async preInvoke(params: {
    agentId: string;
    toolName: string;
    toolParams: Record<string, unknown>;
    sessionId: string;
  }): Promise<unknown> {
    const body: PreInvokeRequest = {
      agent_id: params.agentId,
      tool: { name: params.toolName, parameters: params.toolParams },
      session_id: params.sessionId,
      timestamp: new Date().toISOString(),
    };

    const response = await this.transport.post({
      path: API_PATHS.preInvoke,
      body,
      headers: this.headers,
    });
    return response.data;
  }

  /**
   * Post-invocation record. Only a digest of the result is sent.
   */
  async postInvoke(params: {
    agentId: string;
    toolName: string;
    result: unknown;
    durationMs: number;
    sessionId: string;
  }): Promise<void> {
    const body: PostInvokeRequest = {
      agent_id: params.agentId,
      tool: { name: params.toolName },
      result_hash: hashContent(params.result),
      duration_ms: params.durationMs,
      session_id: params.sessionId,
      timestamp: new Date().toISOString(),
    };

    await this.transport.post({
      path: API_PATHS.postInvoke,
      body,
      headers: this.headers,
    });
  }

  /**
   * Send a completed trace for storage and analysis.
   */
  async ingestTrace(trace: Trace): Promise<void> {
    await this.transport.post({
      path: API_PATHS.traces,
      body: traceToWire(trace),
      headers: this.headers,
    });

    logger.debug({ trace_id: trace.trace_id }, 'Trace ingested');
  }

  /**
   * Check service health. Never throws.
   */
  async healthCheck(): Promise<HealthStatus> {
    const startTime = Date.now();
    try {
      const response = await this.transport.get(API_PATHS.health);
      return { healthy: response.status === 200, latency_ms: Date.now() - startTime };
    } catch (error) {
      logger.error({ error }, 'Guard API health check failed');
      return { healthy: false, latency_ms: Date.now() - startTime };
    }
  }
}
