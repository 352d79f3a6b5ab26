/**
 * Policy Gateway
 *
 * Pre-action policy checks against the remote policy service, with
 * fail-open/fail-closed resolution when the service cannot be consulted.
 *
 * Fail-closed is the default: an unreachable policy service must never
 * silently disable governance. Fail-open has to be requested explicitly.
 */
import { v4 as uuidv4 } from 'uuid';
import { PolicyDecision } from '../types';
import { describeError } from '../utils/errors';
import { recordPolicyDecision } from '../utils/metrics';
import { withTimeout } from '../utils/timeout';
import logger from '../utils/logger';
import { FailMode, allowAll, fallbackDecision, parsePolicyResponse } from './decision';
import { PolicyTimeoutError } from './errors';

export const DEFAULT_POLICY_TIMEOUT_MS = 5000;

/**
 * The subset of the API client the gateway needs. GuardApiClient implements it.
 */
export interface PolicyClient {
  preInvoke(params: {
    agentId: string;
    toolName: string;
    toolParams: Record<string, unknown>;
    sessionId: string;
  }): Promise<unknown>;
  evaluatePolicy(params: {
    agentId: string;
    toolName?: string;
    toolParams?: Record<string, unknown>;
    dataClassification?: string;
  }): Promise<unknown>;
}

export interface PolicyGatewayOptions {
  /** When false every check allows without a network call. Default true. */
  enabled?: boolean;
  /** Proceed (with a warning) when the policy service is unreachable. Default false. */
  failOpen?: boolean;
  timeoutMs?: number;
}

export interface EvaluationRequest {
  agentId: string;
  toolName?: string;
  toolParams?: Record<string, unknown>;
  dataClassification?: string;
}

export class PolicyGateway {
  readonly enabled: boolean;
  readonly failMode: FailMode;
  readonly timeoutMs: number;

  constructor(
    private readonly client: PolicyClient,
    options: PolicyGatewayOptions = {},
  ) {
    this.enabled = options.enabled ?? true;
    this.failMode = options.failOpen === true ? 'open' : 'closed';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_POLICY_TIMEOUT_MS;
  }

  /**
   * Check whether a tool invocation is allowed. Never throws: transport
   * failures, non-success statuses, malformed answers and timeouts all
   * resolve to the gateway's fail-mode decision.
   */
  async checkToolAccess(
    agentId: string,
    toolName: string,
    toolParams: Record<string, unknown> = {},
    sessionId?: string,
  ): Promise<PolicyDecision> {
    return this.resolve({ agent_id: agentId, tool: toolName }, () =>
      this.client.preInvoke({
        agentId,
        toolName,
        toolParams,
        sessionId: sessionId ?? uuidv4(),
      }),
    );
  }

  /**
   * General policy evaluation (tool and/or data classification).
   */
  async evaluate(request: EvaluationRequest): Promise<PolicyDecision> {
    return this.resolve(
      { agent_id: request.agentId, tool: request.toolName, classification: request.dataClassification },
      () => this.client.evaluatePolicy(request),
    );
  }

  private async resolve(
    context: Record<string, unknown>,
    call: () => Promise<unknown>,
  ): Promise<PolicyDecision> {
    if (!this.enabled) {
      recordPolicyDecision('allow', 'disabled');
      return allowAll();
    }

    const startTime = Date.now();
    try {
      const payload = await withTimeout(call(), this.timeoutMs, () => new PolicyTimeoutError(this.timeoutMs));
      const decision = parsePolicyResponse(payload);
      const latencyMs = Date.now() - startTime;

      recordPolicyDecision(decision.decision, 'remote', latencyMs);
      logger.info(
        { ...context, decision: decision.decision, allow: decision.allow, latency_ms: latencyMs },
        'Policy decision received',
      );

      return decision;
    } catch (error) {
      const failureDescription = describeError(error);
      const decision = fallbackDecision(this.failMode, failureDescription);
      const latencyMs = Date.now() - startTime;

      recordPolicyDecision(
        decision.decision,
        this.failMode === 'open' ? 'fail_open' : 'fail_closed',
        latencyMs,
      );

      if (this.failMode === 'open') {
        logger.warn({ ...context, error: failureDescription }, 'Policy service unavailable, proceeding with fail-open');
      } else {
        logger.error({ ...context, error: failureDescription }, 'Policy service unavailable, blocking with fail-closed');
      }

      return decision;
    }
  }
}
