/**
 * Policy - Error Classes
 */
import { GuardError } from '../utils/errors';
import { PolicyDecision } from '../types';

/**
 * The policy service did not answer within the gateway's timeout.
 */
export class PolicyTimeoutError extends GuardError {
  constructor(timeoutMs: number) {
    super(`Policy check timed out after ${timeoutMs}ms`, 'POLICY_TIMEOUT', 504, { timeoutMs });
    this.name = 'PolicyTimeoutError';
  }
}

/**
 * The policy service answered with a payload that is not a decision.
 */
export class PolicyResponseError extends GuardError {
  constructor(message: string, details?: unknown) {
    super(message, 'POLICY_RESPONSE_INVALID', 502, details);
    this.name = 'PolicyResponseError';
  }
}

/**
 * For framework adapters whose host only understands exceptions: carries the
 * denying decision. The guard itself never throws this; it returns the
 * decision and lets the caller choose.
 */
export class PolicyDeniedError extends GuardError {
  constructor(
    message: string,
    public readonly decision: PolicyDecision,
  ) {
    super(message, 'POLICY_DENIED', 403, { decision: decision.decision, reasons: decision.reasons });
    this.name = 'PolicyDeniedError';
  }
}
