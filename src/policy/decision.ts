/**
 * Policy decision construction and interpretation.
 */
import { DECISION_TYPES, DecisionType, PolicyDecision, PolicyViolation } from '../types';
import { PolicyResponseError } from './errors';

export type FailMode = 'open' | 'closed';

/**
 * Build a frozen decision, enforcing that 'deny' never allows.
 */
export function buildDecision(params: {
  allow: boolean;
  decision: DecisionType;
  reasons?: string[];
  violations?: PolicyViolation[];
  evalTimeUs?: number;
  metadata?: Record<string, unknown>;
}): PolicyDecision {
  const decision: PolicyDecision = {
    allow: params.decision === 'deny' ? false : params.allow,
    decision: params.decision,
    reasons: Object.freeze([...(params.reasons ?? [])]),
    violations: Object.freeze([...(params.violations ?? [])]),
    eval_time_us: Math.max(0, Math.round(params.evalTimeUs ?? 0)),
    metadata: Object.freeze({ ...params.metadata }),
  };
  return Object.freeze(decision);
}

export function allowAll(): PolicyDecision {
  return buildDecision({ allow: true, decision: 'allow', metadata: { enforcement: 'disabled' } });
}

function isDecisionType(value: unknown): value is DecisionType {
  return typeof value === 'string' && DECISION_TYPES.some((type) => type === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const TYPED_VIOLATION_KEYS = ['rule_id', 'rule_name', 'message', 'severity'];

function toViolation(record: Record<string, unknown>): PolicyViolation {
  const violation: PolicyViolation = {};
  for (const [key, value] of Object.entries(record)) {
    if (TYPED_VIOLATION_KEYS.includes(key) && typeof value !== 'string') {
      continue;
    }
    violation[key] = value;
  }
  return violation;
}

function defaultAllow(decision: DecisionType): boolean {
  return decision === 'allow' || decision === 'warn';
}

/**
 * Interpret a policy service payload.
 *
 * - missing or unknown `decision` is read as 'allow'
 * - missing `allow` follows the decision (allow/warn proceed, deny/require_approval do not)
 * - non-string reasons and non-object violations are dropped
 *
 * @throws PolicyResponseError if the payload is not a JSON object
 */
export function parsePolicyResponse(payload: unknown): PolicyDecision {
  if (!isRecord(payload)) {
    throw new PolicyResponseError('Policy response must be a JSON object', { received: typeof payload });
  }

  const decision: DecisionType = isDecisionType(payload.decision) ? payload.decision : 'allow';
  const allow = typeof payload.allow === 'boolean' ? payload.allow : defaultAllow(decision);

  const reasons = Array.isArray(payload.reasons)
    ? payload.reasons.filter((reason): reason is string => typeof reason === 'string')
    : [];
  const violations = Array.isArray(payload.violations)
    ? payload.violations.filter(isRecord).map(toViolation)
    : [];
  const evalTimeUs = typeof payload.eval_time_us === 'number' ? payload.eval_time_us : 0;

  return buildDecision({ allow, decision, reasons, violations, evalTimeUs });
}

/**
 * The decision substituted when the policy service cannot be consulted.
 */
export function fallbackDecision(mode: FailMode, failureDescription: string): PolicyDecision {
  if (mode === 'open') {
    return buildDecision({
      allow: true,
      decision: 'warn',
      reasons: [`Policy service unavailable: ${failureDescription}. Proceeding with fail-open.`],
      metadata: { fallback: 'fail_open', error: failureDescription },
    });
  }
  return buildDecision({
    allow: false,
    decision: 'deny',
    reasons: [`Policy service unavailable: ${failureDescription}. Blocking due to fail-closed policy.`],
    metadata: { fallback: 'fail_closed', error: failureDescription },
  });
}

function violationLabel(violation: PolicyViolation): string | undefined {
  return violation.rule_name ?? violation.rule_id ?? violation.message;
}

/**
 * Human-readable reason for a blocked action, enumerating every reason and
 * every violated rule the service reported.
 */
export function describeDenial(decision: PolicyDecision, toolName: string): string {
  const reasons = decision.reasons.length > 0 ? decision.reasons.join('; ') : `decision '${decision.decision}'`;
  const rules = decision.violations
    .map(violationLabel)
    .filter((label): label is string => label !== undefined);

  const suffix = rules.length > 0 ? ` (violated rules: ${rules.join(', ')})` : '';
  return `Tool '${toolName}' blocked by policy: ${reasons}${suffix}`;
}
