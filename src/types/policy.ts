/**
 * Policy decision model.
 */

export type DecisionType = 'allow' | 'deny' | 'warn' | 'require_approval';

export const DECISION_TYPES: readonly DecisionType[] = ['allow', 'deny', 'warn', 'require_approval'];

/**
 * A rule the policy service reports as violated. The service owns the shape;
 * only the identifying fields are typed.
 */
export interface PolicyViolation {
  rule_id?: string;
  rule_name?: string;
  message?: string;
  severity?: string;
  [key: string]: unknown;
}

/**
 * Result of one policy evaluation. Frozen once built.
 *
 * Invariant: decision 'deny' implies allow === false. allow === true is
 * compatible with 'warn' (warn-and-proceed).
 */
export interface PolicyDecision {
  readonly allow: boolean;
  readonly decision: DecisionType;
  readonly reasons: readonly string[];
  readonly violations: readonly PolicyViolation[];
  readonly eval_time_us: number;
  readonly metadata: Readonly<Record<string, unknown>>;
}
