/**
 * Security signals: advisory records of security-relevant patterns detected
 * in prompts, outputs and tool usage.
 */

export type SignalType =
  | 'injection_attempt'
  | 'data_exfiltration'
  | 'tool_abuse'
  | 'privilege_escalation'
  | 'anomalous_behavior'
  | 'policy_violation'
  | 'rate_limit_exceeded';

export type Severity = 'low' | 'medium' | 'high' | 'critical';

export interface SecuritySignal {
  id: string;
  type: SignalType;
  severity: Severity;
  title: string;
  description: string;
  evidence: Record<string, unknown>;
  timestamp: Date;
  /** The only field that may change after creation */
  mitigated: boolean;
}
