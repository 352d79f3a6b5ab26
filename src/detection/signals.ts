/**
 * Security signal construction.
 */
import { v4 as uuidv4 } from 'uuid';
import { SecuritySignal, Severity, SignalType } from '../types';

export function createSignal(params: {
  type: SignalType;
  severity: Severity;
  title: string;
  description: string;
  evidence?: Record<string, unknown>;
  mitigated?: boolean;
}): SecuritySignal {
  return {
    id: uuidv4(),
    type: params.type,
    severity: params.severity,
    title: params.title,
    description: params.description,
    evidence: { ...params.evidence },
    timestamp: new Date(),
    mitigated: params.mitigated ?? false,
  };
}

export function markMitigated(signal: SecuritySignal): SecuritySignal {
  signal.mitigated = true;
  return signal;
}
