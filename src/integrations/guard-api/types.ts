/**
 * Guard API wire contract.
 *
 * Request bodies sent to the policy/ingestion service. Field names follow the
 * service's snake_case JSON.
 */

export interface PolicyEvaluationRequest {
  agent: { id: string };
  tool?: { name: string; parameters: Record<string, unknown> };
  data?: { classification: string };
}

export interface PreInvokeRequest {
  agent_id: string;
  tool: { name: string; parameters: Record<string, unknown> };
  session_id: string;
  timestamp: string;
}

export interface PostInvokeRequest {
  agent_id: string;
  tool: { name: string };
  /** 16-hex-char truncated digest, never raw content */
  result_hash: string;
  duration_ms: number;
  session_id: string;
  timestamp: string;
}

export interface SpanEventWire {
  name: string;
  timestamp: string;
  attributes: Record<string, unknown>;
}

export interface SpanWire {
  span_id: string;
  parent_span_id: string | null;
  name: string;
  type: string;
  start_time: string;
  end_time: string | null;
  duration_ms: number;
  status: string;
  attributes: Record<string, unknown>;
  events: SpanEventWire[];
}

export interface SecuritySignalWire {
  id: string;
  type: string;
  severity: string;
  title: string;
  description: string;
  evidence: Record<string, unknown>;
  timestamp: string;
  mitigated: boolean;
}

export interface TraceWire {
  trace_id: string;
  agent_id: string;
  session_id: string;
  user_id: string | null;
  start_time: string;
  end_time: string | null;
  status: string;
  spans: SpanWire[];
  security_signals: SecuritySignalWire[];
  metadata: Record<string, unknown>;
}

export interface HealthStatus {
  healthy: boolean;
  latency_ms: number;
}
