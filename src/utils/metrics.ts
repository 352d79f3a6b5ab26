/**
 * Guard Metrics
 *
 * Provides structured metrics for:
 * - Policy decisions and check latency
 * - Security signals by type and severity
 * - Trace outcomes and span durations
 * - Export outcomes per exporter
 *
 * Metrics live in a dedicated registry so that embedding the guard never
 * pollutes the host application's default registry.
 */
import { Counter, Histogram, Registry } from 'prom-client';

export const metricsRegistry = new Registry();

export const policyDecisions = new Counter({
  name: 'guard_policy_decisions_total',
  help: 'Total policy decisions by outcome and source',
  labelNames: ['decision', 'source'],
  registers: [metricsRegistry],
});

export const policyCheckLatency = new Histogram({
  name: 'guard_policy_check_latency_ms',
  help: 'Policy check round-trip latency in milliseconds',
  labelNames: ['source'],
  buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000, 5000],
  registers: [metricsRegistry],
});

export const securitySignals = new Counter({
  name: 'guard_security_signals_total',
  help: 'Total security signals attached to traces',
  labelNames: ['type', 'severity'],
  registers: [metricsRegistry],
});

export const tracesFinished = new Counter({
  name: 'guard_traces_total',
  help: 'Total traces finalized by status',
  labelNames: ['status'],
  registers: [metricsRegistry],
});

export const spanDuration = new Histogram({
  name: 'guard_span_duration_ms',
  help: 'Span duration in milliseconds',
  labelNames: ['type', 'status'],
  buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [metricsRegistry],
});

export const exportsTotal = new Counter({
  name: 'guard_trace_exports_total',
  help: 'Total trace exports by exporter and result',
  labelNames: ['exporter', 'result'],
  registers: [metricsRegistry],
});

export type DecisionSource = 'remote' | 'fail_open' | 'fail_closed' | 'disabled';

export function recordPolicyDecision(decision: string, source: DecisionSource, latencyMs?: number): void {
  policyDecisions.inc({ decision, source });
  if (latencyMs !== undefined) {
    policyCheckLatency.observe({ source }, latencyMs);
  }
}

export function recordSignal(type: string, severity: string): void {
  securitySignals.inc({ type, severity });
}

export function recordTraceFinished(status: string): void {
  tracesFinished.inc({ status });
}

export function recordSpanDuration(type: string, status: string, durationMs: number): void {
  spanDuration.observe({ type, status }, durationMs);
}

export function recordExport(exporter: string, success: boolean): void {
  exportsTotal.inc({ exporter, result: success ? 'success' : 'failure' });
}

/**
 * Get metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}

