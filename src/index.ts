/**
 * Agent Runtime Guard
 *
 * In-process guard for autonomous agents: trace recording, pre-action policy
 * checks, security signal detection and trace export.
 */

export * from './types';
export * from './tracing';
export * from './policy';
export * from './detection';
export * from './exporters';
export * from './guard';

export { GuardApiClient, API_PATHS, SDK_VERSION_HEADER, traceToWire } from './integrations/guard-api';
export type { GuardApiClientOptions, HealthStatus, TraceWire } from './integrations/guard-api';
export { AxiosTransport, TransportError } from './integrations/http';
export type { AxiosTransportOptions, HttpTransport, TransportRequest, TransportResponse } from './integrations/http';

export { GuardError, ConfigurationError, describeError } from './utils/errors';
export { loadConfig, config, SDK_VERSION } from './utils/config';
export type { GuardConfig } from './utils/config';
export { logger } from './utils/logger';
export { metricsRegistry, getMetrics } from './utils/metrics';
