/**
 * Agent Runtime Guard Configuration
 *
 * All configuration is resolved via environment variables. Nothing here
 * throws at import time; callers that need a setting validate it where it
 * is used (see `Guard.fromConfig`).
 */

export const SDK_VERSION = '0.1.0';

export interface GuardConfig {
  service: {
    name: string;
    version: string;
  };
  api: {
    baseUrl: string;
    apiKey?: string;
    timeoutMs: number;
  };
  guard: {
    agentId?: string;
    enabled: boolean;
    failOpen: boolean;
    policyTimeoutMs: number;
  };
  langfuse?: {
    publicKey: string;
    secretKey: string;
    host: string;
  };
  otlp?: {
    endpoint: string;
    serviceName: string;
  };
  logLevel: string;
}

type Env = Record<string, string | undefined>;

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

export function loadConfig(env: Env = process.env): GuardConfig {
  const publicKey = env.LANGFUSE_PUBLIC_KEY;
  const secretKey = env.LANGFUSE_SECRET_KEY;
  const otlpEndpoint = env.OTEL_EXPORTER_OTLP_ENDPOINT;

  return {
    service: {
      name: getEnvOrDefault(env, 'OTEL_SERVICE_NAME', 'agent-runtime-guard'),
      version: SDK_VERSION,
    },
    api: {
      baseUrl: getEnvOrDefault(env, 'GUARD_BASE_URL', 'http://localhost:8080'),
      apiKey: env.GUARD_API_KEY,
      timeoutMs: getEnvNumber(env, 'GUARD_TIMEOUT_MS', 30000),
    },
    guard: {
      agentId: env.GUARD_AGENT_ID,
      enabled: getEnvBoolean(env, 'GUARD_ENABLED', true),
      // fail-closed unless explicitly opted out
      failOpen: getEnvBoolean(env, 'GUARD_FAIL_OPEN', false),
      policyTimeoutMs: getEnvNumber(env, 'GUARD_POLICY_TIMEOUT_MS', 5000),
    },
    ...(publicKey && secretKey
      ? {
          langfuse: {
            publicKey,
            secretKey,
            host: getEnvOrDefault(env, 'LANGFUSE_HOST', 'https://cloud.langfuse.com'),
          },
        }
      : {}),
    ...(otlpEndpoint
      ? {
          otlp: {
            endpoint: otlpEndpoint,
            serviceName: getEnvOrDefault(env, 'OTEL_SERVICE_NAME', 'agent-runtime-guard'),
          },
        }
      : {}),
    logLevel: getEnvOrDefault(env, 'LOG_LEVEL', 'info'),
  };
}

export const config = loadConfig();
