/**
 * Agent Governor Configuration
 *
 * Process-level settings resolved from environment variables. Governance
 * policy (modes, thresholds, capabilities) is loaded separately from the
 * policy documents at GOVERNANCE_POLICY_PATH.
 */
import { ConfigurationError } from './errors';

export type PlatformEnvironment = 'dev' | 'staging' | 'prod';

export interface GovernorConfig {
  service: {
    name: string;
    version: string;
    port: number;
    environment: PlatformEnvironment;
  };
  policy: {
    path: string;
  };
  sampler: {
    collectorTimeoutMs: number;
    windowCapacity: number;
    eventCountWindowMs: number;
  };
  controller: {
    tickMs: number;
    staleAfterMs: number;
  };
  modelBackend: {
    url?: string;
    apiKey?: string;
    timeoutMs: number;
    model: string;
  };
  executor: {
    maxToolIterations: number;
  };
}

const ENVIRONMENTS: readonly PlatformEnvironment[] = ['dev', 'staging', 'prod'];

function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new ConfigurationError(`Environment variable ${key} must be a non-negative integer`, {
      received: value,
    });
  }
  return parsed;
}

function getEnvironment(): PlatformEnvironment {
  const value = getEnvOrDefault('PLATFORM_ENV', 'dev');
  const match = ENVIRONMENTS.find((env) => env === value);
  if (!match) {
    throw new ConfigurationError(`PLATFORM_ENV must be one of ${ENVIRONMENTS.join(', ')}`, {
      received: value,
    });
  }
  return match;
}

export function loadConfig(): GovernorConfig {
  return {
    service: {
      name: getEnvOrDefault('SERVICE_NAME', 'agent-governor'),
      version: getEnvOrDefault('SERVICE_VERSION', '0.1.0'),
      port: getEnvNumber('PORT', 8080),
      environment: getEnvironment(),
    },
    policy: {
      path: getEnvOrDefault('GOVERNANCE_POLICY_PATH', 'config/governance'),
    },
    sampler: {
      collectorTimeoutMs: getEnvNumber('SAMPLER_COLLECTOR_TIMEOUT_MS', 2000),
      windowCapacity: getEnvNumber('SAMPLER_WINDOW_CAPACITY', 720),
      eventCountWindowMs: getEnvNumber('EVENT_COUNT_WINDOW_MS', 600000), // 10 minutes
    },
    controller: {
      tickMs: getEnvNumber('CONTROLLER_TICK_MS', 1000),
      staleAfterMs: getEnvNumber('METRIC_STALE_AFTER_MS', 30000),
    },
    modelBackend: {
      url: process.env.MODEL_BACKEND_URL,
      apiKey: process.env.MODEL_BACKEND_API_KEY,
      timeoutMs: getEnvNumber('MODEL_BACKEND_TIMEOUT_MS', 60000),
      model: getEnvOrDefault('MODEL_BACKEND_MODEL', 'default'),
    },
    executor: {
      maxToolIterations: getEnvNumber('MAX_TOOL_ITERATIONS', 5),
    },
  };
}
