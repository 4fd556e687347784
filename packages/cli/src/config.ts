import { DEFAULT_SERVER_URL, DEFAULT_TIMEOUT_MS } from '@relayhook/sdk';
import { ConfigurationError } from '@relayhook/shared';

// CLI Configuration
export interface CLIConfig {
  token?: string;
  serverUrl: string;
  timeoutMs: number;
  logLevel: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CLIConfig {
  const timeoutMs = parseInt(env.RELAYHOOK_TIMEOUT_MS || String(DEFAULT_TIMEOUT_MS));
  if (Number.isNaN(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`RELAYHOOK_TIMEOUT_MS must be a positive integer, got "${env.RELAYHOOK_TIMEOUT_MS}"`);
  }

  return {
    token: env.RELAYHOOK_AUTH_TOKEN || undefined,
    serverUrl: env.RELAYHOOK_SERVER_URL || DEFAULT_SERVER_URL,
    timeoutMs,
    logLevel: env.LOG_LEVEL || 'warn'
  };
}

export function redactConfig(config: CLIConfig): Record<string, unknown> {
  return {
    ...config,
    token: config.token ? '[REDACTED]' : '(not set)'
  };
}
