import { ConfigurationError, RegionSchema, validate, type Region } from '@relayhook/shared';

// Mock server configuration, read from the environment
export interface MockServerEnvConfig {
  port: number;
  token: string;
  region: Region;
  dashboardUrl?: string;
}

export function loadMockServerConfig(env: NodeJS.ProcessEnv = process.env): MockServerEnvConfig {
  const token = env.MOCK_SERVER_TOKEN;
  if (!token) {
    throw new ConfigurationError('MOCK_SERVER_TOKEN must be set');
  }

  const port = parseInt(env.MOCK_SERVER_PORT || '4010');
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`MOCK_SERVER_PORT must be a port number, got "${env.MOCK_SERVER_PORT}"`);
  }

  return {
    port,
    token,
    region: validate(RegionSchema, env.MOCK_SERVER_REGION || 'us', 'MOCK_SERVER_REGION'),
    dashboardUrl: env.MOCK_DASHBOARD_URL || undefined
  };
}
