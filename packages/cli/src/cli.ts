#!/usr/bin/env node
/**
 * Relayhook CLI - call the authentication API from a terminal
 *
 * Usage:
 *   rh auth dashboard-access app_123
 *   rh auth dashboard-access app_123 --idempotency-key grant-1 --json
 *   rh auth logout
 *   rh health
 *   rh config show
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { table } from 'table';
import dotenv from 'dotenv';
import { Relayhook, SDK_VERSION, type Authentication, type HealthApi } from '@relayhook/sdk';
import {
  ConfigurationError,
  createLogger,
  toErrorResponse,
  validateAppId,
  validateAuthToken,
  validateIdempotencyKey,
  type DashboardAccessOut,
  type HealthResponse,
  type RequestOptions
} from '@relayhook/shared';
import { loadConfig, redactConfig, type CLIConfig } from './config.js';

// Load environment variables
dotenv.config();

export const program = new Command();

let config: CLIConfig | undefined;

function currentConfig(): CLIConfig {
  config ??= loadConfig();
  return config;
}

// Utility functions
export function log(message: string, type: 'info' | 'success' | 'error' | 'warning' = 'info') {
  const colors = {
    info: chalk.blue,
    success: chalk.green,
    error: chalk.red,
    warning: chalk.yellow
  };
  console.log(colors[type](message));
}

export function formatError(error: unknown): string {
  const response = toErrorResponse(error);
  const parts = [`${response.code}: ${response.message}`];
  if (response.httpStatus !== undefined) {
    parts.push(`HTTP ${response.httpStatus}`);
  }
  if (response.correlationId) {
    parts.push(`request ${response.correlationId}`);
  }
  return parts.join(' | ');
}

export function createClient(cliConfig: CLIConfig): Relayhook {
  if (!cliConfig.token) {
    throw new ConfigurationError('No auth token. Set RELAYHOOK_AUTH_TOKEN or pass --token');
  }
  return new Relayhook(validateAuthToken(cliConfig.token), {
    serverUrl: cliConfig.serverUrl,
    timeoutMs: cliConfig.timeoutMs,
    logger: createLogger({ name: 'relayhook-cli', level: cliConfig.logLevel })
  });
}

export function createAuthentication(cliConfig: CLIConfig): Authentication {
  return createClient(cliConfig).authentication;
}

/**
 * Progress indicator shown while a request is in flight, e.g. an ora spinner
 */
export interface Progress {
  stop(): unknown;
}

function requestOptions(idempotencyKey: string | undefined): RequestOptions {
  const key = validateIdempotencyKey(idempotencyKey);
  return key ? { idempotencyKey: key } : {};
}

export function accessRows(appId: string, access: DashboardAccessOut): string[][] {
  return [
    ['Property', 'Value'],
    ['App ID', appId],
    ['Token', access.token],
    ['Login URL', access.url]
  ];
}

export interface DashboardAccessCommandOptions {
  idempotencyKey?: string;
  json?: boolean;
}

export async function handleDashboardAccess(
  authentication: Authentication,
  appId: string,
  options: DashboardAccessCommandOptions,
  progress?: Progress
): Promise<DashboardAccessOut> {
  const access = await authentication
    .dashboardAccess(validateAppId(appId), requestOptions(options.idempotencyKey))
    .finally(() => progress?.stop());

  if (options.json) {
    console.log(JSON.stringify(access, null, 2));
  } else {
    log('✅ Dashboard access granted', 'success');
    console.log(table(accessRows(appId, access)));
    log(`💡 Open ${chalk.bold(access.url)} to log in`, 'info');
  }
  return access;
}

export interface LogoutCommandOptions {
  idempotencyKey?: string;
}

export async function handleLogout(
  authentication: Authentication,
  options: LogoutCommandOptions,
  progress?: Progress
): Promise<void> {
  await authentication.logout(requestOptions(options.idempotencyKey)).finally(() => progress?.stop());
  log('👋 Logged out', 'success');
}

export function healthRows(health: HealthResponse): string[][] {
  return [
    ['Property', 'Value'],
    ['Status', health.status],
    ['Version', health.version],
    ['Uptime', health.uptimeSeconds === undefined ? 'unknown' : `${health.uptimeSeconds}s`]
  ];
}

export async function handleHealth(health: Pick<HealthApi, 'check'>, progress?: Progress): Promise<HealthResponse> {
  const result = await health.check().finally(() => progress?.stop());
  log(result.status === 'ok' ? '✅ Server is healthy' : `⚠️  Server is ${result.status}`, result.status === 'ok' ? 'success' : 'warning');
  console.log(table(healthRows(result)));
  return result;
}

// Auth commands
const authCommand = program
  .command('auth')
  .description('Authentication endpoints');

authCommand
  .command('dashboard-access')
  .description('Get a one-time dashboard login link for an app')
  .argument('<appId>', 'App ID or uid')
  .option('--idempotency-key <key>', 'Idempotency key for the request')
  .option('--json', 'Print the raw response as JSON')
  .action(async (appId: string, options: DashboardAccessCommandOptions) => {
    const spinner = ora('Requesting dashboard access...').start();

    try {
      const authentication = createAuthentication(currentConfig());
      await handleDashboardAccess(authentication, appId, options, spinner);
    } catch (error) {
      spinner.stop();
      log(`❌ ${formatError(error)}`, 'error');
      process.exit(1);
    }
  });

authCommand
  .command('logout')
  .description('Invalidate the token the CLI is using')
  .option('--idempotency-key <key>', 'Idempotency key for the request')
  .action(async (options: LogoutCommandOptions) => {
    const spinner = ora('Logging out...').start();

    try {
      const authentication = createAuthentication(currentConfig());
      await handleLogout(authentication, options, spinner);
    } catch (error) {
      spinner.stop();
      log(`❌ ${formatError(error)}`, 'error');
      process.exit(1);
    }
  });

// Health command
program
  .command('health')
  .description('Check that the API server is reachable')
  .action(async () => {
    const spinner = ora('Checking server health...').start();

    try {
      await handleHealth(createClient(currentConfig()).health, spinner);
    } catch (error) {
      spinner.stop();
      log(`❌ ${formatError(error)}`, 'error');
      process.exit(1);
    }
  });

// Configuration commands
const configCommand = program
  .command('config')
  .description('Manage CLI configuration');

configCommand
  .command('show')
  .description('Show current configuration')
  .action(() => {
    console.log(chalk.bold('Relayhook CLI Configuration:'));
    console.log();
    console.log(JSON.stringify(redactConfig(currentConfig()), null, 2));
  });

// Main program setup
program
  .name('rh')
  .description('Relayhook CLI - call the authentication API')
  .version(SDK_VERSION)
  .option('-v, --verbose', 'Enable debug logging')
  .option('--token <token>', 'Auth token (defaults to RELAYHOOK_AUTH_TOKEN)')
  .option('--server-url <url>', 'API base URL (defaults to RELAYHOOK_SERVER_URL)')
  .hook('preAction', (thisCommand) => {
    const options = thisCommand.opts<{ verbose?: boolean; token?: string; serverUrl?: string }>();
    const resolved = currentConfig();
    if (options.token) {
      resolved.token = options.token;
    }
    if (options.serverUrl) {
      resolved.serverUrl = options.serverUrl;
    }
    if (options.verbose) {
      resolved.logLevel = 'debug';
    }
  });

// Parse and execute
if (import.meta.url === `file://${process.argv[1]}`) {
  process.on('unhandledRejection', (reason) => {
    log(`Unhandled rejection: ${reason}`, 'error');
    process.exit(1);
  });

  program.parseAsync().catch((error: unknown) => {
    log(`❌ ${formatError(error)}`, 'error');
    process.exit(1);
  });
}
