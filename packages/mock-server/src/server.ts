#!/usr/bin/env node
/**
 * Relayhook mock API server
 * Serves the authentication endpoints from memory for local development and tests
 */

import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { createServer } from 'http';
import cors from 'cors';
import helmet from 'helmet';
import dotenv from 'dotenv';
import { v4 as uuidv4 } from 'uuid';
import {
  API_PREFIX,
  AppIdSchema,
  HEADERS,
  RELAYHOOK_VERSION,
  createLogger,
  type DashboardAccessOut,
  type HealthResponse,
  type HttpErrorOut,
  type HttpValidationError,
  type Logger,
  type Region
} from '@relayhook/shared';
import { loadMockServerConfig, type MockServerEnvConfig } from './config.js';
import { IdempotencyCache, TokenStore } from './token-store.js';

export { loadMockServerConfig, type MockServerEnvConfig } from './config.js';
export { IdempotencyCache, TokenStore } from './token-store.js';
export type { CachedResponse, DashboardToken } from './token-store.js';

export interface MockServerConfig {
  /** Root token accepted on every API route */
  token: string;
  logger?: Logger;
  store?: TokenStore;
  idempotency?: IdempotencyCache;
  dashboardUrl?: string;
  region?: Region;
}

type Principal =
  | { kind: 'root'; token: string }
  | { kind: 'dashboard'; token: string; appId: string };

interface RequestContext {
  requestId: string;
  logger: Logger;
  principal?: Principal;
}

function errorBody(code: string, detail: string): HttpErrorOut {
  return { code, detail };
}

function bearerToken(req: Request): string | undefined {
  const header = req.headers[HEADERS.authorization];
  const match = typeof header === 'string' ? header.match(/^Bearer\s+(\S+)$/i) : null;
  return match?.[1];
}

/**
 * 4xx status carried by errors from body parsing and other middleware
 */
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/**
 * Base64url-encoded login key, as read by the dashboard's /login page
 */
export function encodeLoginKey(appId: string, token: string, region: Region): string {
  return Buffer.from(JSON.stringify({ appId, token, region })).toString('base64url');
}

export function createApp(config: MockServerConfig): express.Express {
  const logger = (config.logger ?? createLogger({ name: 'relayhook-mock-server' })).child({ component: 'mock-server' });
  const store = config.store ?? new TokenStore();
  const idempotency = config.idempotency ?? new IdempotencyCache();
  const dashboardUrl = (config.dashboardUrl ?? 'https://app.relayhook.dev').replace(/\/+$/, '');
  const region = config.region ?? 'us';
  const startedAt = Date.now();
  const contexts = new WeakMap<Request, RequestContext>();

  const contextOf = (req: Request): RequestContext => {
    const context = contexts.get(req);
    if (!context) {
      throw new Error('Request context missing');
    }
    return context;
  };

  const app: express.Express = express();

  // Middleware
  app.use(helmet());
  app.use(cors({ exposedHeaders: [HEADERS.requestId] }));
  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware
  app.use((req, res, next) => {
    const header = req.headers[HEADERS.requestId];
    const requestId = typeof header === 'string' && header ? header : uuidv4();
    res.setHeader(HEADERS.requestId, requestId);

    const requestLogger = logger.child({
      requestId,
      method: req.method,
      path: req.path
    });
    contexts.set(req, { requestId, logger: requestLogger });

    requestLogger.info({
      userAgent: req.headers[HEADERS.userAgent],
      retryCount: req.headers[HEADERS.retryCount]
    }, 'Incoming request');

    next();
  });

  /**
   * Health check endpoint
   */
  app.get('/health', (_req, res) => {
    const body: HealthResponse = {
      status: 'ok',
      version: RELAYHOOK_VERSION,
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000)
    };
    res.json(body);
  });

  // Bearer authentication for the API
  app.use(API_PREFIX, (req, res, next) => {
    const context = contextOf(req);
    const token = bearerToken(req);

    if (token && token === config.token) {
      context.principal = { kind: 'root', token };
      next();
      return;
    }

    const issued = token ? store.get(token) : undefined;
    if (issued) {
      context.principal = { kind: 'dashboard', token: issued.token, appId: issued.appId };
      next();
      return;
    }

    context.logger.warn('Rejected request with missing or unknown token');
    res.status(401).json(errorBody('authentication_failed', 'Invalid token'));
  });

  /**
   * Issue a dashboard login link for an app
   */
  const grantDashboardAccess: RequestHandler = (req, res) => {
    const context = contextOf(req);
    const principal = context.principal;
    if (principal?.kind !== 'root') {
      res.status(403).json(errorBody('forbidden', 'Dashboard tokens cannot grant dashboard access'));
      return;
    }

    const appId = req.params.appId ?? '';
    const parsed = AppIdSchema.safeParse(appId);
    if (!parsed.success) {
      const body: HttpValidationError = {
        detail: parsed.error.issues.map((issue) => ({
          loc: ['path', 'app_id'],
          msg: issue.message,
          type: 'value_error'
        }))
      };
      res.status(422).json(body);
      return;
    }

    const idempotencyKey = req.headers[HEADERS.idempotencyKey];
    if (typeof idempotencyKey === 'string') {
      const cached = idempotency.get(principal.token, req.path, idempotencyKey);
      if (cached) {
        context.logger.info({ idempotencyKey }, 'Replaying idempotent response');
        res.status(cached.status).json(cached.body);
        return;
      }
    }

    const issued = store.issue(parsed.data);
    const body: DashboardAccessOut = {
      url: `${dashboardUrl}/login#key=${encodeLoginKey(issued.appId, issued.token, region)}`,
      token: issued.token
    };
    if (typeof idempotencyKey === 'string') {
      idempotency.set(principal.token, req.path, idempotencyKey, { status: 200, body });
    }

    context.logger.info({ appId: issued.appId }, 'Dashboard access granted');
    res.status(200).json(body);
  };

  app.post(`${API_PREFIX}/auth/dashboard-access/:appId/`, grantDashboardAccess);
  // An empty app id leaves no segment for :appId to match
  app.post(`${API_PREFIX}/auth/dashboard-access//`, grantDashboardAccess);

  /**
   * Revoke the calling dashboard token
   */
  app.post(`${API_PREFIX}/auth/logout/`, (req, res) => {
    const context = contextOf(req);
    const principal = context.principal;
    if (principal?.kind !== 'dashboard') {
      res.status(403).json(errorBody('forbidden', 'Only dashboard tokens can be logged out'));
      return;
    }

    store.revoke(principal.token);
    context.logger.info({ appId: principal.appId }, 'Dashboard token revoked');
    res.status(204).end();
  });

  app.use((_req, res) => {
    res.status(404).json(errorBody('not_found', 'Not found'));
  });

  // Express recognises error handlers by their four parameters
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestLogger = contexts.get(req)?.logger ?? logger;
    const status = clientErrorStatus(error);
    if (status !== undefined) {
      requestLogger.warn({ error, status }, 'Rejected malformed request');
      res.status(status).json(errorBody('bad_request', error instanceof Error ? error.message : 'Bad request'));
      return;
    }
    requestLogger.error({ error }, 'Request failed');
    res.status(500).json(errorBody('internal_error', 'Internal server error'));
  });

  return app;
}

// Start server if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  dotenv.config();

  const logger = createLogger({ name: 'relayhook-mock-server' });
  let envConfig: MockServerEnvConfig;
  try {
    envConfig = loadMockServerConfig();
  } catch (error) {
    logger.error({ error }, 'Invalid mock server configuration');
    process.exit(1);
  }
  const { port, token, region, dashboardUrl } = envConfig;

  const server = createServer(createApp({ token, logger, region, dashboardUrl }));

  server.listen(port, () => {
    logger.info({ port }, 'Relayhook mock server started');
  });

  function shutdown(signal: string) {
    logger.info({ signal }, 'Shutting down gracefully...');
    server.close((err) => {
      if (err) {
        logger.error({ error: err }, 'Error closing HTTP server');
        process.exit(1);
      }
      logger.info('Graceful shutdown complete');
      process.exit(0);
    });
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
