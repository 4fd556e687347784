import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import axios from 'axios';
import type { Server } from 'node:http';
import { createApp, TokenStore } from '@relayhook/mock-server';
import { ApiError, AuthenticationError, AuthorizationError, ConfigurationError } from '@relayhook/shared';
import { Relayhook } from './client.js';
import { DEFAULT_SERVER_URL } from './config.js';
import { silentLogger, TEST_TOKEN } from './test-utils.js';

describe('Relayhook', () => {
  it('requires a token', () => {
    expect(() => new Relayhook('')).toThrow(ConfigurationError);
  });

  it('defaults the server url', () => {
    expect(new Relayhook(TEST_TOKEN, { logger: silentLogger }).serverUrl).toBe(DEFAULT_SERVER_URL);
  });

  describe('against the mock server', () => {
    const store = new TokenStore();
    let server: Server;
    let serverUrl: string;
    // Loopback traffic must not go through an environment proxy
    const clientOptions = () => ({ serverUrl, logger: silentLogger, axiosInstance: axios.create({ proxy: false }) });

    beforeAll(async () => {
      const app = createApp({ token: TEST_TOKEN, logger: silentLogger, store });
      server = await new Promise<Server>((resolve) => {
        const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
      });
      const address = server.address();
      if (address === null || typeof address === 'string') {
        throw new Error('Expected a TCP address');
      }
      serverUrl = `http://127.0.0.1:${address.port}/`;
    });

    afterAll(async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    });

    it('gets dashboard access and logs the issued token out', async () => {
      const root = new Relayhook(TEST_TOKEN, clientOptions());

      const access = await root.authentication.dashboardAccess('app_123');

      expect(access.url).toMatch(/^https:\/\/app\.relayhook\.dev\/login#key=/);
      expect(store.get(access.token)?.appId).toBe('app_123');

      const dashboard = new Relayhook(access.token, clientOptions());
      await expect(dashboard.authentication.logout()).resolves.toBeUndefined();
      expect(store.get(access.token)).toBeUndefined();

      await expect(dashboard.authentication.logout()).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('returns the same grant for a repeated idempotency key', async () => {
      const root = new Relayhook(TEST_TOKEN, clientOptions());

      const first = await root.authentication.dashboardAccess('app_456', { idempotencyKey: 'grant-1' });
      const second = await root.authentication.dashboardAccess('app_456', { idempotencyKey: 'grant-1' });

      expect(second).toEqual(first);
    });

    it('reports an empty app id as a validation error', async () => {
      const root = new Relayhook(TEST_TOKEN, clientOptions());

      const error = await root.authentication.dashboardAccess('').catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ httpStatus: 422, code: 'VALIDATION_ERROR' });
    });

    it('checks server health', async () => {
      const root = new Relayhook(TEST_TOKEN, clientOptions());

      await expect(root.health.check()).resolves.toMatchObject({ status: 'ok', version: '0.1.0' });
    });

    it('surfaces server rejections unchanged through the facade', async () => {
      const root = new Relayhook(TEST_TOKEN, clientOptions());

      const error = await root.authentication.logout().catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(AuthorizationError);
      expect(error).toMatchObject({ httpStatus: 403, message: 'Only dashboard tokens can be logged out' });
    });
  });
});
