import { AuthenticationApi } from './api/authentication-api.js';
import { HealthApi } from './api/health-api.js';
import { Authentication } from './authentication.js';
import { resolveHttpClientConfig, type ClientOptions } from './config.js';
import { HttpClient } from './http-client.js';

/**
 * Top-level client. One instance per auth token.
 */
export class Relayhook {
  public readonly authentication: Authentication;
  public readonly health: HealthApi;
  private readonly http: HttpClient;

  constructor(token: string, options: ClientOptions = {}) {
    this.http = new HttpClient(resolveHttpClientConfig(token, options));
    this.authentication = new Authentication(new AuthenticationApi(this.http));
    this.health = new HealthApi(this.http);
  }

  get serverUrl(): string {
    return this.http.baseUrl;
  }
}
