import {
  HEALTH_ROUTE,
  validateHealthResponse,
  type HealthResponse,
  type RequestOptions,
} from '@relayhook/shared';
import type { HttpClient } from '../http-client.js';

export class HealthApi {
  constructor(private readonly http: HttpClient) {}

  /** GET /health */
  async check(options: RequestOptions = {}): Promise<HealthResponse> {
    const response = await this.http.request({ method: 'GET', path: HEALTH_ROUTE, options });
    return validateHealthResponse(response.data);
  }
}
