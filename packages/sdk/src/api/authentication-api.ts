import {
  AUTH_ROUTES,
  validateDashboardAccessOut,
  type DashboardAccessOut,
  type RequestOptions,
} from '@relayhook/shared';
import type { AuthenticationClient } from '../authentication.js';
import type { HttpClient } from '../http-client.js';

/**
 * Endpoint-per-method client for /api/v1/auth.
 */
export class AuthenticationApi implements AuthenticationClient {
  constructor(private readonly http: HttpClient) {}

  /** POST /api/v1/auth/dashboard-access/{app_id}/ */
  async getDashboardAccess(appId: string, options: RequestOptions = {}): Promise<DashboardAccessOut> {
    const response = await this.http.request({
      method: 'POST',
      path: AUTH_ROUTES.dashboardAccess(appId),
      options,
    });
    return validateDashboardAccessOut(response.data);
  }

  /** POST /api/v1/auth/logout/ */
  async logout(options: RequestOptions = {}): Promise<void> {
    await this.http.request({
      method: 'POST',
      path: AUTH_ROUTES.logout,
      options,
    });
  }
}
