import type { DashboardAccessOut, RequestOptions } from '@relayhook/shared';

/**
 * The operations Authentication forwards to. AuthenticationApi is the HTTP
 * implementation; any object with these two methods can stand in for it.
 */
export interface AuthenticationClient<TAccess = DashboardAccessOut, TLogout = void> {
  getDashboardAccess(appId: string, options: RequestOptions): Promise<TAccess>;
  logout(options: RequestOptions): Promise<TLogout>;
}

/**
 * Named entry point for the authentication endpoints.
 *
 * Holds the client it was given and forwards each call to it once, with the
 * same arguments. Results and errors come back exactly as the client produced
 * them.
 */
export class Authentication<TAccess = DashboardAccessOut, TLogout = void> {
  constructor(private readonly client: AuthenticationClient<TAccess, TLogout>) {}

  /**
   * Get a one-time link that logs a user into the dashboard of `appId`.
   */
  dashboardAccess(appId: string, options: RequestOptions = {}): Promise<TAccess> {
    return this.client.getDashboardAccess(appId, options);
  }

  /**
   * Invalidate the token the client authenticates with.
   */
  logout(options: RequestOptions = {}): Promise<TLogout> {
    return this.client.logout(options);
  }
}
