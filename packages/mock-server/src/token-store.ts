import { v4 as uuidv4 } from 'uuid';

export interface DashboardToken {
  token: string;
  appId: string;
  issuedAt: Date;
}

/**
 * In-memory registry of dashboard tokens issued by the mock server
 */
export class TokenStore {
  private tokens = new Map<string, DashboardToken>();

  issue(appId: string, now: Date = new Date()): DashboardToken {
    const entry: DashboardToken = {
      token: `appsk_${uuidv4().replace(/-/g, '')}`,
      appId,
      issuedAt: now
    };
    this.tokens.set(entry.token, entry);
    return entry;
  }

  get(token: string): DashboardToken | undefined {
    return this.tokens.get(token);
  }

  /**
   * @returns whether the token existed
   */
  revoke(token: string): boolean {
    return this.tokens.delete(token);
  }

  size(): number {
    return this.tokens.size;
  }
}

export interface CachedResponse {
  status: number;
  body: unknown;
}

/**
 * Replays the first response given for an idempotency key.
 * Holds at most `maxEntries` responses and forgets the oldest first.
 */
export class IdempotencyCache {
  private responses = new Map<string, CachedResponse>();

  constructor(private readonly maxEntries: number = 1000) {}

  private static key(token: string, path: string, idempotencyKey: string): string {
    return `${token}\u0000${path}\u0000${idempotencyKey}`;
  }

  get(token: string, path: string, idempotencyKey: string): CachedResponse | undefined {
    return this.responses.get(IdempotencyCache.key(token, path, idempotencyKey));
  }

  set(token: string, path: string, idempotencyKey: string, response: CachedResponse): void {
    const key = IdempotencyCache.key(token, path, idempotencyKey);
    this.responses.delete(key);
    this.responses.set(key, response);

    // Maps iterate in insertion order
    for (const oldest of this.responses.keys()) {
      if (this.responses.size <= this.maxEntries) break;
      this.responses.delete(oldest);
    }
  }

  size(): number {
    return this.responses.size;
  }
}
