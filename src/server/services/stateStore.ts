// =============================================================================
// OAuth State Store — one-time CSRF tokens for the Atlassian login flow
// =============================================================================
//   create(value?)            — issue a token valid for 10 minutes
//   validateAndConsume(token) — true exactly once per live token
//
// Memory-resident only: a restart drops pending logins, which is fine because
// the redirect round-trip has to finish inside the TTL anyway. Expired entries
// are swept on every create and validate call; there is no background timer.
// =============================================================================
import crypto from 'crypto';
import logger from '../utils/logger';

/** Lifetime of a state token: 600 s */
export const STATE_TTL_MS = 10 * 60 * 1000;

export interface StateStoreOptions {
  ttlMs?: number;
  now?: () => number;
}

export class OAuthStateStore {
  private readonly entries = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor({ ttlMs = STATE_TTL_MS, now = Date.now }: StateStoreOptions = {}) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  /**
   * Records a state token and returns it. Without `value` a fresh
   * URL-safe token is generated from 32 random bytes.
   */
  create(value?: string): string {
    this.sweep();

    const token = value ?? crypto.randomBytes(32).toString('base64url');
    this.entries.set(token, this.now() + this.ttlMs);
    logger.debug('OAuth state issued', { pending: this.entries.size });
    return token;
  }

  /**
   * Returns `false` if the token is absent, expired or already consumed.
   * Otherwise removes it and returns `true`.
   */
  validateAndConsume(token: string): boolean {
    this.sweep();

    const expiresAt = this.entries.get(token);
    if (expiresAt === undefined) return false;

    // Delete before answering so a racing second callback cannot also win
    this.entries.delete(token);
    return this.now() < expiresAt;
  }

  /** Drops every entry whose expiry has passed. Returns the number removed. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [token, expiresAt] of this.entries) {
      if (now >= expiresAt) {
        this.entries.delete(token);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug('Expired OAuth states swept', { removed });
    }
    return removed;
  }

  has(token: string): boolean {
    return this.entries.has(token);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
