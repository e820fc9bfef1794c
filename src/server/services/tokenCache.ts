// =============================================================================
// Token Cache — the single process-wide Atlassian credential set
// =============================================================================
// Public API:
//   get() / set(record) / clear()
//   isExpired()    — expiry check with a 60 s safety margin
//   ensureValid()  — returns a usable record, refreshing first if expired
//   status()       — safe view (presence flags only, NEVER token values)
//   onChange(fn)   — notified on every set/clear (site cache invalidation)
//
// One logical session for the whole process: there is no per-user scoping.
// =============================================================================
import type { TokenRecord, TokenStatus } from '../types';
import logger from '../utils/logger';
import { AuthenticationRequiredError } from '../utils/GatewayError';

/** Treat a token as expired this long before its real expiry */
export const EXPIRY_SAFETY_MARGIN_MS = 60 * 1000;

export type TokenRefresher = (refreshToken: string) => Promise<TokenRecord>;
export type TokenChangeListener = (record: TokenRecord | null) => void;

export interface TokenCacheOptions {
  refresh: TokenRefresher;
  safetyMarginMs?: number;
  now?: () => number;
}

export class TokenCache {
  private record: TokenRecord | null = null;
  private inflightRefresh: Promise<TokenRecord> | null = null;
  private readonly listeners: TokenChangeListener[] = [];
  private readonly refresh: TokenRefresher;
  private readonly safetyMarginMs: number;
  private readonly now: () => number;

  constructor({ refresh, safetyMarginMs = EXPIRY_SAFETY_MARGIN_MS, now = Date.now }: TokenCacheOptions) {
    this.refresh = refresh;
    this.safetyMarginMs = safetyMarginMs;
    this.now = now;
  }

  get(): TokenRecord | null {
    return this.record;
  }

  /** Overwrites the single global record */
  set(record: TokenRecord): void {
    this.record = { ...record };
    // A refresh still running belongs to the replaced record
    this.inflightRefresh = null;
    this.emit();
  }

  clear(): void {
    if (!this.record) return;
    this.record = null;
    this.inflightRefresh = null;
    this.emit();
  }

  onChange(listener: TokenChangeListener): void {
    this.listeners.push(listener);
  }

  isExpired(): boolean {
    if (!this.record) return true;
    return this.record.expiresAt - this.safetyMarginMs <= this.now();
  }

  /**
   * Returns a non-expired record, running the refresh grant first when
   * needed. Concurrent callers share one in-flight refresh.
   *
   * @throws AuthenticationRequiredError — no token, no refresh token, or refresh failed
   */
  async ensureValid(): Promise<TokenRecord> {
    const current = this.record;
    if (!current) {
      throw new AuthenticationRequiredError();
    }
    if (!this.isExpired()) {
      return current;
    }
    if (!current.refreshToken) {
      logger.info('Atlassian access token expired and no refresh token is cached');
      throw new AuthenticationRequiredError('Atlassian session expired. Log in again.');
    }

    if (!this.inflightRefresh) {
      const refreshToken = current.refreshToken;
      const refreshing: Promise<TokenRecord> = this.refresh(refreshToken)
        .then((refreshed) => this.settleRefresh(current, refreshed))
        .finally(() => {
          if (this.inflightRefresh === refreshing) this.inflightRefresh = null;
        });
      this.inflightRefresh = refreshing;
    }

    try {
      return await this.inflightRefresh;
    } catch (err) {
      if (err instanceof AuthenticationRequiredError) throw err;
      logger.error('Atlassian token refresh failed, clearing cached session', {
        error: err instanceof Error ? err.message : String(err),
      });
      // A login that landed while the refresh was running stays
      if (this.record === current) this.clear();
      throw new AuthenticationRequiredError('Atlassian session could not be refreshed. Log in again.');
    }
  }

  /**
   * Stores a refresh result only if the record it was started from is still
   * cached. A logout or a new login during the refresh wins over it.
   */
  private settleRefresh(startedFrom: TokenRecord, refreshed: TokenRecord): TokenRecord {
    if (this.record === startedFrom) {
      this.set(refreshed);
      return refreshed;
    }
    if (this.record) {
      logger.info('Discarding Atlassian refresh result: a newer session was cached meanwhile');
      return this.record;
    }
    logger.info('Discarding Atlassian refresh result: session was cleared meanwhile');
    throw new AuthenticationRequiredError();
  }

  status(): TokenStatus {
    const r = this.record;
    return {
      authenticated: r !== null && (!this.isExpired() || Boolean(r.refreshToken)),
      accessTokenPresent: Boolean(r?.accessToken),
      refreshTokenPresent: Boolean(r?.refreshToken),
      expiresAt: r ? new Date(r.expiresAt).toISOString() : null,
      scope: r?.scope ?? null,
      tokenType: r?.tokenType ?? null,
    };
  }

  private emit(): void {
    for (const listener of this.listeners) {
      listener(this.record);
    }
  }
}
