// =============================================================================
// Atlassian OAuth 2.0 (3LO) — authorization URL, code exchange, refresh
// =============================================================================
//   1. buildAuthorizationUrl — consent URL with CSRF state + prompt=consent
//   2. exchangeCode          — authorization_code grant → TokenRecord
//   3. refreshAccessToken    — refresh_token grant → TokenRecord
//
// SECURITY:
//   - Token values NEVER appear in log output
//   - Upstream error bodies are passed through unchanged so the caller can
//     diagnose without re-querying Atlassian
// =============================================================================
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AppConfig } from '../config';
import type { TokenRecord } from '../types';
import logger from '../utils/logger';
import { callUpstream, parseUpstream } from './atlassianClient';

/* ── Constants ── */
export const ATLASSIAN_AUTHORIZE_URL = 'https://auth.atlassian.com/authorize';
export const ATLASSIAN_TOKEN_URL = 'https://auth.atlassian.com/oauth/token';
const AUDIENCE = 'api.atlassian.com';

/** Used when the token endpoint omits `expires_in` */
const DEFAULT_EXPIRES_IN_S = 3600;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default('Bearer'),
  refresh_token: z.string().optional(),
  expires_in: z.number({ coerce: true }).int().positive().optional(),
  scope: z.string().optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

type OAuthSettings = Pick<
  AppConfig,
  'atlassianClientId' | 'atlassianClientSecret' | 'atlassianRedirectUri' | 'atlassianScopes'
>;

// ─────────────────────────────────────────────────────────────────────────────
// 1. Authorization URL
// ─────────────────────────────────────────────────────────────────────────────
export function buildAuthorizationUrl(config: OAuthSettings, state: string): string {
  const params = new URLSearchParams({
    audience: AUDIENCE,
    client_id: config.atlassianClientId,
    scope: config.atlassianScopes.join(' '),
    redirect_uri: config.atlassianRedirectUri,
    state,
    response_type: 'code',
    prompt: 'consent',
  });

  logger.debug('Atlassian authorization URL built', { scopes: config.atlassianScopes.join(' ') });

  return `${ATLASSIAN_AUTHORIZE_URL}?${params.toString()}`;
}

// ─────────────────────────────────────────────────────────────────────────────
// 2. Code exchange
// ─────────────────────────────────────────────────────────────────────────────
/**
 * Exchanges an authorization code for tokens.
 *
 * @throws UpstreamHttpError        — "Token exchange failed", upstream status + body
 * @throws UpstreamUnavailableError — network / transport failure
 */
export async function exchangeCode(
  http: AxiosInstance,
  config: OAuthSettings,
  code: string,
  now: () => number = Date.now,
): Promise<{ record: TokenRecord; response: TokenResponse }> {
  const tag = 'Token exchange failed';
  const res = await callUpstream(http, tag, {
    method: 'POST',
    url: ATLASSIAN_TOKEN_URL,
    headers: { 'Content-Type': 'application/json' },
    data: {
      grant_type: 'authorization_code',
      client_id: config.atlassianClientId,
      client_secret: config.atlassianClientSecret,
      code,
      redirect_uri: config.atlassianRedirectUri,
    },
  });

  const response = parseUpstream(TokenResponseSchema, res.data, tag);

  // SAFE LOG — presence flags only
  logger.info('Atlassian authorization code exchanged', {
    hasRefreshToken: Boolean(response.refresh_token),
    expiresIn: response.expires_in ?? DEFAULT_EXPIRES_IN_S,
  });

  return { record: toTokenRecord(response, now()), response };
}

// ─────────────────────────────────────────────────────────────────────────────
// 3. Refresh
// ─────────────────────────────────────────────────────────────────────────────
/**
 * Runs the refresh_token grant. Atlassian rotates refresh tokens; when the
 * response carries none the current one is kept.
 *
 * @throws UpstreamHttpError        — "Token refresh failed"
 * @throws UpstreamUnavailableError — network / transport failure
 */
export async function refreshAccessToken(
  http: AxiosInstance,
  config: OAuthSettings,
  refreshToken: string,
  now: () => number = Date.now,
): Promise<TokenRecord> {
  const tag = 'Token refresh failed';
  const res = await callUpstream(http, tag, {
    method: 'POST',
    url: ATLASSIAN_TOKEN_URL,
    headers: { 'Content-Type': 'application/json' },
    data: {
      grant_type: 'refresh_token',
      client_id: config.atlassianClientId,
      client_secret: config.atlassianClientSecret,
      refresh_token: refreshToken,
    },
  });

  const response = parseUpstream(TokenResponseSchema, res.data, tag);
  const record = toTokenRecord(response, now());

  logger.info('Atlassian access token refreshed', {
    rotated: Boolean(response.refresh_token),
  });

  return { ...record, refreshToken: record.refreshToken ?? refreshToken };
}

function toTokenRecord(response: TokenResponse, issuedAt: number): TokenRecord {
  return {
    accessToken: response.access_token,
    refreshToken: response.refresh_token,
    expiresAt: issuedAt + (response.expires_in ?? DEFAULT_EXPIRES_IN_S) * 1000,
    scope: response.scope,
    tokenType: response.token_type,
  };
}
