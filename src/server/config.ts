// =============================================================================
// Application Configuration — Centralised + Validated
// =============================================================================
import dotenv from 'dotenv';
dotenv.config();

/** JIRA + Confluence read/write, plus offline_access so we receive a refresh token */
export const DEFAULT_ATLASSIAN_SCOPES = [
  'read:jira-work',
  'write:jira-work',
  'read:jira-user',
  'read:confluence-content.all',
  'write:confluence-content',
  'read:confluence-space.summary',
  'search:confluence',
  'offline_access',
];

export interface CorsSettings {
  /** `true` = reflect any origin (wildcard); otherwise an explicit allow-list */
  allowAll: boolean;
  origins: string[];
}

export interface AppConfig {
  appName: string;
  appEnv: string;
  appVersion: string;
  port: number;

  // Atlassian OAuth 2.0 (3LO)
  atlassianClientId: string;
  atlassianClientSecret: string;
  atlassianRedirectUri: string;
  atlassianScopes: string[];

  // Optional static site overrides (skip accessible-resources discovery)
  jiraBaseUrl: string;
  confluenceBaseUrl: string;

  cors: CorsSettings;

  // User-login JWTs
  jwtSecret: string;
  /** User-login JWT lifetime in seconds */
  jwtExpiresInS: number;

  /** Ceiling for every outbound Atlassian call */
  httpTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

function parseCorsOrigins(raw: string | undefined): CorsSettings {
  const origins = (raw ?? '')
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean);

  // Empty or a lone "*" → any origin, credentials off
  if (origins.length === 0 || (origins.length === 1 && origins[0] === '*')) {
    return { allowAll: true, origins: [] };
  }
  return { allowAll: false, origins };
}

function parseScopes(raw: string | undefined): string[] {
  const scopes = (raw ?? '').split(/[\s,]+/).filter(Boolean);
  return scopes.length ? scopes : [...DEFAULT_ATLASSIAN_SCOPES];
}

function parseIntOr(raw: string | undefined, fallback: number): number {
  const n = parseInt(raw ?? '', 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

/**
 * Builds the config from an environment map. Read at call time (not import
 * time) so tests can construct apps with different settings.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    appName: env.APP_NAME ?? 'Unified JIRA-Confluence Backend',
    appEnv: env.APP_ENV ?? 'development',
    appVersion: env.APP_VERSION ?? '0.1.0',
    port: parseIntOr(env.PORT, 3001),

    atlassianClientId: env.ATLASSIAN_CLIENT_ID ?? '',
    atlassianClientSecret: env.ATLASSIAN_CLIENT_SECRET ?? '',
    atlassianRedirectUri: env.ATLASSIAN_REDIRECT_URI ?? '',
    atlassianScopes: parseScopes(env.ATLASSIAN_SCOPES),

    jiraBaseUrl: (env.JIRA_BASE_URL ?? '').replace(/\/+$/, ''),
    confluenceBaseUrl: (env.CONFLUENCE_BASE_URL ?? '').replace(/\/+$/, ''),

    cors: parseCorsOrigins(env.CORS_ORIGINS),

    jwtSecret: env.JWT_SECRET ?? 'dev-secret-change-me',
    jwtExpiresInS: parseIntOr(env.JWT_EXPIRES_IN_S, 30 * 60),

    httpTimeoutMs: parseIntOr(env.HTTP_TIMEOUT_MS, 15_000),
  };
}

/** Env var names of the OAuth settings the login redirect cannot work without */
export function missingLoginSettings(config: AppConfig): string[] {
  const missing: string[] = [];
  if (!config.atlassianClientId) missing.push('ATLASSIAN_CLIENT_ID');
  if (!config.atlassianRedirectUri) missing.push('ATLASSIAN_REDIRECT_URI');
  return missing;
}

/** Env var names of the settings the code exchange additionally needs */
export function missingExchangeSettings(config: AppConfig): string[] {
  const missing = missingLoginSettings(config);
  if (!config.atlassianClientSecret) missing.push('ATLASSIAN_CLIENT_SECRET');
  return missing;
}
