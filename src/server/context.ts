// =============================================================================
// Gateway Context — every piece of mutable state, wired once per app
// =============================================================================
// Built at startup and handed to createApp(). Tests build a fresh one per case
// (optionally with a stub axios instance and a fake clock), so nothing leaks
// between them.
// =============================================================================
import type { AxiosInstance } from 'axios';
import type { AppConfig } from './config';
import { createAtlassianHttp } from './services/atlassianClient';
import { refreshAccessToken } from './services/atlassianOAuth';
import { AtlassianSession } from './services/atlassianSession';
import { ConfluenceProxy } from './services/confluenceProxy';
import { JiraProxy } from './services/jiraProxy';
import { SiteResolver } from './services/siteResolver';
import { OAuthStateStore } from './services/stateStore';
import { TokenCache } from './services/tokenCache';
import { UserService } from './services/userService';

export interface GatewayContext {
  config: AppConfig;
  http: AxiosInstance;
  stateStore: OAuthStateStore;
  tokenCache: TokenCache;
  siteResolver: SiteResolver;
  jira: JiraProxy;
  confluence: ConfluenceProxy;
  users: UserService;
  now: () => number;
}

export interface ContextOverrides {
  http?: AxiosInstance;
  now?: () => number;
}

export function createContext(config: AppConfig, overrides: ContextOverrides = {}): GatewayContext {
  const http = overrides.http ?? createAtlassianHttp(config);
  const now = overrides.now ?? Date.now;

  const stateStore = new OAuthStateStore({ now });
  const tokenCache = new TokenCache({
    refresh: (refreshToken) => refreshAccessToken(http, config, refreshToken, now),
    now,
  });
  const siteResolver = new SiteResolver({ http, config });

  // A new or cleared credential set invalidates every cached site lookup
  tokenCache.onChange(() => siteResolver.clear());

  const session = new AtlassianSession({ http, tokenCache, siteResolver });

  return {
    config,
    http,
    stateStore,
    tokenCache,
    siteResolver,
    jira: new JiraProxy(session),
    confluence: new ConfluenceProxy(session),
    users: new UserService(config, now),
    now,
  };
}
