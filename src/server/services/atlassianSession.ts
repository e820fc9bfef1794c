// =============================================================================
// Atlassian Session — authenticated request pipeline shared by both proxies
// =============================================================================
// Every proxied call goes through the same steps:
//   1. tokenCache.ensureValid()  → AuthenticationRequiredError if unusable
//   2. siteResolver.resolve()    → tenant REST root for the product
//   3. callUpstream()            → tagged error on non-2xx, 502 on transport
// =============================================================================
import type { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import type { SiteBaseUrls } from '../types';
import { bearer, callUpstream } from './atlassianClient';
import type { SiteResolver } from './siteResolver';
import type { TokenCache } from './tokenCache';

export type AtlassianProduct = 'jira' | 'confluence';

export interface AtlassianSessionDeps {
  http: AxiosInstance;
  tokenCache: TokenCache;
  siteResolver: SiteResolver;
}

export interface SessionResponse {
  res: AxiosResponse<unknown>;
  site: SiteBaseUrls;
}

export class AtlassianSession {
  constructor(private readonly deps: AtlassianSessionDeps) {}

  /**
   * @param build — receives the product's REST root and returns the request
   */
  async request(
    product: AtlassianProduct,
    tag: string,
    build: (baseUrl: string) => AxiosRequestConfig,
  ): Promise<SessionResponse> {
    const token = await this.deps.tokenCache.ensureValid();
    const site = await this.deps.siteResolver.resolve(token.accessToken);
    const baseUrl = product === 'jira' ? site.jiraBaseUrl : site.confluenceBaseUrl;

    const req = build(baseUrl);
    const res = await callUpstream(this.deps.http, tag, {
      ...req,
      headers: {
        'Content-Type': 'application/json',
        ...bearer(token.accessToken),
        ...headerRecord(req.headers),
      },
    });

    return { res, site };
  }
}

function headerRecord(headers: AxiosRequestConfig['headers']): Record<string, string> {
  const out: Record<string, string> = {};
  if (!headers || typeof headers !== 'object') return out;
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') out[key] = value;
  }
  return out;
}
