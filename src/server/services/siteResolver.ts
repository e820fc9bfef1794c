// =============================================================================
// Site Resolver — tenant REST roots for the cached Atlassian token
// =============================================================================
// Atlassian Cloud REST calls go through the api.atlassian.com gateway and
// need the tenant's cloud id:
//   https://api.atlassian.com/ex/jira/{cloudId}/rest/api/3
//   https://api.atlassian.com/ex/confluence/{cloudId}/rest/api
//
// The cloud id comes from the accessible-resources endpoint. Results are
// cached per access token and the whole cache is dropped whenever the token
// cache changes. JIRA_BASE_URL / CONFLUENCE_BASE_URL, when set, override the
// discovered roots.
// =============================================================================
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AppConfig } from '../config';
import type { SiteBaseUrls } from '../types';
import logger from '../utils/logger';
import { LRUCache } from '../utils/lruCache';
import { UpstreamHttpError } from '../utils/GatewayError';
import { bearer, callUpstream, parseUpstream } from './atlassianClient';

export const ACCESSIBLE_RESOURCES_URL = 'https://api.atlassian.com/oauth/token/accessible-resources';
const API_GATEWAY = 'https://api.atlassian.com/ex';
const TAG = 'Accessible resources lookup failed';

const AccessibleResourceSchema = z.object({
  id: z.string().min(1),
  url: z.string().optional(),
  name: z.string().optional(),
  scopes: z.array(z.string()).optional(),
});

const AccessibleResourcesSchema = z.array(AccessibleResourceSchema);

export function jiraBaseFor(cloudId: string): string {
  return `${API_GATEWAY}/jira/${cloudId}/rest/api/3`;
}

export function confluenceBaseFor(cloudId: string): string {
  return `${API_GATEWAY}/confluence/${cloudId}/rest/api`;
}

export interface SiteResolverOptions {
  http: AxiosInstance;
  config: Pick<AppConfig, 'jiraBaseUrl' | 'confluenceBaseUrl'>;
  cache?: LRUCache<string, SiteBaseUrls>;
}

export class SiteResolver {
  private readonly http: AxiosInstance;
  private readonly overrides: Pick<AppConfig, 'jiraBaseUrl' | 'confluenceBaseUrl'>;
  private readonly cache: LRUCache<string, SiteBaseUrls>;

  constructor({ http, config, cache = new LRUCache<string, SiteBaseUrls>({ maxSize: 16 }) }: SiteResolverOptions) {
    this.http = http;
    this.overrides = config;
    this.cache = cache;
  }

  /**
   * @throws UpstreamHttpError        — non-200 or zero accessible resources
   * @throws UpstreamUnavailableError — network / transport failure
   */
  async resolve(accessToken: string): Promise<SiteBaseUrls> {
    const { jiraBaseUrl, confluenceBaseUrl } = this.overrides;
    if (jiraBaseUrl && confluenceBaseUrl) {
      return { cloudId: null, siteUrl: null, jiraBaseUrl, confluenceBaseUrl };
    }

    const cached = this.cache.get(accessToken);
    if (cached) return cached;

    const res = await callUpstream(this.http, TAG, {
      method: 'GET',
      url: ACCESSIBLE_RESOURCES_URL,
      headers: bearer(accessToken),
    });

    const resources = parseUpstream(AccessibleResourcesSchema, res.data, TAG);
    const first = resources[0];
    if (!first) {
      throw new UpstreamHttpError(TAG, 502, {
        message: 'The token grants access to no Atlassian sites',
      });
    }

    const site: SiteBaseUrls = {
      cloudId: first.id,
      siteUrl: first.url ?? null,
      jiraBaseUrl: jiraBaseUrl || jiraBaseFor(first.id),
      confluenceBaseUrl: confluenceBaseUrl || confluenceBaseFor(first.id),
    };

    logger.info('Atlassian site resolved', {
      cloudId: site.cloudId,
      siteUrl: site.siteUrl,
      accessibleSites: resources.length,
    });

    this.cache.set(accessToken, site);
    return site;
  }

  clear(): void {
    this.cache.clear();
  }
}
