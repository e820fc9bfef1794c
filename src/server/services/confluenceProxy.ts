// =============================================================================
// Confluence Page Proxy — internal page model ⇄ Confluence Cloud REST
// =============================================================================
//   searchPages  — GET    /content/search?cql=…
//   getPage      — GET    /content/{id}?expand=…
//   createPage   — POST   /content
//   updatePage   — PUT    /content/{id}   (version = current + 1)
//   deletePage   — DELETE /content/{id}
//
// Bodies are carried in "storage" representation (Confluence XHTML) as-is.
// =============================================================================
import { z } from 'zod';
import type { ConfluencePage, ConfluenceSearchResult } from '../types';
import logger from '../utils/logger';
import { UpstreamHttpError } from '../utils/GatewayError';
import { parseUpstream } from './atlassianClient';
import type { AtlassianSession } from './atlassianSession';

export const PAGE_EXPAND = 'body.storage,version,space,metadata.labels,history';
const SEARCH_EXPAND = 'space,version,metadata.labels,history';

const GET_PAGE_TAG = 'Confluence get page failed';

const PageSchema = z
  .object({
    id: z.string(),
    title: z.string(),
    status: z.string().optional(),
    space: z.object({ key: z.string() }).passthrough().optional(),
    version: z
      .object({ number: z.number().int(), when: z.string().optional() })
      .passthrough()
      .optional(),
    body: z
      .object({ storage: z.object({ value: z.string() }).passthrough().optional() })
      .passthrough()
      .optional(),
    metadata: z
      .object({
        labels: z
          .object({ results: z.array(z.object({ name: z.string() }).passthrough()).default([]) })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .optional(),
    history: z.object({ createdDate: z.string().optional() }).passthrough().optional(),
    _links: z
      .object({ base: z.string().optional(), webui: z.string().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

type UpstreamPage = z.infer<typeof PageSchema>;

const SearchResponseSchema = z
  .object({
    results: z.array(PageSchema).default([]),
    start: z.number().int().default(0),
    limit: z.number().int().default(0),
    size: z.number().int().default(0),
  })
  .passthrough();

export interface ConfluenceSearchInput {
  cql: string;
  limit?: number;
  start?: number;
}

export interface ConfluenceCreateInput {
  spaceKey: string;
  title: string;
  body: string;
  parentId?: string;
  labels?: string[];
}

export interface ConfluenceUpdateInput {
  title?: string;
  body?: string;
  /** The page's current version number; fetched when omitted */
  version?: number;
  versionComment?: string;
  status?: 'current' | 'draft';
}

export function normalizePage(raw: UpstreamPage): ConfluencePage {
  const links = raw._links;
  return {
    id: raw.id,
    title: raw.title,
    spaceKey: raw.space?.key ?? null,
    status: raw.status ?? 'current',
    version: raw.version?.number ?? null,
    body: raw.body?.storage?.value ?? null,
    labels: raw.metadata?.labels?.results.map((l) => l.name) ?? [],
    createdAt: raw.history?.createdDate ?? null,
    updatedAt: raw.version?.when ?? null,
    url: links?.base && links.webui ? `${links.base}${links.webui}` : null,
  };
}

function storage(value: string): { storage: { value: string; representation: 'storage' } } {
  return { storage: { value, representation: 'storage' } };
}

export function buildCreatePayload(input: ConfluenceCreateInput): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    type: 'page',
    title: input.title,
    space: { key: input.spaceKey },
    body: storage(input.body),
  };
  if (input.parentId) payload.ancestors = [{ id: input.parentId }];
  if (input.labels?.length) {
    payload.metadata = { labels: input.labels.map((name) => ({ prefix: 'global', name })) };
  }
  return payload;
}

export class ConfluenceProxy {
  constructor(private readonly session: AtlassianSession) {}

  async searchPages(input: ConfluenceSearchInput): Promise<ConfluenceSearchResult> {
    const tag = 'Confluence search failed';
    const { res } = await this.session.request('confluence', tag, (base) => ({
      method: 'GET',
      url: `${base}/content/search`,
      params: {
        cql: input.cql,
        limit: input.limit ?? 25,
        start: input.start ?? 0,
        expand: SEARCH_EXPAND,
      },
    }));

    const body = parseUpstream(SearchResponseSchema, res.data, tag);
    return {
      results: body.results.map(normalizePage),
      start: body.start,
      limit: body.limit,
      size: body.size,
    };
  }

  async getPage(id: string): Promise<ConfluencePage> {
    const { res } = await this.session.request('confluence', GET_PAGE_TAG, (base) => ({
      method: 'GET',
      url: `${base}/content/${encodeURIComponent(id)}`,
      params: { expand: PAGE_EXPAND },
    }));
    return normalizePage(parseUpstream(PageSchema, res.data, GET_PAGE_TAG));
  }

  async createPage(input: ConfluenceCreateInput): Promise<ConfluencePage> {
    const tag = 'Confluence create failed';
    const { res } = await this.session.request('confluence', tag, (base) => ({
      method: 'POST',
      url: `${base}/content`,
      data: buildCreatePayload(input),
    }));

    const page = normalizePage(parseUpstream(PageSchema, res.data, tag));
    logger.info('Confluence page created', { id: page.id, spaceKey: input.spaceKey });
    return page;
  }

  /**
   * Read-modify-write: missing title, body or version are taken from the
   * current page, and the new version is always current + 1.
   */
  async updatePage(id: string, input: ConfluenceUpdateInput): Promise<ConfluencePage> {
    const current =
      input.title === undefined || input.body === undefined || input.version === undefined
        ? await this.getPage(id)
        : null;

    const title = input.title ?? current?.title ?? '';
    const body = input.body ?? current?.body ?? '';
    const version = input.version ?? current?.version;
    if (version === undefined || version === null) {
      throw new UpstreamHttpError(GET_PAGE_TAG, 502, {
        message: 'Current page version missing from upstream response',
      });
    }

    const tag = 'Confluence update failed';
    const nextVersion: Record<string, unknown> = { number: version + 1 };
    if (input.versionComment) nextVersion.message = input.versionComment;

    const { res } = await this.session.request('confluence', tag, (base) => ({
      method: 'PUT',
      url: `${base}/content/${encodeURIComponent(id)}`,
      data: {
        id,
        type: 'page',
        title,
        ...(input.status ? { status: input.status } : {}),
        body: storage(body),
        version: nextVersion,
      },
    }));

    const page = normalizePage(parseUpstream(PageSchema, res.data, tag));
    logger.info('Confluence page updated', { id, version: version + 1 });
    return page;
  }

  async deletePage(id: string): Promise<void> {
    await this.session.request('confluence', 'Confluence delete failed', (base) => ({
      method: 'DELETE',
      url: `${base}/content/${encodeURIComponent(id)}`,
    }));
    logger.info('Confluence page deleted', { id });
  }
}
