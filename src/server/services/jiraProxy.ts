// =============================================================================
// JIRA Issue Proxy — internal issue model ⇄ JIRA Cloud REST v3
// =============================================================================
//   searchIssues  — POST /search/jql
//   getIssue      — GET  /issue/{key}
//   createIssue   — POST /issue
//   updateIssue   — PUT  /issue/{key} (+ transition when `status` given)
//   deleteIssue   — DELETE /issue/{key}
//
// Field remapping: title → summary, description (text) → ADF,
// projectKey → project.key, issueType → issuetype.name,
// assigneeAccountId → assignee.accountId.
// =============================================================================
import { z } from 'zod';
import type { JiraCreatedIssue, JiraIssue, JiraSearchResult, JiraUserRef, SiteBaseUrls } from '../types';
import logger from '../utils/logger';
import { BadRequestError } from '../utils/GatewayError';
import { parseUpstream } from './atlassianClient';
import type { AtlassianSession } from './atlassianSession';
import { adfToText, textToAdf } from './adf';

/** Fields requested on search when the caller does not name any */
export const DEFAULT_SEARCH_FIELDS = [
  'summary', 'description', 'status', 'issuetype', 'priority',
  'project', 'assignee', 'reporter', 'labels', 'created', 'updated',
];

// ─────────────────────────────────────────────────────────────────────────────
// Upstream shapes
// ─────────────────────────────────────────────────────────────────────────────

const UserSchema = z
  .object({
    accountId: z.string().optional(),
    displayName: z.string().optional(),
    emailAddress: z.string().optional(),
  })
  .passthrough()
  .nullable()
  .optional();

const NamedSchema = z.object({ name: z.string() }).passthrough().nullable().optional();

const IssueSchema = z
  .object({
    id: z.string(),
    key: z.string(),
    self: z.string().optional(),
    fields: z
      .object({
        summary: z.string().nullable().optional(),
        description: z.unknown().optional(),
        status: NamedSchema,
        issuetype: NamedSchema,
        priority: NamedSchema,
        project: z.object({ key: z.string() }).passthrough().nullable().optional(),
        assignee: UserSchema,
        reporter: UserSchema,
        labels: z.array(z.string()).optional(),
        created: z.string().nullable().optional(),
        updated: z.string().nullable().optional(),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

type UpstreamIssue = z.infer<typeof IssueSchema>;

const SearchResponseSchema = z
  .object({
    issues: z.array(IssueSchema).default([]),
    nextPageToken: z.string().optional(),
    isLast: z.boolean().optional(),
  })
  .passthrough();

const CreatedIssueSchema = z.object({
  id: z.string(),
  key: z.string(),
  self: z.string().optional(),
});

const TransitionsSchema = z.object({
  transitions: z
    .array(
      z
        .object({
          id: z.string(),
          name: z.string(),
          to: z.object({ name: z.string() }).passthrough().optional(),
        })
        .passthrough(),
    )
    .default([]),
});

// ─────────────────────────────────────────────────────────────────────────────
// Internal request shapes
// ─────────────────────────────────────────────────────────────────────────────

export interface JiraSearchInput {
  jql: string;
  maxResults?: number;
  fields?: string[];
  nextPageToken?: string;
}

export interface JiraCreateInput {
  projectKey: string;
  title: string;
  description?: string;
  issueType?: string;
  priority?: string;
  labels?: string[];
  assigneeAccountId?: string;
}

export interface JiraUpdateInput {
  title?: string;
  description?: string | null;
  priority?: string;
  labels?: string[];
  assigneeAccountId?: string | null;
  /** Target status name; applied through the workflow transitions API */
  status?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Translation
// ─────────────────────────────────────────────────────────────────────────────

function toUserRef(user: z.infer<typeof UserSchema>): JiraUserRef | null {
  if (!user) return null;
  return {
    accountId: user.accountId ?? null,
    displayName: user.displayName ?? null,
    emailAddress: user.emailAddress ?? null,
  };
}

export function normalizeIssue(raw: UpstreamIssue, site: Pick<SiteBaseUrls, 'siteUrl'>): JiraIssue {
  const f = raw.fields;
  return {
    id: raw.id,
    key: raw.key,
    title: f.summary ?? null,
    description: adfToText(f.description),
    status: f.status?.name ?? null,
    issueType: f.issuetype?.name ?? null,
    priority: f.priority?.name ?? null,
    projectKey: f.project?.key ?? null,
    assignee: toUserRef(f.assignee),
    reporter: toUserRef(f.reporter),
    labels: f.labels ?? [],
    createdAt: f.created ?? null,
    updatedAt: f.updated ?? null,
    url: site.siteUrl ? `${site.siteUrl.replace(/\/+$/, '')}/browse/${raw.key}` : raw.self ?? null,
  };
}

export function buildCreatePayload(input: JiraCreateInput): { fields: Record<string, unknown> } {
  const fields: Record<string, unknown> = {
    project: { key: input.projectKey },
    summary: input.title,
    issuetype: { name: input.issueType ?? 'Task' },
  };
  if (input.description !== undefined) fields.description = textToAdf(input.description);
  if (input.priority !== undefined) fields.priority = { name: input.priority };
  if (input.labels !== undefined) fields.labels = input.labels;
  if (input.assigneeAccountId !== undefined) fields.assignee = { accountId: input.assigneeAccountId };
  return { fields };
}

export function buildUpdateFields(input: JiraUpdateInput): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  if (input.title !== undefined) fields.summary = input.title;
  if (input.description !== undefined) {
    fields.description = input.description === null ? null : textToAdf(input.description);
  }
  if (input.priority !== undefined) fields.priority = { name: input.priority };
  if (input.labels !== undefined) fields.labels = input.labels;
  if (input.assigneeAccountId !== undefined) {
    fields.assignee = input.assigneeAccountId === null ? null : { accountId: input.assigneeAccountId };
  }
  return fields;
}

// ─────────────────────────────────────────────────────────────────────────────
// Proxy
// ─────────────────────────────────────────────────────────────────────────────

export class JiraProxy {
  constructor(private readonly session: AtlassianSession) {}

  async searchIssues(input: JiraSearchInput): Promise<JiraSearchResult> {
    const tag = 'JIRA search failed';
    const { res, site } = await this.session.request('jira', tag, (base) => ({
      method: 'POST',
      url: `${base}/search/jql`,
      data: {
        jql: input.jql,
        maxResults: input.maxResults ?? 50,
        fields: input.fields?.length ? input.fields : DEFAULT_SEARCH_FIELDS,
        ...(input.nextPageToken ? { nextPageToken: input.nextPageToken } : {}),
      },
    }));

    const body = parseUpstream(SearchResponseSchema, res.data, tag);
    return {
      issues: body.issues.map((issue) => normalizeIssue(issue, site)),
      nextPageToken: body.nextPageToken ?? null,
      isLast: body.isLast ?? body.nextPageToken === undefined,
    };
  }

  async getIssue(key: string): Promise<JiraIssue> {
    const tag = 'JIRA get issue failed';
    const { res, site } = await this.session.request('jira', tag, (base) => ({
      method: 'GET',
      url: `${base}/issue/${encodeURIComponent(key)}`,
    }));
    return normalizeIssue(parseUpstream(IssueSchema, res.data, tag), site);
  }

  async createIssue(input: JiraCreateInput): Promise<JiraCreatedIssue> {
    const tag = 'JIRA create failed';
    const { res, site } = await this.session.request('jira', tag, (base) => ({
      method: 'POST',
      url: `${base}/issue`,
      data: buildCreatePayload(input),
    }));

    const created = parseUpstream(CreatedIssueSchema, res.data, tag);
    logger.info('JIRA issue created', { key: created.key, projectKey: input.projectKey });

    return {
      id: created.id,
      key: created.key,
      url: site.siteUrl ? `${site.siteUrl.replace(/\/+$/, '')}/browse/${created.key}` : created.self ?? null,
    };
  }

  /** Applies field edits, then the status transition, then re-reads the issue */
  async updateIssue(key: string, input: JiraUpdateInput): Promise<JiraIssue> {
    const fields = buildUpdateFields(input);

    if (Object.keys(fields).length > 0) {
      await this.session.request('jira', 'JIRA update failed', (base) => ({
        method: 'PUT',
        url: `${base}/issue/${encodeURIComponent(key)}`,
        data: { fields },
      }));
    }

    if (input.status !== undefined) {
      await this.transitionTo(key, input.status);
    }

    return this.getIssue(key);
  }

  async deleteIssue(key: string): Promise<void> {
    await this.session.request('jira', 'JIRA delete failed', (base) => ({
      method: 'DELETE',
      url: `${base}/issue/${encodeURIComponent(key)}`,
    }));
    logger.info('JIRA issue deleted', { key });
  }

  private async transitionTo(key: string, statusName: string): Promise<void> {
    const tag = 'JIRA transition failed';
    const { res } = await this.session.request('jira', tag, (base) => ({
      method: 'GET',
      url: `${base}/issue/${encodeURIComponent(key)}/transitions`,
    }));

    const wanted = statusName.trim().toLowerCase();
    const { transitions } = parseUpstream(TransitionsSchema, res.data, tag);
    const match = transitions.find(
      (t) => t.to?.name.toLowerCase() === wanted || t.name.toLowerCase() === wanted,
    );
    if (!match) {
      throw new BadRequestError(`No transition to status "${statusName}"`, {
        available: transitions.map((t) => t.to?.name ?? t.name),
      });
    }

    await this.session.request('jira', tag, (base) => ({
      method: 'POST',
      url: `${base}/issue/${encodeURIComponent(key)}/transitions`,
      data: { transition: { id: match.id } },
    }));
  }
}
