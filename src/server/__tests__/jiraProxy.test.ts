// =============================================================================
// JIRA Proxy Tests
// =============================================================================
// Tests: field remapping both ways, tagged upstream errors, transitions,
//        token refresh before the call
// =============================================================================

jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { DEFAULT_SEARCH_FIELDS } from '../services/jiraProxy';
import { AuthenticationRequiredError, BadRequestError, UpstreamHttpError } from '../utils/GatewayError';
import { JIRA_BASE, SITE_URL, TOKEN_URL } from './helpers/fakeAtlassian';
import { upstreamIssue } from './helpers/fixtures';
import { buildHarness, NOW, TestHarness, validToken } from './helpers/testContext';

describe('JiraProxy', () => {
  let h: TestHarness;

  beforeEach(() => {
    h = buildHarness();
    h.fake.withSite();
    h.ctx.tokenCache.set(validToken());
  });

  // ═══════════════════════════════════════════════════════════════════════════
  describe('getIssue', () => {
    it('normalizes the upstream issue', async () => {
      h.fake.on('GET', `${JIRA_BASE}/issue/PROJ-1`, { status: 200, data: upstreamIssue() });

      await expect(h.ctx.jira.getIssue('PROJ-1')).resolves.toEqual({
        id: '10001',
        key: 'PROJ-1',
        title: 'Login fails on Safari',
        description: 'Steps to reproduce',
        status: 'To Do',
        issueType: 'Bug',
        priority: 'High',
        projectKey: 'PROJ',
        assignee: { accountId: 'acc-1', displayName: 'Dev One', emailAddress: null },
        reporter: null,
        labels: ['auth'],
        createdAt: '2024-01-10T09:00:00.000+0000',
        updatedAt: '2024-01-11T09:00:00.000+0000',
        url: `${SITE_URL}/browse/PROJ-1`,
      });
      expect(h.fake.callsTo('GET', `${JIRA_BASE}/issue/PROJ-1`)[0]?.authorization).toBe('Bearer access-test');
    });

    it('forwards an upstream 404 with its tag, status and body', async () => {
      h.fake.on('GET', `${JIRA_BASE}/issue/PROJ-404`, {
        status: 404,
        data: { errorMessages: ['Issue does not exist'] },
      });

      const err = await h.ctx.jira.getIssue('PROJ-404').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(UpstreamHttpError);
      expect(err).toMatchObject({
        status: 404,
        error: 'JIRA get issue failed',
        detail: { errorMessages: ['Issue does not exist'] },
      });
    });

    it('fails fast with a 502 when a required field is missing', async () => {
      h.fake.on('GET', `${JIRA_BASE}/issue/PROJ-1`, { status: 200, data: { id: '10001' } });

      await expect(h.ctx.jira.getIssue('PROJ-1')).rejects.toMatchObject({
        status: 502,
        error: 'JIRA get issue failed',
        detail: { message: 'Unexpected upstream response shape', issues: [{ path: 'key', message: 'Required' }] },
      });
    });

    it('requires an Atlassian session before calling upstream', async () => {
      h.ctx.tokenCache.clear();

      await expect(h.ctx.jira.getIssue('PROJ-1')).rejects.toBeInstanceOf(AuthenticationRequiredError);
      expect(h.fake.calls).toHaveLength(0);
    });

    it('refreshes an expired token and uses the new one', async () => {
      h.ctx.tokenCache.set(validToken({ expiresAt: NOW }));
      h.fake
        .on('POST', TOKEN_URL, {
          status: 200,
          data: { access_token: 'access-fresh', refresh_token: 'refresh-fresh', expires_in: 3600 },
        })
        .on('GET', `${JIRA_BASE}/issue/PROJ-1`, { status: 200, data: upstreamIssue() });

      await h.ctx.jira.getIssue('PROJ-1');

      expect(h.fake.callsTo('POST', TOKEN_URL)[0]?.data).toMatchObject({
        grant_type: 'refresh_token',
        refresh_token: 'refresh-test',
      });
      expect(h.fake.callsTo('GET', `${JIRA_BASE}/issue/PROJ-1`)[0]?.authorization).toBe('Bearer access-fresh');
      expect(h.ctx.tokenCache.get()?.refreshToken).toBe('refresh-fresh');
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  describe('searchIssues', () => {
    it('posts to /search/jql with default fields and pages by token', async () => {
      h.fake.on('POST', `${JIRA_BASE}/search/jql`, {
        status: 200,
        data: { issues: [upstreamIssue()], nextPageToken: 'page-2', isLast: false },
      });

      const result = await h.ctx.jira.searchIssues({ jql: 'project = PROJ' });

      expect(h.fake.calls[1]?.data).toEqual({
        jql: 'project = PROJ',
        maxResults: 50,
        fields: DEFAULT_SEARCH_FIELDS,
      });
      expect(result.issues.map((i) => i.key)).toEqual(['PROJ-1']);
      expect(result.nextPageToken).toBe('page-2');
      expect(result.isLast).toBe(false);
    });

    it('passes the page token through and reports the last page', async () => {
      h.fake.on('POST', `${JIRA_BASE}/search/jql`, { status: 200, data: { issues: [] } });

      const result = await h.ctx.jira.searchIssues({
        jql: 'project = PROJ',
        maxResults: 10,
        fields: ['summary'],
        nextPageToken: 'page-2',
      });

      expect(h.fake.calls[1]?.data).toEqual({
        jql: 'project = PROJ',
        maxResults: 10,
        fields: ['summary'],
        nextPageToken: 'page-2',
      });
      expect(result).toEqual({ issues: [], nextPageToken: null, isLast: true });
    });

    it('tags search failures', async () => {
      h.fake.on('POST', `${JIRA_BASE}/search/jql`, {
        status: 400,
        data: { errorMessages: ["Error in the JQL Query"] },
      });

      await expect(h.ctx.jira.searchIssues({ jql: 'bad =' })).rejects.toMatchObject({
        status: 400,
        error: 'JIRA search failed',
      });
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  describe('createIssue', () => {
    it('remaps the internal fields and returns the browse URL', async () => {
      h.fake.on('POST', `${JIRA_BASE}/issue`, {
        status: 201,
        data: { id: '10002', key: 'PROJ-2', self: `${JIRA_BASE}/issue/10002` },
      });

      const created = await h.ctx.jira.createIssue({
        projectKey: 'PROJ',
        title: 'New bug',
        description: 'Line one\nLine two',
        priority: 'Low',
        labels: ['ui'],
        assigneeAccountId: 'acc-9',
      });

      expect(h.fake.callsTo('POST', `${JIRA_BASE}/issue`)[0]?.data).toEqual({
        fields: {
          project: { key: 'PROJ' },
          summary: 'New bug',
          issuetype: { name: 'Task' },
          description: {
            type: 'doc',
            version: 1,
            content: [
              { type: 'paragraph', content: [{ type: 'text', text: 'Line one' }] },
              { type: 'paragraph', content: [{ type: 'text', text: 'Line two' }] },
            ],
          },
          priority: { name: 'Low' },
          labels: ['ui'],
          assignee: { accountId: 'acc-9' },
        },
      });
      expect(created).toEqual({ id: '10002', key: 'PROJ-2', url: `${SITE_URL}/browse/PROJ-2` });
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  describe('updateIssue', () => {
    it('edits fields, runs the matching transition, then re-reads the issue', async () => {
      h.fake
        .on('PUT', `${JIRA_BASE}/issue/PROJ-1`, { status: 204 })
        .on('GET', `${JIRA_BASE}/issue/PROJ-1/transitions`, {
          status: 200,
          data: { transitions: [{ id: '21', name: 'Start work', to: { name: 'In Progress' } }] },
        })
        .on('POST', `${JIRA_BASE}/issue/PROJ-1/transitions`, { status: 204 })
        .on('GET', `${JIRA_BASE}/issue/PROJ-1`, {
          status: 200,
          data: upstreamIssue('PROJ-1', { summary: 'Renamed', status: { name: 'In Progress' } }),
        });

      const issue = await h.ctx.jira.updateIssue('PROJ-1', { title: 'Renamed', status: 'in progress' });

      expect(h.fake.callsTo('PUT', `${JIRA_BASE}/issue/PROJ-1`)[0]?.data).toEqual({
        fields: { summary: 'Renamed' },
      });
      expect(h.fake.callsTo('POST', `${JIRA_BASE}/issue/PROJ-1/transitions`)[0]?.data).toEqual({
        transition: { id: '21' },
      });
      expect(issue.title).toBe('Renamed');
      expect(issue.status).toBe('In Progress');
    });

    it('skips the field edit when only a status is given', async () => {
      h.fake
        .on('GET', `${JIRA_BASE}/issue/PROJ-1/transitions`, {
          status: 200,
          data: { transitions: [{ id: '31', name: 'Done', to: { name: 'Done' } }] },
        })
        .on('POST', `${JIRA_BASE}/issue/PROJ-1/transitions`, { status: 204 })
        .on('GET', `${JIRA_BASE}/issue/PROJ-1`, { status: 200, data: upstreamIssue() });

      await h.ctx.jira.updateIssue('PROJ-1', { status: 'Done' });

      expect(h.fake.callsTo('PUT', `${JIRA_BASE}/issue/PROJ-1`)).toHaveLength(0);
    });

    it('rejects a status no transition leads to', async () => {
      h.fake.on('GET', `${JIRA_BASE}/issue/PROJ-1/transitions`, {
        status: 200,
        data: { transitions: [{ id: '21', name: 'Start work', to: { name: 'In Progress' } }] },
      });

      const err = await h.ctx.jira.updateIssue('PROJ-1', { status: 'Done' }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(BadRequestError);
      expect(err).toMatchObject({
        status: 400,
        error: 'No transition to status "Done"',
        detail: { available: ['In Progress'] },
      });
    });

    it('tags a failed field edit', async () => {
      h.fake.on('PUT', `${JIRA_BASE}/issue/PROJ-1`, { status: 403, data: { errorMessages: ['Forbidden'] } });

      await expect(h.ctx.jira.updateIssue('PROJ-1', { title: 'x' })).rejects.toMatchObject({
        status: 403,
        error: 'JIRA update failed',
      });
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  describe('deleteIssue', () => {
    it('deletes and tags failures', async () => {
      h.fake.on('DELETE', `${JIRA_BASE}/issue/PROJ-1`, { status: 204 });
      await h.ctx.jira.deleteIssue('PROJ-1');
      expect(h.fake.callsTo('DELETE', `${JIRA_BASE}/issue/PROJ-1`)).toHaveLength(1);

      h.fake.on('DELETE', `${JIRA_BASE}/issue/PROJ-1`, { status: 404, data: null });
      await expect(h.ctx.jira.deleteIssue('PROJ-1')).rejects.toMatchObject({
        status: 404,
        error: 'JIRA delete failed',
      });
    });
  });
});
