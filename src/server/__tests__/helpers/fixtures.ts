import { CONFLUENCE_BASE, JIRA_BASE } from './fakeAtlassian';

export function upstreamIssue(key = 'PROJ-1', overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: '10001',
    key,
    self: `${JIRA_BASE}/issue/10001`,
    fields: {
      summary: 'Login fails on Safari',
      description: {
        type: 'doc',
        version: 1,
        content: [{ type: 'paragraph', content: [{ type: 'text', text: 'Steps to reproduce' }] }],
      },
      status: { name: 'To Do' },
      issuetype: { name: 'Bug' },
      priority: { name: 'High' },
      project: { key: 'PROJ' },
      assignee: { accountId: 'acc-1', displayName: 'Dev One' },
      reporter: null,
      labels: ['auth'],
      created: '2024-01-10T09:00:00.000+0000',
      updated: '2024-01-11T09:00:00.000+0000',
      ...overrides,
    },
  };
}

export function upstreamPage(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: '123',
    type: 'page',
    status: 'current',
    title: 'Runbook',
    space: { key: 'OPS' },
    version: { number: 3, when: '2024-01-12T10:00:00.000Z' },
    body: { storage: { value: '<p>Hello</p>', representation: 'storage' } },
    metadata: { labels: { results: [{ prefix: 'global', name: 'ops' }] } },
    history: { createdDate: '2024-01-01T00:00:00.000Z' },
    _links: { base: 'https://example.atlassian.net/wiki', webui: '/spaces/OPS/pages/123' },
    ...overrides,
  };
}

export const PAGE_URL = `${CONFLUENCE_BASE}/content/123`;
