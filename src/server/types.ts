// =============================================================================
// Shared Type Definitions
// =============================================================================

/** The single process-wide Atlassian credential set */
export interface TokenRecord {
  accessToken: string;
  refreshToken?: string;
  /** Absolute expiry, epoch milliseconds */
  expiresAt: number;
  scope?: string;
  tokenType: string;
}

/** Safe view of the token cache — NEVER includes token values */
export interface TokenStatus {
  authenticated: boolean;
  accessTokenPresent: boolean;
  refreshTokenPresent: boolean;
  expiresAt: string | null;
  scope: string | null;
  tokenType: string | null;
}

/** Tenant-specific REST roots resolved for an access token */
export interface SiteBaseUrls {
  cloudId: string | null;
  siteUrl: string | null;
  jiraBaseUrl: string;
  confluenceBaseUrl: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// JIRA — internal shapes
// ─────────────────────────────────────────────────────────────────────────────

export interface JiraUserRef {
  accountId: string | null;
  displayName: string | null;
  emailAddress: string | null;
}

export interface JiraIssue {
  id: string;
  key: string;
  title: string | null;
  description: string | null;
  status: string | null;
  issueType: string | null;
  priority: string | null;
  projectKey: string | null;
  assignee: JiraUserRef | null;
  reporter: JiraUserRef | null;
  labels: string[];
  createdAt: string | null;
  updatedAt: string | null;
  url: string | null;
}

export interface JiraSearchResult {
  issues: JiraIssue[];
  nextPageToken: string | null;
  isLast: boolean;
}

export interface JiraCreatedIssue {
  id: string;
  key: string;
  url: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Confluence — internal shapes
// ─────────────────────────────────────────────────────────────────────────────

export interface ConfluencePage {
  id: string;
  title: string;
  spaceKey: string | null;
  status: string;
  version: number | null;
  body: string | null;
  labels: string[];
  createdAt: string | null;
  updatedAt: string | null;
  url: string | null;
}

export interface ConfluenceSearchResult {
  results: ConfluencePage[];
  start: number;
  limit: number;
  size: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Users (local scaffolding)
// ─────────────────────────────────────────────────────────────────────────────

export type UserRole = 'admin' | 'user';

/** Public user view — the password hash never leaves the user service */
export interface User {
  id: number;
  username: string;
  email: string;
  fullName: string;
  role: UserRole;
  isActive: boolean;
  jiraConnected: boolean;
  confluenceConnected: boolean;
  createdAt: string;
  updatedAt: string | null;
}
