// =============================================================================
// JIRA Routes — thin HTTP layer over JiraProxy
// =============================================================================
// POST   /api/v1/jira/issues/search  → { issues, nextPageToken, isLast }
// POST   /api/v1/jira/issues         → 201 { id, key, url }
// GET    /api/v1/jira/issues/:key    → issue
// PUT    /api/v1/jira/issues/:key    → updated issue
// DELETE /api/v1/jira/issues/:key    → 204
// =============================================================================
import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { GatewayContext } from '../context';

const ISSUE_KEY_RE = /^[A-Za-z][A-Za-z0-9_]*-\d+$|^\d+$/;

const SearchSchema = z.object({
  jql: z.string().min(1),
  maxResults: z.number({ coerce: true }).int().min(1).max(100).default(50),
  fields: z.array(z.string().min(1)).optional(),
  nextPageToken: z.string().min(1).optional(),
});

const CreateSchema = z.object({
  projectKey: z.string().min(1),
  title: z.string().min(1).max(255),
  description: z.string().optional(),
  issueType: z.string().min(1).default('Task'),
  priority: z.string().min(1).optional(),
  labels: z.array(z.string().min(1)).optional(),
  assigneeAccountId: z.string().min(1).optional(),
});

const UpdateSchema = z.object({
  title: z.string().min(1).max(255).optional(),
  description: z.string().nullable().optional(),
  priority: z.string().min(1).optional(),
  labels: z.array(z.string().min(1)).optional(),
  assigneeAccountId: z.string().min(1).nullable().optional(),
  status: z.string().min(1).optional(),
});

const KeySchema = z.string().regex(ISSUE_KEY_RE, 'Expected an issue key like PROJ-123 or a numeric id');

export default function jiraRoutes(ctx: GatewayContext): Router {
  const router = Router();
  const { jira } = ctx;

  router.post('/issues/search', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = SearchSchema.parse(req.body);
      res.json(await jira.searchIssues(input));
    } catch (err) {
      next(err);
    }
  });

  router.post('/issues', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = CreateSchema.parse(req.body);
      res.status(201).json(await jira.createIssue(input));
    } catch (err) {
      next(err);
    }
  });

  router.get('/issues/:key', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const key = KeySchema.parse(req.params.key);
      res.json(await jira.getIssue(key));
    } catch (err) {
      next(err);
    }
  });

  router.put('/issues/:key', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const key = KeySchema.parse(req.params.key);
      const input = UpdateSchema.parse(req.body);
      res.json(await jira.updateIssue(key, input));
    } catch (err) {
      next(err);
    }
  });

  router.delete('/issues/:key', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const key = KeySchema.parse(req.params.key);
      await jira.deleteIssue(key);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
