// =============================================================================
// Confluence Routes — thin HTTP layer over ConfluenceProxy
// =============================================================================
// POST   /api/v1/confluence/pages/search  → { results, start, limit, size }
// POST   /api/v1/confluence/pages         → 201 page
// GET    /api/v1/confluence/pages/:id     → page
// PUT    /api/v1/confluence/pages/:id     → updated page (version + 1)
// DELETE /api/v1/confluence/pages/:id     → 204
// =============================================================================
import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { GatewayContext } from '../context';

const SearchSchema = z.object({
  cql: z.string().min(1),
  limit: z.number({ coerce: true }).int().min(1).max(100).default(25),
  start: z.number({ coerce: true }).int().min(0).default(0),
});

const CreateSchema = z.object({
  spaceKey: z.string().min(1),
  title: z.string().min(1).max(255),
  body: z.string(),
  parentId: z.string().min(1).optional(),
  labels: z.array(z.string().min(1)).optional(),
});

const UpdateSchema = z.object({
  title: z.string().min(1).max(255).optional(),
  body: z.string().optional(),
  version: z.number().int().min(1).optional(),
  versionComment: z.string().max(255).optional(),
  status: z.enum(['current', 'draft']).optional(),
});

const PageIdSchema = z.string().regex(/^\d+$/, 'Expected a numeric page id');

export default function confluenceRoutes(ctx: GatewayContext): Router {
  const router = Router();
  const { confluence } = ctx;

  router.post('/pages/search', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = SearchSchema.parse(req.body);
      res.json(await confluence.searchPages(input));
    } catch (err) {
      next(err);
    }
  });

  router.post('/pages', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = CreateSchema.parse(req.body);
      res.status(201).json(await confluence.createPage(input));
    } catch (err) {
      next(err);
    }
  });

  router.get('/pages/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = PageIdSchema.parse(req.params.id);
      res.json(await confluence.getPage(id));
    } catch (err) {
      next(err);
    }
  });

  router.put('/pages/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = PageIdSchema.parse(req.params.id);
      const input = UpdateSchema.parse(req.body);
      res.json(await confluence.updatePage(id, input));
    } catch (err) {
      next(err);
    }
  });

  router.delete('/pages/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = PageIdSchema.parse(req.params.id);
      await confluence.deletePage(id);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
