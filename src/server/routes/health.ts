// =============================================================================
// Health Routes — service info, liveness, readiness, integration pings
// =============================================================================
// GET /                                   → name, links, version
// GET /health                             → liveness
// GET /ready                              → readiness
// GET /api/v1/integrations/jira/ping      → is a JIRA base URL configured?
// GET /api/v1/integrations/confluence/ping
// =============================================================================
import { Router, Request, Response } from 'express';
import type { GatewayContext } from '../context';

export default function healthRoutes(ctx: GatewayContext): Router {
  const router = Router();
  const { config } = ctx;

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      message: config.appName,
      health: '/health',
      ready: '/ready',
      login: '/api/v1/auth/atlassian/login',
      version: config.appVersion,
    });
  });

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      env: config.appEnv,
      version: config.appVersion,
      dependencies_ok: true,
      details: { service: 'integration_backend' },
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    res.json({ ready: true, reason: null, dependencies_ok: true });
  });

  router.get('/api/v1/integrations/jira/ping', (_req: Request, res: Response) => {
    res.json({
      service: 'jira',
      configured: Boolean(config.jiraBaseUrl),
      base_url: config.jiraBaseUrl || null,
    });
  });

  router.get('/api/v1/integrations/confluence/ping', (_req: Request, res: Response) => {
    res.json({
      service: 'confluence',
      configured: Boolean(config.confluenceBaseUrl),
      base_url: config.confluenceBaseUrl || null,
    });
  });

  return router;
}
