// =============================================================================
// Express Application — built from an explicit GatewayContext
// =============================================================================
import express, { Express } from 'express';
import cors from 'cors';

import type { GatewayContext } from './context';
import logger from './utils/logger';
import { errorHandler, notFoundHandler } from './utils/errorHandler';

// Routes
import healthRoutes from './routes/health';
import atlassianAuthRoutes from './routes/atlassian-auth';
import jiraRoutes from './routes/jira';
import confluenceRoutes from './routes/confluence';
import userRoutes from './routes/users';

export function createApp(ctx: GatewayContext): Express {
  const app = express();
  const { cors: corsSettings } = ctx.config;

  /* ── Global middleware ── */
  // Wildcard origins never carry credentials; an explicit allow-list does
  app.use(
    corsSettings.allowAll
      ? cors({ origin: '*', credentials: false })
      : cors({ origin: corsSettings.origins, credentials: true }),
  );
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  // Request logging (non-PII)
  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.path}`, {
      ip: req.ip,
      userAgent: req.get('user-agent')?.substring(0, 60),
    });
    next();
  });

  /* ── Routes ── */
  app.use('/', healthRoutes(ctx));
  app.use('/api/v1/auth', atlassianAuthRoutes(ctx));
  app.use('/api/v1/jira', jiraRoutes(ctx));
  app.use('/api/v1/confluence', confluenceRoutes(ctx));
  app.use('/api/v1/users', userRoutes(ctx));

  /* ── Fallbacks ── */
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
