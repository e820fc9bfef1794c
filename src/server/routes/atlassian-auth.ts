// =============================================================================
// Atlassian OAuth Routes — delegates to atlassianOAuth + stateStore + tokenCache
// =============================================================================
// GET  /api/v1/auth/atlassian/login     → 302 to the Atlassian consent screen
// GET  /api/v1/auth/atlassian/callback  → validate state, exchange code, cache tokens
// GET  /api/v1/auth/status              → token cache status (never token values)
// POST /api/v1/auth/logout              → drop the cached session
// =============================================================================
import { Router, Request, Response, NextFunction } from 'express';
import type { GatewayContext } from '../context';
import { missingExchangeSettings, missingLoginSettings } from '../config';
import { buildAuthorizationUrl, exchangeCode } from '../services/atlassianOAuth';
import { toErrorBody } from '../utils/errorHandler';
import {
  BadRequestError,
  ConfigurationError,
  InvalidStateError,
} from '../utils/GatewayError';
import logger from '../utils/logger';

function queryParam(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function page(title: string, body: string): string {
  return `<!DOCTYPE html>
<html>
<head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head>
<body>
  <h2>${escapeHtml(title)}</h2>
  ${body}
</body>
</html>`;
}

function renderErrorHtml(res: Response, err: unknown): void {
  const { status, body } = toErrorBody(err);
  const error = typeof body.error === 'string' ? body.error : 'Error';
  const detail =
    body.detail === undefined
      ? ''
      : `<pre>${escapeHtml(typeof body.detail === 'string' ? body.detail : JSON.stringify(body.detail, null, 2))}</pre>`;

  res
    .status(status)
    .type('html')
    .send(page(error, `${detail}\n  <p><a href="/api/v1/auth/atlassian/login">Start again</a></p>`));
}

export default function atlassianAuthRoutes(ctx: GatewayContext): Router {
  const router = Router();
  const { config, stateStore, tokenCache, siteResolver, http } = ctx;

  /* ── Initiate OAuth ── */
  router.get('/atlassian/login', (req: Request, res: Response, next: NextFunction) => {
    try {
      const missing = missingLoginSettings(config);
      if (missing.length) throw new ConfigurationError(missing);

      const state = stateStore.create(queryParam(req.query.state));
      res.redirect(302, buildAuthorizationUrl(config, state));
    } catch (err) {
      next(err);
    }
  });

  /* ── OAuth Callback ── */
  router.get('/atlassian/callback', async (req: Request, res: Response, next: NextFunction) => {
    const code = queryParam(req.query.code);
    const state = queryParam(req.query.state);
    const wantsJson = queryParam(req.query.format) === 'json';

    try {
      if (!code || !state) throw new BadRequestError('Missing code or state');
      if (!stateStore.validateAndConsume(state)) throw new InvalidStateError();

      const missing = missingExchangeSettings(config);
      if (missing.length) throw new ConfigurationError(missing);

      const { record, response } = await exchangeCode(http, config, code, ctx.now);
      tokenCache.set(record);

      logger.info('Atlassian OAuth complete', {
        hasRefreshToken: Boolean(record.refreshToken),
        expiresAt: new Date(record.expiresAt).toISOString(),
      });

      const tokens = {
        token_type: response.token_type,
        expires_in: response.expires_in ?? null,
        scope: response.scope ?? null,
        access_token_present: true,
        refresh_token_present: Boolean(response.refresh_token),
      };

      if (wantsJson) {
        res.json({ success: true, tokens });
        return;
      }
      res
        .type('html')
        .send(
          page(
            'Atlassian connected',
            `<p>Authorization complete. You can close this window.</p>\n  <p>Token type: ${escapeHtml(tokens.token_type)}</p>`,
          ),
        );
    } catch (err) {
      if (wantsJson) {
        next(err);
        return;
      }
      logger.warn('Atlassian OAuth callback failed', {
        error: err instanceof Error ? err.message : String(err),
      });
      renderErrorHtml(res, err);
    }
  });

  /* ── Session status ── */
  router.get('/status', (_req: Request, res: Response) => {
    res.json(tokenCache.status());
  });

  /* ── Logout ── */
  router.post('/logout', (_req: Request, res: Response) => {
    tokenCache.clear();
    siteResolver.clear();
    logger.info('Atlassian session cleared');
    res.json({ success: true });
  });

  return router;
}
