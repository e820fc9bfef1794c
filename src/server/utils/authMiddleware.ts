// =============================================================================
// Auth Middleware — validates the user-login JWT on /api/v1/users/* routes
// =============================================================================
// Reads `Authorization: Bearer <jwt>`, verifies it with the user service and
// exposes the claims as `req.user`. Atlassian proxy routes do NOT use this:
// they run on the process-wide Atlassian token cache.
// =============================================================================
import { Request, Response, NextFunction, RequestHandler } from 'express';
import type { TokenClaims, UserService } from '../services/userService';
import { ForbiddenError, UnauthorizedError } from './GatewayError';

// Extend Express Request to include the verified claims
declare global {
  namespace Express {
    interface Request {
      user?: TokenClaims;
    }
  }
}

export function bearerToken(req: Pick<Request, 'headers'>): string | null {
  const header = req.headers.authorization;
  if (!header) return null;
  const match = /^Bearer\s+(.+)$/i.exec(header);
  return match?.[1]?.trim() || null;
}

export function requireUser(users: UserService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token = bearerToken(req);
    if (!token) {
      res.setHeader('WWW-Authenticate', 'Bearer');
      next(new UnauthorizedError('Not authenticated'));
      return;
    }
    try {
      req.user = users.verifyToken(token);
      next();
    } catch (err) {
      res.setHeader('WWW-Authenticate', 'Bearer');
      next(err);
    }
  };
}

/** Must run after `requireUser` */
export function requireScope(scope: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.user?.scopes.includes(scope)) {
      next(new ForbiddenError());
      return;
    }
    next();
  };
}
