// =============================================================================
// User Routes — registration, login, profile, admin listing
// =============================================================================
// POST /api/v1/users/register  → 201 user (optional Bearer JWT to grant admin)
// POST /api/v1/users/token     → { access_token, token_type: 'bearer' }
// GET  /api/v1/users/me        → current user            (Bearer JWT)
// PUT  /api/v1/users/me        → updated current user    (Bearer JWT)
// GET  /api/v1/users           → all users               (admin scope)
// =============================================================================
import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { GatewayContext } from '../context';
import { bearerToken, requireScope, requireUser } from '../utils/authMiddleware';
import { UnauthorizedError } from '../utils/GatewayError';

const RegisterSchema = z.object({
  username: z.string().min(3).max(50),
  email: z.string().email(),
  fullName: z.string().min(1).max(100),
  password: z.string().min(8),
  role: z.enum(['admin', 'user']).default('user'),
});

// Accepts the OAuth2 password form (urlencoded) as well as JSON
const LoginSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

const UpdateSchema = z.object({
  email: z.string().email().optional(),
  fullName: z.string().min(1).max(100).optional(),
  password: z.string().min(8).optional(),
});

export default function userRoutes(ctx: GatewayContext): Router {
  const router = Router();
  const { users } = ctx;
  const authenticated = requireUser(users);

  router.post('/register', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = RegisterSchema.parse(req.body);
      const token = bearerToken(req);
      const caller = token ? users.verifyToken(token) : null;
      res.status(201).json(await users.register(input, caller));
    } catch (err) {
      next(err);
    }
  });

  router.post('/token', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { username, password } = LoginSchema.parse(req.body);
      const user = await users.authenticate(username, password);
      if (!user) {
        res.setHeader('WWW-Authenticate', 'Bearer');
        throw new UnauthorizedError('Incorrect username or password');
      }
      res.json({ access_token: users.issueToken(user), token_type: 'bearer' });
    } catch (err) {
      next(err);
    }
  });

  router.get('/me', authenticated, (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.user) throw new UnauthorizedError();
      res.json(users.getByUsername(req.user.sub));
    } catch (err) {
      next(err);
    }
  });

  router.put('/me', authenticated, async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.user) throw new UnauthorizedError();
      const input = UpdateSchema.parse(req.body);
      res.json(await users.update(req.user.sub, input));
    } catch (err) {
      next(err);
    }
  });

  router.get('/', authenticated, requireScope('admin'), (_req: Request, res: Response) => {
    res.json(users.list());
  });

  return router;
}
