// =============================================================================
// User Service — in-memory accounts + login JWTs
// =============================================================================
// Scaffolding for gateway users, independent of the Atlassian session:
//   register (admin role only for the first account or an admin caller)
//   authenticate / getByUsername / update / list
//   issueToken(user)  → HS256 JWT { sub: username, scopes: [role] }
//   verifyToken(jwt)  → claims, or UnauthorizedError
// =============================================================================
import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { AppConfig } from '../config';
import type { User, UserRole } from '../types';
import logger from '../utils/logger';
import { BadRequestError, NotFoundError, UnauthorizedError } from '../utils/GatewayError';

export interface RegisterInput {
  username: string;
  email: string;
  fullName: string;
  password: string;
  role?: UserRole;
}

export interface UpdateUserInput {
  email?: string;
  fullName?: string;
  password?: string;
}

export interface TokenClaims {
  sub: string;
  scopes: string[];
}

interface StoredUser extends User {
  passwordHash: string;
}

/** bcrypt cost factor */
export const SALT_ROUNDS = 10;

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  scopes: z.array(z.string()).default([]),
});

function toPublic({ passwordHash: _passwordHash, ...user }: StoredUser): User {
  return { ...user };
}

export class UserService {
  private readonly users = new Map<string, StoredUser>();
  private nextId = 1;
  private readonly jwtSecret: string;
  private readonly expiresInS: number;
  private readonly now: () => number;

  constructor(
    config: Pick<AppConfig, 'jwtSecret' | 'jwtExpiresInS'>,
    now: () => number = Date.now,
  ) {
    this.jwtSecret = config.jwtSecret;
    this.expiresInS = config.jwtExpiresInS;
    this.now = now;
  }

  /**
   * Creates an account. A requested `admin` role is granted only to the very
   * first account or when `caller` already holds the admin scope; anyone
   * else is registered as a plain user.
   */
  async register(input: RegisterInput, caller: TokenClaims | null = null): Promise<User> {
    if (this.users.has(input.username)) {
      throw new BadRequestError('Username already registered');
    }

    const mayGrantAdmin = this.users.size === 0 || Boolean(caller?.scopes.includes('admin'));
    const role: UserRole = input.role === 'admin' && mayGrantAdmin ? 'admin' : 'user';
    if (input.role === 'admin' && role !== 'admin') {
      logger.warn('Admin role requested without admin rights, registering as user', {
        username: input.username,
      });
    }

    const stored: StoredUser = {
      id: this.nextId++,
      username: input.username,
      email: input.email,
      fullName: input.fullName,
      role,
      isActive: true,
      jiraConnected: false,
      confluenceConnected: false,
      createdAt: new Date(this.now()).toISOString(),
      updatedAt: null,
      passwordHash: await bcrypt.hash(input.password, SALT_ROUNDS),
    };
    this.users.set(stored.username, stored);

    logger.info('User registered', { id: stored.id, username: stored.username, role: stored.role });
    return toPublic(stored);
  }

  /** `null` for an unknown user or a wrong password */
  async authenticate(username: string, password: string): Promise<User | null> {
    const stored = this.users.get(username);
    if (!stored || !stored.isActive) return null;
    if (!(await bcrypt.compare(password, stored.passwordHash))) return null;
    return toPublic(stored);
  }

  getByUsername(username: string): User {
    return toPublic(this.require(username));
  }

  async update(username: string, input: UpdateUserInput): Promise<User> {
    const stored = this.require(username);
    if (input.email !== undefined) stored.email = input.email;
    if (input.fullName !== undefined) stored.fullName = input.fullName;
    if (input.password !== undefined) stored.passwordHash = await bcrypt.hash(input.password, SALT_ROUNDS);
    stored.updatedAt = new Date(this.now()).toISOString();
    return toPublic(stored);
  }

  list(): User[] {
    return [...this.users.values()].map(toPublic);
  }

  issueToken(user: User): string {
    return jwt.sign({ sub: user.username, scopes: [user.role] }, this.jwtSecret, {
      algorithm: 'HS256',
      expiresIn: this.expiresInS,
    });
  }

  /** @throws UnauthorizedError — bad signature, expired, or malformed claims */
  verifyToken(token: string): TokenClaims {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.jwtSecret, { algorithms: ['HS256'] });
    } catch {
      throw new UnauthorizedError();
    }

    const parsed = ClaimsSchema.safeParse(decoded);
    if (!parsed.success) throw new UnauthorizedError();
    return parsed.data;
  }

  private require(username: string): StoredUser {
    const stored = this.users.get(username);
    if (!stored) throw new NotFoundError('User not found');
    return stored;
  }
}
