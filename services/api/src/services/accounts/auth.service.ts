/**
 * Accounts and sessions
 * Registration (first user bootstraps the super admin, everyone else joins through an
 * invite code), password login, and bearer sessions stored server-side.
 */

import { randomBytes, randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Identity, User } from '../../../../../shared/types';
import { UnauthorizedError, ValidationError } from '../../errors';
import logger from '../../logger';
import {
  EMAIL_TAKEN_MESSAGE,
  type CompanyRepository,
  type SessionRepository,
  type UserRepository,
} from '../../repositories';
import { MIN_PASSWORD_LENGTH, hashPassword, verifyPassword } from './password';

export const ALL_COMPANIES_LABEL = 'All Companies';
const SESSION_TOKEN_BYTES = 32;

export interface SessionResult {
  token: string;
  identity: Identity;
}

export interface RegistrationResult extends SessionResult {
  message: string;
}

export interface AuthServiceOptions {
  sessionTtlMs: number;
  now?: () => Date;
}

const RegisterSchema = z.object({
  name: z.string().trim().default(''),
  email: z.string().trim().toLowerCase().default(''),
  password: z.string().default(''),
  inviteCode: z.string().trim().default(''),
});

const LoginSchema = z.object({
  email: z.string().trim().toLowerCase().default(''),
  password: z.string().default(''),
});

export function assertPasswordLength(password: string): void {
  if (password.length < MIN_PASSWORD_LENGTH) {
    throw new ValidationError(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
  }
}

export class AuthService {
  private readonly now: () => Date;

  constructor(
    private users: UserRepository,
    private sessions: SessionRepository,
    private companies: CompanyRepository,
    private options: AuthServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async register(input: unknown): Promise<RegistrationResult> {
    const { name, email, password, inviteCode } = RegisterSchema.parse(input ?? {});
    if (!name || !email || !password) {
      throw new ValidationError('All fields are required');
    }
    assertPasswordLength(password);

    if (await this.users.findByEmail(email)) {
      throw new ValidationError(EMAIL_TAKEN_MESSAGE);
    }

    const base = {
      id: randomUUID(),
      name,
      email,
      passwordHash: await hashPassword(password),
      createdAt: this.now(),
    };
    const log = logger.child({ userId: base.id });

    const firstUser: User = { ...base, role: 'super_admin', companyId: null };
    if (await this.users.createFirstUser(firstUser)) {
      log.info('First user registered as super admin');
      const session = await this.openSession(firstUser);
      return { ...session, message: 'Welcome! You are the Super Admin.' };
    }

    if (!inviteCode) {
      throw new ValidationError('Invite code required. Ask your admin for one.');
    }

    const user = await this.users.createWithInvite(base, inviteCode);
    log.info({ companyId: user.companyId, role: user.role }, 'User registered with invite code');
    const session = await this.openSession(user);
    return { ...session, message: `Welcome to ${session.identity.companyName}!` };
  }

  async login(input: unknown): Promise<SessionResult> {
    const { email, password } = LoginSchema.parse(input ?? {});
    const user = email ? await this.users.findByEmail(email) : null;

    if (!user || !(await verifyPassword(password, user.passwordHash))) {
      throw new UnauthorizedError('Invalid email or password');
    }

    logger.info({ userId: user.id }, 'User logged in');
    return this.openSession(user);
  }

  async logout(token: string): Promise<void> {
    await this.sessions.delete(token);
  }

  /**
   * Resolve a bearer token to the caller's identity; expired sessions are deleted
   */
  async resolveSession(token: string): Promise<Identity> {
    const session = token ? await this.sessions.find(token) : null;
    if (!session) {
      throw new UnauthorizedError();
    }

    if (session.expiresAt.getTime() <= this.now().getTime()) {
      await this.sessions.delete(token);
      throw new UnauthorizedError('Session expired');
    }

    const user = await this.users.findById(session.userId);
    if (!user) {
      await this.sessions.delete(token);
      throw new UnauthorizedError();
    }
    return this.toIdentity(user);
  }

  async toIdentity(user: User): Promise<Identity> {
    const company = user.companyId ? await this.companies.findById(user.companyId) : null;
    return {
      userId: user.id,
      name: user.name,
      email: user.email,
      role: user.role,
      companyId: user.companyId,
      companyName: user.companyId ? (company?.name ?? '') : ALL_COMPANIES_LABEL,
    };
  }

  private async openSession(user: User): Promise<SessionResult> {
    const token = randomBytes(SESSION_TOKEN_BYTES).toString('base64url');
    const createdAt = this.now();
    await this.sessions.create({
      token,
      userId: user.id,
      createdAt,
      expiresAt: new Date(createdAt.getTime() + this.options.sessionTtlMs),
    });
    return { token, identity: await this.toIdentity(user) };
  }
}
