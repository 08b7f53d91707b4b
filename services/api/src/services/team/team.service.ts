/**
 * Team management
 * Members, pending invites, removal and admin password resets within the caller's scope
 */

import { z } from 'zod';
import type {
  Identity,
  InvitableRole,
  InviteCode,
  TeamMember,
  User,
} from '../../../../../shared/types';
import { AccessDeniedError, NotFoundError, ValidationError } from '../../errors';
import logger from '../../logger';
import type {
  CompanyRepository,
  InviteCodeRepository,
  SessionRepository,
  UserRepository,
} from '../../repositories';
import {
  assertNotSelf,
  requireAccess,
  requireRecordAccess,
  type AccessAction,
} from '../access/access-policy.service';
import { assertPasswordLength } from '../accounts/auth.service';
import { hashPassword } from '../accounts/password';
import { generateInviteCode } from './invite-code';

export interface TeamOverview {
  users: TeamMember[];
  pendingInvites: InviteCode[];
}

const InviteRequestSchema = z.object({
  role: z.string().optional(),
  companyId: z.string().trim().optional(),
});

const ResetPasswordSchema = z.object({
  password: z.string().trim().default(''),
});

export function toTeamMember(user: User): TeamMember {
  const { passwordHash: _passwordHash, ...member } = user;
  return member;
}

function toInvitableRole(role: string | undefined): InvitableRole {
  return role === 'company_admin' ? 'company_admin' : 'member';
}

export class TeamService {
  constructor(
    private users: UserRepository,
    private inviteCodes: InviteCodeRepository,
    private sessions: SessionRepository,
    private companies: CompanyRepository,
    private now: () => Date = () => new Date()
  ) {}

  async listTeam(identity: Identity, companyId?: string | null): Promise<TeamOverview> {
    const scope = requireAccess(identity, 'team:manage', companyId);
    const [users, pendingInvites] = await Promise.all([
      this.users.list(scope),
      this.inviteCodes.listPending(scope),
    ]);
    return { users: users.map(toTeamMember), pendingInvites };
  }

  /**
   * Company admins invite members to their own company; the super admin picks the
   * company and may invite another company admin
   */
  async createInvite(identity: Identity, input: unknown): Promise<InviteCode> {
    const request = InviteRequestSchema.parse(input ?? {});
    const scope = requireAccess(identity, 'invite:create', request.companyId || null);
    if (scope.kind === 'all') {
      throw new ValidationError('Select a company');
    }

    if (!(await this.companies.findById(scope.companyId))) {
      throw new NotFoundError('Company not found');
    }

    const invite: InviteCode = {
      code: generateInviteCode(),
      companyId: scope.companyId,
      role: identity.role === 'super_admin' ? toInvitableRole(request.role) : 'member',
      createdBy: identity.userId,
      usedBy: null,
      usedAt: null,
      createdAt: this.now(),
    };
    await this.inviteCodes.create(invite);

    logger.info(
      { companyId: invite.companyId, role: invite.role, createdBy: identity.userId },
      'Invite code created'
    );
    return invite;
  }

  async removeMember(identity: Identity, userId: string): Promise<void> {
    requireAccess(identity, 'team:manage');
    assertNotSelf(identity, userId, 'remove');
    const target = await this.findTarget(identity, userId, 'team:manage');

    await this.users.delete(target.id);
    const sessions = await this.sessions.deleteForUser(target.id);
    logger.info({ userId: target.id, removedBy: identity.userId, sessions }, 'Team member removed');
  }

  async resetPassword(identity: Identity, userId: string, input: unknown): Promise<void> {
    requireAccess(identity, 'team:manage');
    const { password } = ResetPasswordSchema.parse(input ?? {});
    assertPasswordLength(password);
    assertNotSelf(identity, userId, 'reset-password');
    const target = await this.findTarget(identity, userId, 'team:manage');

    await this.users.updatePasswordHash(target.id, await hashPassword(password));
    // Existing sessions of the target end with the old password
    await this.sessions.deleteForUser(target.id);
    logger.info({ userId: target.id, resetBy: identity.userId }, 'Password reset by admin');
  }

  /**
   * Missing users look like foreign ones to tenant admins
   */
  private async findTarget(identity: Identity, userId: string, action: AccessAction): Promise<User> {
    const target = await this.users.findById(userId);
    if (!target) {
      if (identity.role === 'super_admin') {
        throw new NotFoundError('User not found');
      }
      throw new AccessDeniedError();
    }
    requireRecordAccess(identity, action, target.companyId);
    return target;
  }
}
