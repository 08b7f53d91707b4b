/**
 * Tenant Types
 * Companies, users, invite codes and the resolved caller identity
 */

export const ROLES = ['super_admin', 'company_admin', 'member'] as const;
export type Role = (typeof ROLES)[number];

/**
 * Roles an invite code may grant (super admin is never invited)
 */
export type InvitableRole = Exclude<Role, 'super_admin'>;

export interface Company {
  id: string;
  name: string;
  homeCurrency: string;
  createdAt: Date;
}

export interface CompanySummary extends Company {
  userCount: number;
  expenseCount: number;
  totalSpentUsd: number;
}

export interface User {
  id: string;
  name: string;
  email: string; // always lower-cased
  passwordHash: string;
  role: Role;
  companyId: string | null; // null only for super_admin
  createdAt: Date;
}

/**
 * User as exposed to the presentation layer (no password hash)
 */
export type TeamMember = Omit<User, 'passwordHash'>;

export interface InviteCode {
  code: string;
  companyId: string;
  role: InvitableRole;
  createdBy: string;
  usedBy: string | null;
  usedAt: Date | null;
  createdAt: Date;
}

export interface Session {
  token: string;
  userId: string;
  createdAt: Date;
  expiresAt: Date;
}

/**
 * Authenticated caller, resolved from a session on every request
 */
export interface Identity {
  userId: string;
  name: string;
  email: string;
  role: Role;
  companyId: string | null;
  companyName: string;
}
