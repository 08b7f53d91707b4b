/**
 * Tenant Access Policy
 * Single place that decides what a caller may do and which company's data they see.
 * Pure: no I/O, every Ledger/Team/Company operation consumes its decision.
 */

import type { Identity, Role } from '../../../../../shared/types';
import { AccessDeniedError, ValidationError } from '../../errors';

export type AccessAction =
  | 'expense:read'
  | 'expense:write'
  | 'expense:delete'
  | 'team:manage'
  | 'invite:create'
  | 'company:settings'
  | 'company:manage';

/**
 * Data filter applied before any query or aggregation
 */
export type ScopeFilter = { kind: 'all' } | { kind: 'company'; companyId: string };

export type AccessDecision =
  | { allowed: true; scope: ScopeFilter }
  | { allowed: false; reason: string };

const ROLE_ACTIONS: Record<Role, ReadonlySet<AccessAction>> = {
  super_admin: new Set<AccessAction>([
    'expense:read',
    'expense:write',
    'expense:delete',
    'team:manage',
    'invite:create',
    'company:settings',
    'company:manage',
  ]),
  company_admin: new Set<AccessAction>([
    'expense:read',
    'expense:write',
    'expense:delete',
    'team:manage',
    'invite:create',
    'company:settings',
  ]),
  member: new Set<AccessAction>(['expense:read', 'expense:write']),
};

const DENIAL_MESSAGES: Partial<Record<AccessAction, string>> = {
  'company:manage': 'Super admin only',
  'team:manage': 'Admin access required',
  'invite:create': 'Admin access required',
  'company:settings': 'Admin access required',
  'expense:delete': 'Admin access required',
};

/**
 * Decide whether the caller may perform an action, optionally narrowed to one company
 * @param requestedCompanyId - explicit company filter supplied by the caller, if any
 */
export function evaluateAccess(
  identity: Identity,
  action: AccessAction,
  requestedCompanyId?: string | null
): AccessDecision {
  if (!ROLE_ACTIONS[identity.role].has(action)) {
    return { allowed: false, reason: DENIAL_MESSAGES[action] ?? 'Access denied' };
  }

  if (identity.role === 'super_admin') {
    return requestedCompanyId
      ? { allowed: true, scope: { kind: 'company', companyId: requestedCompanyId } }
      : { allowed: true, scope: { kind: 'all' } };
  }

  if (!identity.companyId) {
    return { allowed: false, reason: 'Account is not assigned to a company' };
  }

  // Another tenant's id is rejected, never silently replaced with the caller's own
  if (requestedCompanyId && requestedCompanyId !== identity.companyId) {
    return { allowed: false, reason: 'Access denied' };
  }

  return { allowed: true, scope: { kind: 'company', companyId: identity.companyId } };
}

/**
 * Same as evaluateAccess but throws AccessDenied for a denied decision
 */
export function requireAccess(
  identity: Identity,
  action: AccessAction,
  requestedCompanyId?: string | null
): ScopeFilter {
  const decision = evaluateAccess(identity, action, requestedCompanyId);
  if (!decision.allowed) {
    throw new AccessDeniedError(decision.reason);
  }
  return decision.scope;
}

/**
 * Check access to one stored record owned by recordCompanyId.
 * Rows without a company predate multi-tenancy and are visible to the super admin only.
 */
export function canAccessRecord(
  identity: Identity,
  action: AccessAction,
  recordCompanyId: string | null
): boolean {
  const decision = evaluateAccess(identity, action);
  if (!decision.allowed) {
    return false;
  }
  if (decision.scope.kind === 'all') {
    return true;
  }
  return recordCompanyId !== null && recordCompanyId === decision.scope.companyId;
}

export function requireRecordAccess(
  identity: Identity,
  action: AccessAction,
  recordCompanyId: string | null
): void {
  if (!canAccessRecord(identity, action, recordCompanyId)) {
    const decision = evaluateAccess(identity, action);
    throw new AccessDeniedError(decision.allowed ? 'Access denied' : decision.reason);
  }
}

/**
 * Whether a scope admits a record's company
 */
export function scopeIncludes(scope: ScopeFilter, companyId: string | null): boolean {
  return scope.kind === 'all' || scope.companyId === companyId;
}

/**
 * Admins may never remove or reset the password of their own account
 */
export function assertNotSelf(
  identity: Identity,
  targetUserId: string,
  operation: 'remove' | 'reset-password'
): void {
  if (identity.userId === targetUserId) {
    throw new ValidationError(
      operation === 'remove' ? 'Cannot remove yourself' : 'Cannot reset your own password here'
    );
  }
}
