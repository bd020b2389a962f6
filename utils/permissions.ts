/**
 * Leave authorization rules. Every route and service decision about who may
 * approve or view a leave request goes through these predicates; none of them
 * touch the database, so callers resolve team membership first.
 */
import { hasCapability, type Role } from '../config/roles';

export type ApprovalCheck = 'ok' | 'not_approver' | 'outside_team';

export const canApproveLeave = (role: Role): boolean => hasCapability(role, 'leave:approve');

export const hasAdminOverride = (role: Role): boolean => hasCapability(role, 'leave:admin_override');

export const canViewTeamLeave = (role: Role): boolean => hasCapability(role, 'leave:view_team');

export function authorizeApproval(role: Role, ownerInTeam: boolean): ApprovalCheck {
  if (!canApproveLeave(role)) return 'not_approver';
  if (hasAdminOverride(role)) return 'ok';
  return ownerInTeam ? 'ok' : 'outside_team';
}

export interface ViewCheck {
  viewerId: string;
  viewerRole: Role;
  ownerId: string;
  ownerInTeam: boolean;
}

export function canViewLeave({ viewerId, viewerRole, ownerId, ownerInTeam }: ViewCheck): boolean {
  if (viewerId === ownerId) return true;
  if (hasAdminOverride(viewerRole)) return true;
  return ownerInTeam && canViewTeamLeave(viewerRole);
}
