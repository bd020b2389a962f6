import { leaveAllotments, isLeaveType, type LeaveAllotments } from '../config/leavePolicy';
import type { Role } from '../config/roles';
import { inclusiveDayCount, isIsoDate, toIsoDate } from '../utils/dates';
import {
  ForbiddenError,
  InvalidArgumentError,
  InvalidStateError,
  NotFoundError,
  PersistenceError,
} from '../utils/errors';
import { authorizeApproval, canApproveLeave, canViewLeave, canViewTeamLeave, hasAdminOverride } from '../utils/permissions';
import {
  isLeaveDecision,
  isLeaveStatus,
  type CreateLeaveRequestInput,
  type LeaveBalance,
  type LeaveRequestRecord,
  type LeaveStatus,
  type LeaveTypeBalance,
  type UpdateLeaveRequestInput,
} from '../shared/types';
import type { LeaveRequestChanges, LeaveRequestRepository } from './leaveRequestRepository';
import type { UserDirectory } from './userDirectory';

export interface LeaveRequestServiceDeps {
  repository: LeaveRequestRepository;
  directory: UserDirectory;
  allotments?: LeaveAllotments;
  now?: () => Date;
}

const optionalText = (value: string | null | undefined): string | null => {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
};

/**
 * Leave-request lifecycle: pending -> approved | rejected | cancelled.
 *
 * Callers pass the authenticated identity and role; actor ids are never read
 * from request payloads. All state lives in the repository, and every
 * transition out of pending goes through its conditional write.
 */
export class LeaveRequestService {
  private readonly repository: LeaveRequestRepository;
  private readonly directory: UserDirectory;
  private readonly allotments: LeaveAllotments;
  private readonly now: () => Date;

  constructor(deps: LeaveRequestServiceDeps) {
    this.repository = deps.repository;
    this.directory = deps.directory;
    this.allotments = deps.allotments ?? leaveAllotments;
    this.now = deps.now ?? (() => new Date());
  }

  async create(requesterId: string, data: CreateLeaveRequestInput): Promise<LeaveRequestRecord> {
    if (!data.userId) {
      throw new InvalidArgumentError('userId is required');
    }
    if (data.userId !== requesterId) {
      throw new ForbiddenError('Cannot request leave for other users');
    }

    const missing = (['leaveType', 'startDate', 'endDate'] as const).filter((field) => !data[field]);
    if (missing.length > 0) {
      throw new InvalidArgumentError(`Missing required fields: ${missing.join(', ')}`);
    }

    const leaveType = this.validateLeaveType(data.leaveType ?? '');
    const { startDate, endDate } = this.validateRange(data.startDate ?? '', data.endDate ?? '');
    const now = this.now();

    return this.repository.insert({
      userId: requesterId,
      leaveType,
      startDate,
      endDate,
      reason: optionalText(data.reason),
      contactDuringLeave: optionalText(data.contactDuringLeave),
      status: 'pending',
      durationDays: inclusiveDayCount(startDate, endDate),
      approverId: null,
      approverComments: null,
      approvedAt: null,
      createdAt: now,
      updatedAt: now,
    });
  }

  async get(leaveId: string): Promise<LeaveRequestRecord> {
    const record = await this.repository.findById(leaveId);
    if (!record) {
      throw new NotFoundError('Leave request not found');
    }
    return record;
  }

  async getForViewer(leaveId: string, viewerId: string, viewerRole: Role): Promise<LeaveRequestRecord> {
    const record = await this.get(leaveId);
    const needsTeamLookup =
      record.userId !== viewerId && !hasAdminOverride(viewerRole) && canViewTeamLeave(viewerRole);
    const ownerInTeam = needsTeamLookup
      ? (await this.directory.getTeamMembersByManager(viewerId)).has(record.userId)
      : false;
    if (!canViewLeave({ viewerId, viewerRole, ownerId: record.userId, ownerInTeam })) {
      throw new ForbiddenError('Not authorized to view this leave request');
    }
    return record;
  }

  async listOwn(userId: string, status?: string): Promise<LeaveRequestRecord[]> {
    return this.repository.findByUser(userId, this.validateStatusFilter(status));
  }

  async listPendingForApprover(approverId: string, approverRole: Role): Promise<LeaveRequestRecord[]> {
    if (!canApproveLeave(approverRole)) {
      throw new ForbiddenError('Not authorized to approve leave requests');
    }
    if (hasAdminOverride(approverRole)) {
      return this.repository.findPending();
    }
    const team = await this.directory.getTeamMembersByManager(approverId);
    return this.repository.findPendingByUserSet(team);
  }

  async listTeamLeaves(approverId: string, approverRole: Role, status?: string): Promise<LeaveRequestRecord[]> {
    if (!canViewTeamLeave(approverRole)) {
      throw new ForbiddenError('Not authorized to view team leave requests');
    }
    const statusFilter = this.validateStatusFilter(status);
    if (hasAdminOverride(approverRole)) {
      return this.repository.findByUserSet(null, statusFilter);
    }
    const team = await this.directory.getTeamMembersByManager(approverId);
    return this.repository.findByUserSet(team, statusFilter);
  }

  /**
   * Approved leave starting between 1 January of the current year and today
   * counts against the allotment. Leave types without an allotment report
   * usage only.
   */
  async getBalance(userId: string): Promise<LeaveBalance> {
    const now = this.now();
    const today = toIsoDate(now);
    const yearStart = `${today.slice(0, 4)}-01-01`;

    const used = new Map<string, number>();
    for (const record of await this.repository.findByUser(userId, 'approved')) {
      if (record.startDate < yearStart || record.startDate > today) continue;
      used.set(record.leaveType, (used.get(record.leaveType) ?? 0) + record.durationDays);
    }

    const balances: Record<string, LeaveTypeBalance> = {};
    let totalAvailable = 0;
    for (const [leaveType, allotted] of Object.entries(this.allotments)) {
      const usedDays = used.get(leaveType) ?? 0;
      const remaining = allotted === null ? null : allotted - usedDays;
      if (remaining !== null) totalAvailable += remaining;
      balances[leaveType] = { allotted, used: usedDays, remaining };
    }

    return {
      userId,
      year: now.getUTCFullYear(),
      balances,
      totalAvailable,
      lastUpdated: now,
    };
  }

  async update(leaveId: string, requesterId: string, patch: UpdateLeaveRequestInput): Promise<LeaveRequestRecord> {
    const record = await this.requirePending(leaveId, 'Cannot update non-pending request');
    if (record.userId !== requesterId) {
      throw new ForbiddenError('Cannot update leave requests for other users');
    }

    const changes: LeaveRequestChanges = {};
    if (patch.leaveType !== undefined) {
      changes.leaveType = this.validateLeaveType(patch.leaveType);
    }
    if (patch.startDate !== undefined || patch.endDate !== undefined) {
      const { startDate, endDate } = this.validateRange(
        patch.startDate ?? record.startDate,
        patch.endDate ?? record.endDate,
      );
      changes.startDate = startDate;
      changes.endDate = endDate;
      changes.durationDays = inclusiveDayCount(startDate, endDate);
    }
    if (patch.reason !== undefined) {
      changes.reason = optionalText(patch.reason);
    }
    if (patch.contactDuringLeave !== undefined) {
      changes.contactDuringLeave = optionalText(patch.contactDuringLeave);
    }
    changes.updatedAt = this.now();

    return this.commit(leaveId, changes, 'Cannot update non-pending request');
  }

  async approveOrReject(
    leaveId: string,
    approverId: string,
    approverRole: Role,
    decision: string,
    comments?: string | null,
  ): Promise<LeaveRequestRecord> {
    if (!isLeaveDecision(decision)) {
      throw new InvalidArgumentError('Decision must be "approved" or "rejected"');
    }

    const record = await this.requirePending(leaveId, 'Can only approve or reject pending requests');

    let ownerInTeam = false;
    if (canApproveLeave(approverRole) && !hasAdminOverride(approverRole)) {
      ownerInTeam = (await this.directory.getTeamMembersByManager(approverId)).has(record.userId);
    }
    switch (authorizeApproval(approverRole, ownerInTeam)) {
      case 'not_approver':
        throw new ForbiddenError('Not authorized to approve leave requests');
      case 'outside_team':
        throw new ForbiddenError('Cannot approve or reject leave requests for users outside your team');
      case 'ok':
        break;
    }

    const now = this.now();
    return this.commit(
      leaveId,
      {
        status: decision,
        approverId,
        approverComments: optionalText(comments),
        approvedAt: decision === 'approved' ? now : null,
        updatedAt: now,
      },
      'Can only approve or reject pending requests',
    );
  }

  async cancel(leaveId: string, requesterId: string): Promise<LeaveRequestRecord> {
    const record = await this.requirePending(leaveId, 'Can only cancel pending requests');
    if (record.userId !== requesterId) {
      throw new ForbiddenError('Cannot cancel leave requests for other users');
    }

    return this.commit(leaveId, { status: 'cancelled', updatedAt: this.now() }, 'Can only cancel pending requests');
  }

  private async requirePending(leaveId: string, message: string): Promise<LeaveRequestRecord> {
    const record = await this.get(leaveId);
    if (record.status !== 'pending') {
      throw new InvalidStateError(message);
    }
    return record;
  }

  /**
   * Writes `changes` only if the record is still pending, then reads it back.
   * A lost race surfaces as NotFound/InvalidState; a write that cannot be
   * confirmed surfaces as a persistence failure.
   */
  private async commit(leaveId: string, changes: LeaveRequestChanges, stateMessage: string): Promise<LeaveRequestRecord> {
    const written = await this.repository.updateIfPending(leaveId, changes);
    if (!written) {
      const current = await this.repository.findById(leaveId);
      if (!current) throw new NotFoundError('Leave request not found');
      throw new InvalidStateError(stateMessage);
    }

    const confirmed = await this.repository.findById(leaveId);
    if (!confirmed) {
      throw new PersistenceError('Failed to confirm leave request update');
    }
    return confirmed;
  }

  private validateLeaveType(leaveType: string): string {
    const normalized = leaveType.trim().toLowerCase();
    if (!isLeaveType(normalized, this.allotments)) {
      throw new InvalidArgumentError(
        `Unknown leave type "${leaveType}". Expected one of: ${Object.keys(this.allotments).join(', ')}`,
      );
    }
    return normalized;
  }

  private validateRange(startDate: string, endDate: string): { startDate: string; endDate: string } {
    if (!isIsoDate(startDate)) {
      throw new InvalidArgumentError('startDate must be a valid YYYY-MM-DD date');
    }
    if (!isIsoDate(endDate)) {
      throw new InvalidArgumentError('endDate must be a valid YYYY-MM-DD date');
    }
    if (startDate > endDate) {
      throw new InvalidArgumentError('endDate must not be before startDate');
    }
    return { startDate, endDate };
  }

  private validateStatusFilter(status: string | undefined): LeaveStatus | undefined {
    if (status === undefined || status === '') return undefined;
    if (!isLeaveStatus(status)) {
      throw new InvalidArgumentError(`Unknown status "${status}"`);
    }
    return status;
  }
}
