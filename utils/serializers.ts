import type {
  LeaveBalance,
  LeaveBalanceResponse,
  LeaveRequestRecord,
  LeaveRequestResponse,
} from '../shared/types';

export const serializeLeaveRequest = (record: LeaveRequestRecord): LeaveRequestResponse => ({
  id: record.id,
  userId: record.userId,
  leaveType: record.leaveType,
  startDate: record.startDate,
  endDate: record.endDate,
  reason: record.reason,
  contactDuringLeave: record.contactDuringLeave,
  status: record.status,
  durationDays: record.durationDays,
  approverId: record.approverId,
  approverComments: record.approverComments,
  approvedAt: record.approvedAt ? record.approvedAt.toISOString() : null,
  createdAt: record.createdAt.toISOString(),
  updatedAt: record.updatedAt.toISOString(),
});

export const serializeLeaveBalance = (balance: LeaveBalance): LeaveBalanceResponse => ({
  ...balance,
  lastUpdated: balance.lastUpdated.toISOString(),
});
