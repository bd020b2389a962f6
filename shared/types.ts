import type { Role } from '../config/roles';

export const LEAVE_STATUSES = ['pending', 'approved', 'rejected', 'cancelled'] as const;

export type LeaveStatus = (typeof LEAVE_STATUSES)[number];

export type LeaveDecision = Extract<LeaveStatus, 'approved' | 'rejected'>;

export const isLeaveStatus = (value: string): value is LeaveStatus =>
  LEAVE_STATUSES.some((status) => status === value);

export const isLeaveDecision = (value: string): value is LeaveDecision =>
  value === 'approved' || value === 'rejected';

export interface LeaveRequestRecord {
  id: string;
  userId: string;
  leaveType: string;
  startDate: string; // YYYY-MM-DD
  endDate: string; // YYYY-MM-DD, inclusive
  reason: string | null;
  contactDuringLeave: string | null;
  status: LeaveStatus;
  durationDays: number;
  approverId: string | null;
  approverComments: string | null;
  approvedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateLeaveRequestInput {
  userId?: string;
  leaveType?: string;
  startDate?: string;
  endDate?: string;
  reason?: string | null;
  contactDuringLeave?: string | null;
}

export interface UpdateLeaveRequestInput {
  leaveType?: string;
  startDate?: string;
  endDate?: string;
  reason?: string | null;
  contactDuringLeave?: string | null;
}

export interface LeaveTypeBalance {
  allotted: number | null;
  used: number;
  remaining: number | null;
}

export interface LeaveBalance {
  userId: string;
  year: number;
  balances: Record<string, LeaveTypeBalance>;
  totalAvailable: number;
  lastUpdated: Date;
}

export interface DirectoryUser {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  department: string;
  role: Role;
  managerId: string | null;
  isActive: boolean;
}

// Wire shapes: ids as strings, timestamps as ISO strings.

export interface LeaveRequestResponse {
  id: string;
  userId: string;
  leaveType: string;
  startDate: string;
  endDate: string;
  reason: string | null;
  contactDuringLeave: string | null;
  status: LeaveStatus;
  durationDays: number;
  approverId: string | null;
  approverComments: string | null;
  approvedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface LeaveBalanceResponse {
  userId: string;
  year: number;
  balances: Record<string, LeaveTypeBalance>;
  totalAvailable: number;
  lastUpdated: string;
}

export interface LoginResponse {
  message: string;
  token: string;
  user: {
    id: string;
    username: string;
    email: string;
    role: Role;
  };
}
