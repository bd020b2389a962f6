import mongoose from 'mongoose';
import { LEAVE_STATUSES, type LeaveStatus } from '../shared/types';

export interface ILeaveRequest {
  userId: mongoose.Types.ObjectId;
  leaveType: string;
  startDate: string; // YYYY-MM-DD
  endDate: string; // YYYY-MM-DD
  reason: string | null;
  contactDuringLeave: string | null;
  status: LeaveStatus;
  durationDays: number;
  approverId: mongoose.Types.ObjectId | null;
  approverComments: string | null;
  approvedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

// createdAt/updatedAt are stamped by LeaveRequestService, not by mongoose timestamps.
const leaveRequestSchema = new mongoose.Schema<ILeaveRequest>({
  userId: { type: mongoose.Schema.Types.ObjectId, ref: 'User', required: true, immutable: true },
  leaveType: { type: String, required: true, trim: true },
  startDate: { type: String, required: true },
  endDate: { type: String, required: true },
  reason: { type: String, default: null },
  contactDuringLeave: { type: String, default: null },
  status: { type: String, enum: [...LEAVE_STATUSES], default: 'pending' },
  durationDays: { type: Number, required: true, min: 1 },
  approverId: { type: mongoose.Schema.Types.ObjectId, ref: 'User', default: null },
  approverComments: { type: String, default: null },
  approvedAt: { type: Date, default: null },
  createdAt: { type: Date, required: true, immutable: true },
  updatedAt: { type: Date, required: true },
});

leaveRequestSchema.index({ userId: 1, createdAt: -1 });
leaveRequestSchema.index({ status: 1, userId: 1, createdAt: 1 });

export const LeaveRequest = mongoose.model<ILeaveRequest>('LeaveRequest', leaveRequestSchema);
