import mongoose from 'mongoose';
import { LeaveRequest, type ILeaveRequest } from '../models/LeaveRequest';
import { PersistenceError } from '../utils/errors';
import type { LeaveRequestRecord, LeaveStatus } from '../shared/types';

export type NewLeaveRequest = Omit<LeaveRequestRecord, 'id'>;

/** Fields a pending request may have rewritten. `userId` and `createdAt` are fixed at creation. */
export type LeaveRequestChanges = Partial<
  Pick<
    LeaveRequestRecord,
    | 'leaveType'
    | 'startDate'
    | 'endDate'
    | 'reason'
    | 'contactDuringLeave'
    | 'durationDays'
    | 'status'
    | 'approverId'
    | 'approverComments'
    | 'approvedAt'
    | 'updatedAt'
  >
>;

export interface LeaveRequestRepository {
  insert(data: NewLeaveRequest): Promise<LeaveRequestRecord>;
  findById(leaveId: string): Promise<LeaveRequestRecord | null>;
  /** Newest first. */
  findByUser(userId: string, status?: LeaveStatus): Promise<LeaveRequestRecord[]>;
  /** Every pending request, oldest first. */
  findPending(): Promise<LeaveRequestRecord[]>;
  /** Pending requests owned by any of `userIds`, oldest first. */
  findPendingByUserSet(userIds: ReadonlySet<string>): Promise<LeaveRequestRecord[]>;
  /** Requests owned by any of `userIds`, newest first. `null` means every user. */
  findByUserSet(userIds: ReadonlySet<string> | null, status?: LeaveStatus): Promise<LeaveRequestRecord[]>;
  /**
   * Conditional write matched on `status: 'pending'`. Resolves false when the
   * record is missing or has already left pending, so two racing transitions
   * cannot both land.
   */
  updateIfPending(leaveId: string, changes: LeaveRequestChanges): Promise<boolean>;
}

type LeaveRequestDocument = mongoose.HydratedDocument<ILeaveRequest>;

const toRecord = (doc: LeaveRequestDocument): LeaveRequestRecord => ({
  id: String(doc._id),
  userId: String(doc.userId),
  leaveType: doc.leaveType,
  startDate: doc.startDate,
  endDate: doc.endDate,
  reason: doc.reason ?? null,
  contactDuringLeave: doc.contactDuringLeave ?? null,
  status: doc.status,
  durationDays: doc.durationDays,
  approverId: doc.approverId ? String(doc.approverId) : null,
  approverComments: doc.approverComments ?? null,
  approvedAt: doc.approvedAt ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toObjectIds = (ids: ReadonlySet<string>): mongoose.Types.ObjectId[] =>
  [...ids].filter((id) => mongoose.isValidObjectId(id)).map((id) => new mongoose.Types.ObjectId(id));

async function persist<T>(action: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw new PersistenceError(`Failed to ${action}`, error);
  }
}

export class MongoLeaveRequestRepository implements LeaveRequestRepository {
  insert(data: NewLeaveRequest): Promise<LeaveRequestRecord> {
    return persist('create leave request', async () => {
      const doc = await LeaveRequest.create({
        ...data,
        userId: new mongoose.Types.ObjectId(data.userId),
        approverId: data.approverId ? new mongoose.Types.ObjectId(data.approverId) : null,
      });
      return toRecord(doc);
    });
  }

  findById(leaveId: string): Promise<LeaveRequestRecord | null> {
    if (!mongoose.isValidObjectId(leaveId)) return Promise.resolve(null);
    return persist('load leave request', async () => {
      const doc = await LeaveRequest.findById(leaveId);
      return doc ? toRecord(doc) : null;
    });
  }

  findByUser(userId: string, status?: LeaveStatus): Promise<LeaveRequestRecord[]> {
    if (!mongoose.isValidObjectId(userId)) return Promise.resolve([]);
    return persist('list leave requests', async () => {
      const filter: mongoose.FilterQuery<ILeaveRequest> = { userId: new mongoose.Types.ObjectId(userId) };
      if (status) filter.status = status;
      const docs = await LeaveRequest.find(filter).sort({ createdAt: -1 });
      return docs.map(toRecord);
    });
  }

  findPending(): Promise<LeaveRequestRecord[]> {
    return persist('list pending leave requests', async () => {
      const docs = await LeaveRequest.find({ status: 'pending' }).sort({ createdAt: 1 });
      return docs.map(toRecord);
    });
  }

  findPendingByUserSet(userIds: ReadonlySet<string>): Promise<LeaveRequestRecord[]> {
    if (userIds.size === 0) return Promise.resolve([]);
    return persist('list pending leave requests', async () => {
      const docs = await LeaveRequest.find({
        userId: { $in: toObjectIds(userIds) },
        status: 'pending',
      }).sort({ createdAt: 1 });
      return docs.map(toRecord);
    });
  }

  findByUserSet(userIds: ReadonlySet<string> | null, status?: LeaveStatus): Promise<LeaveRequestRecord[]> {
    if (userIds && userIds.size === 0) return Promise.resolve([]);
    return persist('list team leave requests', async () => {
      const filter: mongoose.FilterQuery<ILeaveRequest> = {};
      if (userIds) filter.userId = { $in: toObjectIds(userIds) };
      if (status) filter.status = status;
      const docs = await LeaveRequest.find(filter).sort({ createdAt: -1 });
      return docs.map(toRecord);
    });
  }

  updateIfPending(leaveId: string, changes: LeaveRequestChanges): Promise<boolean> {
    if (!mongoose.isValidObjectId(leaveId)) return Promise.resolve(false);
    return persist('update leave request', async () => {
      const { approverId, ...rest } = changes;
      const update: Record<string, unknown> = { ...rest };
      if (approverId !== undefined) {
        update.approverId = approverId ? new mongoose.Types.ObjectId(approverId) : null;
      }
      const result = await LeaveRequest.updateOne({ _id: leaveId, status: 'pending' }, { $set: update });
      return result.matchedCount > 0;
    });
  }
}
