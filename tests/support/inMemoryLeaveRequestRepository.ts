import type {
  LeaveRequestChanges,
  LeaveRequestRepository,
  NewLeaveRequest,
} from '../../services/leaveRequestRepository';
import type { LeaveRequestRecord, LeaveStatus } from '../../shared/types';

const newestFirst = (a: LeaveRequestRecord, b: LeaveRequestRecord) => b.createdAt.getTime() - a.createdAt.getTime();
const oldestFirst = (a: LeaveRequestRecord, b: LeaveRequestRecord) => a.createdAt.getTime() - b.createdAt.getTime();

/** Map-backed repository; ids are 24-hex strings so they pass route id validation. */
export class InMemoryLeaveRequestRepository implements LeaveRequestRepository {
  readonly records = new Map<string, LeaveRequestRecord>();
  private sequence = 0;

  async insert(data: NewLeaveRequest): Promise<LeaveRequestRecord> {
    this.sequence += 1;
    const record: LeaveRequestRecord = { ...data, id: this.sequence.toString(16).padStart(24, '0') };
    this.records.set(record.id, record);
    return { ...record };
  }

  async findById(leaveId: string): Promise<LeaveRequestRecord | null> {
    const record = this.records.get(leaveId);
    return record ? { ...record } : null;
  }

  async findByUser(userId: string, status?: LeaveStatus): Promise<LeaveRequestRecord[]> {
    return this.select((r) => r.userId === userId && (!status || r.status === status)).sort(newestFirst);
  }

  async findPending(): Promise<LeaveRequestRecord[]> {
    return this.select((r) => r.status === 'pending').sort(oldestFirst);
  }

  async findPendingByUserSet(userIds: ReadonlySet<string>): Promise<LeaveRequestRecord[]> {
    return this.select((r) => r.status === 'pending' && userIds.has(r.userId)).sort(oldestFirst);
  }

  async findByUserSet(userIds: ReadonlySet<string> | null, status?: LeaveStatus): Promise<LeaveRequestRecord[]> {
    return this.select(
      (r) => (userIds === null || userIds.has(r.userId)) && (!status || r.status === status),
    ).sort(newestFirst);
  }

  async updateIfPending(leaveId: string, changes: LeaveRequestChanges): Promise<boolean> {
    const record = this.records.get(leaveId);
    if (!record || record.status !== 'pending') return false;
    this.records.set(leaveId, { ...record, ...changes });
    return true;
  }

  private select(predicate: (record: LeaveRequestRecord) => boolean): LeaveRequestRecord[] {
    return [...this.records.values()].filter(predicate).map((record) => ({ ...record }));
  }
}
