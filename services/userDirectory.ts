import mongoose from 'mongoose';
import { User, type UserDocument } from '../models/User';
import { Team } from '../models/Team';
import { normalizeRole } from '../config/roles';
import { canViewTeamLeave, hasAdminOverride } from '../utils/permissions';
import { PersistenceError } from '../utils/errors';
import type { DirectoryUser } from '../shared/types';

/**
 * Read-only view of who exists and who reports to whom. The leave workflow
 * consults it for authentication and team scoping but never writes to it.
 */
export interface UserDirectory {
  findUserById(userId: string): Promise<DirectoryUser | null>;
  getTeamMembersByManager(managerId: string): Promise<Set<string>>;
}

export const toDirectoryUser = (user: UserDocument): DirectoryUser => ({
  id: String(user._id),
  username: user.username,
  email: user.email,
  firstName: user.firstName,
  lastName: user.lastName,
  department: user.department,
  role: normalizeRole(user.role),
  managerId: user.managerId ? String(user.managerId) : null,
  isActive: user.isActive,
});

const idsOf = (docs: Array<{ _id: mongoose.Types.ObjectId }>): Set<string> =>
  new Set(docs.map((doc) => String(doc._id)));

export class MongoUserDirectory implements UserDirectory {
  async findUserById(userId: string): Promise<DirectoryUser | null> {
    if (!mongoose.isValidObjectId(userId)) return null;
    try {
      const user = await User.findById(userId);
      return user ? toDirectoryUser(user) : null;
    } catch (error) {
      throw new PersistenceError('Failed to load user', error);
    }
  }

  /**
   * Resolves a manager's reporting line, first match wins:
   * the team they lead, their direct reports, the rest of their department,
   * and for administrators every non-admin user. The manager is never part of
   * their own team.
   */
  async getTeamMembersByManager(managerId: string): Promise<Set<string>> {
    if (!mongoose.isValidObjectId(managerId)) return new Set();
    try {
      const manager = await User.findById(managerId);
      if (!manager) return new Set();

      const role = normalizeRole(manager.role);
      if (!canViewTeamLeave(role)) return new Set();

      const team = await Team.findOne({ leadId: manager._id });
      if (team) {
        const members = new Set(team.members.map((member) => String(member.userId)));
        members.delete(managerId);
        return members;
      }

      const directReports = await User.find({ managerId: manager._id }).select('_id');
      if (directReports.length > 0) return idsOf(directReports);

      if (manager.department) {
        const departmentMembers = await User.find({
          department: manager.department,
          _id: { $ne: manager._id },
        }).select('_id');
        if (departmentMembers.length > 0) return idsOf(departmentMembers);
      }

      if (hasAdminOverride(role)) {
        const everyone = await User.find({ role: { $ne: 'admin' }, _id: { $ne: manager._id } }).select('_id');
        return idsOf(everyone);
      }

      return new Set();
    } catch (error) {
      throw new PersistenceError('Failed to resolve team members', error);
    }
  }
}
