import type { UserDirectory } from '../../services/userDirectory';
import type { DirectoryUser } from '../../shared/types';
import type { Role } from '../../config/roles';

export class InMemoryUserDirectory implements UserDirectory {
  private readonly users = new Map<string, DirectoryUser>();
  private readonly teams = new Map<string, Set<string>>();

  addUser(id: string, role: Role, overrides: Partial<DirectoryUser> = {}): DirectoryUser {
    const user: DirectoryUser = {
      id,
      username: id,
      email: `${id}@example.com`,
      firstName: '',
      lastName: '',
      department: 'General',
      role,
      managerId: null,
      isActive: true,
      ...overrides,
    };
    this.users.set(id, user);
    return user;
  }

  setTeam(managerId: string, memberIds: string[]): void {
    this.teams.set(managerId, new Set(memberIds));
  }

  async findUserById(userId: string): Promise<DirectoryUser | null> {
    return this.users.get(userId) ?? null;
  }

  async getTeamMembersByManager(managerId: string): Promise<Set<string>> {
    return new Set(this.teams.get(managerId) ?? []);
  }
}
