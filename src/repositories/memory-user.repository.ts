import { ConflictError } from '../middleware/error.middleware';
import { NewUser, User, UserPatch } from '../types/user.types';
import { UserRepository } from './user.repository';

/**
 * In-process user store with the same contract as PgUserRepository.
 * Returned users are copies; callers cannot mutate stored state.
 */
export class InMemoryUserRepository implements UserRepository {
  private users: Map<string, User> = new Map();

  async findByUsername(username: string): Promise<User | null> {
    const user = this.users.get(username);
    return user ? { ...user } : null;
  }

  async create(user: NewUser, at: Date): Promise<User> {
    if (this.users.has(user.username)) {
      throw new ConflictError(`User "${user.username}" already exists`);
    }

    const stored: User = {
      username: user.username,
      passwordHash: user.passwordHash,
      role: user.role,
      isActive: true,
      isOnline: false,
      lastActiveAt: null,
      lastLoginAt: null,
      lastLogoutAt: null,
      createdAt: at,
      updatedAt: at,
    };
    this.users.set(user.username, stored);
    return { ...stored };
  }

  async list(): Promise<User[]> {
    return [...this.users.values()]
      .sort(
        (a, b) =>
          a.createdAt.getTime() - b.createdAt.getTime() || a.username.localeCompare(b.username)
      )
      .map((user) => ({ ...user }));
  }

  async count(): Promise<number> {
    return this.users.size;
  }

  async updatePassword(username: string, passwordHash: string, at: Date): Promise<boolean> {
    const user = this.users.get(username);
    if (!user) {
      return false;
    }
    user.passwordHash = passwordHash;
    user.updatedAt = at;
    return true;
  }

  async update(username: string, patch: UserPatch, at: Date): Promise<User | null> {
    const user = this.users.get(username);
    if (!user) {
      return null;
    }

    if (patch.role !== undefined) {
      user.role = patch.role;
    }
    if (patch.isActive !== undefined) {
      user.isActive = patch.isActive;
      if (!patch.isActive) {
        user.isOnline = false;
      }
    }
    user.updatedAt = at;
    return { ...user };
  }

  async recordLogin(username: string, at: Date): Promise<void> {
    const user = this.users.get(username);
    if (user) {
      user.lastLoginAt = at;
      user.lastActiveAt = at;
      user.isOnline = true;
    }
  }

  async recordLogout(username: string, at: Date): Promise<void> {
    const user = this.users.get(username);
    if (user) {
      user.lastLogoutAt = at;
      user.isOnline = false;
    }
  }

  async touch(username: string, at: Date): Promise<void> {
    const user = this.users.get(username);
    if (user) {
      user.lastActiveAt = at;
    }
  }
}
