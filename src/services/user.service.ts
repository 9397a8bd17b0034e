import { Config } from '../config/config';
import {
  AuthError,
  InvalidCredentialsError,
  NotFoundError,
  ValidationError,
} from '../middleware/error.middleware';
import { UserRepository } from '../repositories/user.repository';
import { isRole, PublicUser, Role, toPublicUser, User, UserPatch } from '../types/user.types';
import { Clock, systemClock } from '../utils/clock';
import { logger } from '../utils/logger';
import { PasswordService } from './password.service';

const USERNAME_PATTERN = /^[A-Za-z0-9._@-]{1,64}$/;

/**
 * Normalize and validate a username from user input
 */
export function normalizeUsername(value: unknown): string {
  if (typeof value !== 'string') {
    throw new ValidationError('Username is required');
  }

  const username = value.trim();
  if (!USERNAME_PATTERN.test(username)) {
    throw new ValidationError(
      'Username must be 1-64 characters of letters, digits, ".", "_", "@" or "-"'
    );
  }
  return username;
}

type AdminSeed = Pick<Config['auth'], 'adminUsername' | 'adminPassword'>;

export class UserService {
  private users: UserRepository;
  private passwords: PasswordService;
  private clock: Clock;

  constructor(users: UserRepository, passwords: PasswordService, clock: Clock = systemClock) {
    this.users = users;
    this.passwords = passwords;
    this.clock = clock;
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.users.findByUsername(username);
  }

  async getUser(username: string): Promise<PublicUser> {
    const user = await this.users.findByUsername(username);
    if (!user) {
      throw new NotFoundError(`User "${username}" not found`);
    }
    return toPublicUser(user);
  }

  /**
   * Get all users, oldest first
   */
  async listUsers(): Promise<PublicUser[]> {
    const users = await this.users.list();
    return users.map(toPublicUser);
  }

  /**
   * Create a new user (admin only).
   * The password goes through the same policy check as changePassword.
   */
  async createUser(username: unknown, password: string, role: unknown): Promise<PublicUser> {
    const name = normalizeUsername(username);
    if (!isRole(role)) {
      throw new ValidationError('Role must be "admin" or "standard"');
    }

    const passwordHash = await this.passwords.hash(password);
    const user = await this.users.create({ username: name, passwordHash, role }, this.clock.now());

    logger.info(`User created: ${name}`, { role });
    return toPublicUser(user);
  }

  /**
   * Check login credentials. Unknown, inactive and wrong-password cases are
   * indistinguishable to the caller.
   */
  async authenticate(username: string, password: string): Promise<User> {
    const user = await this.users.findByUsername(username);

    if (!user) {
      await this.passwords.verifyDummy(password);
      logger.warn('Login failed: unknown user', { username });
      throw new InvalidCredentialsError();
    }

    const valid = await this.passwords.verify(password, user.passwordHash);
    if (!valid) {
      logger.warn('Login failed: wrong password', { username });
      throw new InvalidCredentialsError();
    }

    if (!user.isActive) {
      logger.warn('Login failed: account deactivated', { username });
      throw new InvalidCredentialsError();
    }

    const at = this.clock.now();
    await this.users.recordLogin(user.username, at);
    logger.info(`User logged in: ${user.username}`);
    return { ...user, isOnline: true, lastLoginAt: at, lastActiveAt: at };
  }

  /**
   * Self-service password change. Policy is checked before the old password.
   */
  async changePassword(username: string, oldPassword: string, newPassword: string): Promise<void> {
    this.passwords.assertPolicy(newPassword);

    const user = await this.users.findByUsername(username);
    if (!user) {
      throw new NotFoundError(`User "${username}" not found`);
    }

    const valid = await this.passwords.verify(oldPassword, user.passwordHash);
    if (!valid) {
      throw new AuthError('Current password is incorrect');
    }

    const passwordHash = await this.passwords.hash(newPassword);
    await this.users.updatePassword(username, passwordHash, this.clock.now());
    logger.info(`Password changed: ${username}`);
  }

  /**
   * Admin reset of another user's password: no old password, same policy.
   * Admins change their own password through changePassword.
   */
  async resetPassword(actor: string, username: string, newPassword: string): Promise<void> {
    if (actor === username) {
      throw new ValidationError(
        'Use /account/password to change your own password; it requires the current one'
      );
    }

    const passwordHash = await this.passwords.hash(newPassword);

    const updated = await this.users.updatePassword(username, passwordHash, this.clock.now());
    if (!updated) {
      throw new NotFoundError(`User "${username}" not found`);
    }
    logger.info(`Password reset by admin: ${username}`, { by: actor });
  }

  /**
   * Change role and/or active flag. An admin cannot demote or deactivate
   * their own account.
   */
  async updateUser(actor: string, username: string, patch: UserPatch): Promise<PublicUser> {
    if (patch.role === undefined && patch.isActive === undefined) {
      throw new ValidationError('Nothing to update: provide role and/or isActive');
    }

    if (actor === username && (patch.role === 'standard' || patch.isActive === false)) {
      throw new ValidationError('Administrators cannot demote or deactivate themselves');
    }

    const user = await this.users.update(username, patch, this.clock.now());
    if (!user) {
      throw new NotFoundError(`User "${username}" not found`);
    }

    logger.info(`User updated: ${username}`, { ...patch, by: actor });
    return toPublicUser(user);
  }

  /**
   * Update last-active timestamp. Best effort: failures are logged only.
   */
  async touch(username: string): Promise<void> {
    try {
      await this.users.touch(username, this.clock.now());
    } catch (error) {
      logger.warn('Could not update last activity', {
        username,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  /**
   * Record a logout. Best effort: failures are logged only.
   */
  async recordLogout(username: string): Promise<void> {
    try {
      await this.users.recordLogout(username, this.clock.now());
      logger.info(`User logged out: ${username}`);
    } catch (error) {
      logger.warn('Could not record logout', {
        username,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  /**
   * Provision the configured admin account when the store is empty
   */
  async ensureDefaultAdmin(seed: AdminSeed): Promise<boolean> {
    const existing = await this.users.count();
    if (existing > 0) {
      return false;
    }

    const username = normalizeUsername(seed.adminUsername);
    const policy = this.passwords.getPolicy();
    if (seed.adminPassword.length < policy.minLength) {
      logger.warn(
        `Seeded admin password is shorter than ${policy.minLength} characters; change it after first login`
      );
    }

    const role: Role = 'admin';
    const passwordHash = await this.passwords.hash(seed.adminPassword, { enforcePolicy: false });
    await this.users.create({ username, passwordHash, role }, this.clock.now());

    logger.info(`Default admin user created: ${username}`);
    return true;
  }
}
