import {
  AuthError,
  ConflictError,
  InvalidCredentialsError,
  NotFoundError,
  PolicyError,
  ValidationError,
} from '../middleware/error.middleware';
import { InMemoryUserRepository } from '../repositories/memory-user.repository';
import { PasswordService } from '../services/password.service';
import { normalizeUsername, UserService } from '../services/user.service';
import { FixedClock } from '../utils/clock';
import { START_TIME } from './helpers';

class FailingActivityRepository extends InMemoryUserRepository {
  async touch(): Promise<void> {
    throw new Error('database unavailable');
  }

  async recordLogout(): Promise<void> {
    throw new Error('database unavailable');
  }
}

describe('normalizeUsername', () => {
  it('trims surrounding whitespace', () => {
    expect(normalizeUsername('  j.martin  ')).toBe('j.martin');
  });

  it.each(['', '   ', 'has space', 'semi;colon', 'x'.repeat(65)])('rejects %p', (value) => {
    expect(() => normalizeUsername(value)).toThrow(ValidationError);
  });

  it('rejects non-strings', () => {
    expect(() => normalizeUsername(42)).toThrow('Username is required');
  });
});

describe('UserService', () => {
  let clock: FixedClock;
  let repository: InMemoryUserRepository;
  let users: UserService;

  beforeEach(() => {
    clock = new FixedClock(START_TIME);
    repository = new InMemoryUserRepository();
    users = new UserService(
      repository,
      new PasswordService({ passwordMinLength: 8, bcryptRounds: 4 }),
      clock
    );
  });

  describe('createUser', () => {
    it('creates a user and returns it without the hash', async () => {
      const user = await users.createUser('claire', 'planning-board', 'standard');

      expect(user).toEqual({
        username: 'claire',
        role: 'standard',
        isActive: true,
        isOnline: false,
        lastActiveAt: null,
        lastLoginAt: null,
        lastLogoutAt: null,
        createdAt: START_TIME,
        updatedAt: START_TIME,
      });
      expect('passwordHash' in user).toBe(false);
    });

    it('applies the password policy to admin-created accounts', async () => {
      await expect(users.createUser('claire', 'short', 'standard')).rejects.toBeInstanceOf(
        PolicyError
      );
      expect(await repository.count()).toBe(0);
    });

    it('applies the same policy as changePassword', async () => {
      await users.createUser('claire', 'planning-board', 'standard');

      await expect(users.createUser('marc', '1234567', 'standard')).rejects.toThrow(
        'Password must be at least 8 characters long'
      );
      await expect(users.changePassword('claire', 'planning-board', '1234567')).rejects.toThrow(
        'Password must be at least 8 characters long'
      );
    });

    it('rejects a duplicate username', async () => {
      await users.createUser('claire', 'planning-board', 'standard');

      await expect(users.createUser('claire', 'another-password', 'admin')).rejects.toBeInstanceOf(
        ConflictError
      );
    });

    it('rejects roles outside the closed set', async () => {
      await expect(users.createUser('claire', 'planning-board', 'owner')).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('rejects malformed usernames', async () => {
      await expect(users.createUser('two words', 'planning-board', 'standard')).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });

  describe('authenticate', () => {
    beforeEach(async () => {
      await users.createUser('claire', 'planning-board', 'standard');
    });

    it('returns the user and records the login', async () => {
      clock.advance(60_000);
      const user = await users.authenticate('claire', 'planning-board');

      const loginTime = new Date(START_TIME.getTime() + 60_000);
      expect(user.username).toBe('claire');
      expect(user.isOnline).toBe(true);
      expect(user.lastLoginAt).toEqual(loginTime);

      const stored = await repository.findByUsername('claire');
      expect(stored?.isOnline).toBe(true);
      expect(stored?.lastLoginAt).toEqual(loginTime);
      expect(stored?.lastActiveAt).toEqual(loginTime);
    });

    it('rejects a wrong password', async () => {
      await expect(users.authenticate('claire', 'planning-bored')).rejects.toBeInstanceOf(
        InvalidCredentialsError
      );
    });

    it('rejects an unknown user with the same error', async () => {
      await expect(users.authenticate('nobody', 'planning-board')).rejects.toThrow(
        'Invalid username or password'
      );
    });

    it('rejects a deactivated user', async () => {
      await repository.update('claire', { isActive: false }, START_TIME);

      await expect(users.authenticate('claire', 'planning-board')).rejects.toBeInstanceOf(
        InvalidCredentialsError
      );
    });
  });

  describe('changePassword', () => {
    beforeEach(async () => {
      await users.createUser('claire', 'planning-board', 'standard');
    });

    it('replaces the password', async () => {
      await users.changePassword('claire', 'planning-board', 'service-orders');

      await expect(users.authenticate('claire', 'service-orders')).resolves.toMatchObject({
        username: 'claire',
      });
      await expect(users.authenticate('claire', 'planning-board')).rejects.toBeInstanceOf(
        InvalidCredentialsError
      );
    });

    it('requires the current password', async () => {
      await expect(
        users.changePassword('claire', 'wrong-password', 'service-orders')
      ).rejects.toBeInstanceOf(AuthError);
      await expect(users.authenticate('claire', 'planning-board')).resolves.toMatchObject({
        username: 'claire',
      });
    });

    it('checks the policy before the current password', async () => {
      await expect(users.changePassword('claire', 'wrong-password', 'short')).rejects.toBeInstanceOf(
        PolicyError
      );
    });

    it('updates the modification time', async () => {
      clock.advance(5_000);
      await users.changePassword('claire', 'planning-board', 'service-orders');

      const stored = await repository.findByUsername('claire');
      expect(stored?.updatedAt).toEqual(new Date(START_TIME.getTime() + 5_000));
    });
  });

  describe('resetPassword', () => {
    beforeEach(async () => {
      await users.createUser('claire', 'planning-board', 'standard');
    });

    it('sets a new password without the old one', async () => {
      await users.resetPassword('admin', 'claire', 'fresh-start');

      await expect(users.authenticate('claire', 'fresh-start')).resolves.toMatchObject({
        username: 'claire',
      });
    });

    it('still enforces the policy', async () => {
      await expect(users.resetPassword('admin', 'claire', 'short')).rejects.toBeInstanceOf(
        PolicyError
      );
    });

    it('fails for an unknown user', async () => {
      await expect(users.resetPassword('admin', 'nobody', 'fresh-start')).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it("refuses a reset of the acting admin's own password", async () => {
      await users.createUser('admin', 'board-of-directors', 'admin');

      await expect(users.resetPassword('admin', 'admin', 'taken-over-1')).rejects.toBeInstanceOf(
        ValidationError
      );
      await expect(users.authenticate('admin', 'board-of-directors')).resolves.toMatchObject({
        username: 'admin',
      });
    });
  });

  describe('updateUser', () => {
    beforeEach(async () => {
      await users.createUser('root', 'admin-password', 'admin');
      await users.createUser('claire', 'planning-board', 'standard');
    });

    it('promotes a user', async () => {
      const user = await users.updateUser('root', 'claire', { role: 'admin' });

      expect(user.role).toBe('admin');
    });

    it('deactivates a user and marks them offline', async () => {
      await users.authenticate('claire', 'planning-board');

      const user = await users.updateUser('root', 'claire', { isActive: false });

      expect(user.isActive).toBe(false);
      expect(user.isOnline).toBe(false);
    });

    it('refuses to let an admin demote themselves', async () => {
      await expect(users.updateUser('root', 'root', { role: 'standard' })).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('refuses to let an admin deactivate themselves', async () => {
      await expect(users.updateUser('root', 'root', { isActive: false })).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('rejects an empty patch', async () => {
      await expect(users.updateUser('root', 'claire', {})).rejects.toBeInstanceOf(ValidationError);
    });

    it('fails for an unknown user', async () => {
      await expect(users.updateUser('root', 'nobody', { role: 'admin' })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe('listUsers', () => {
    it('lists users oldest first without hashes', async () => {
      await users.createUser('marc', 'planning-board', 'standard');
      clock.advance(1_000);
      await users.createUser('alice', 'planning-board', 'admin');

      const listed = await users.listUsers();

      expect(listed.map((user) => user.username)).toEqual(['marc', 'alice']);
      expect(listed.every((user) => !('passwordHash' in user))).toBe(true);
    });
  });

  describe('ensureDefaultAdmin', () => {
    const seed = { adminUsername: 'admin', adminPassword: 'admin' };

    it('seeds the configured admin on an empty store', async () => {
      expect(await users.ensureDefaultAdmin(seed)).toBe(true);

      const admin = await users.authenticate('admin', 'admin');
      expect(admin.role).toBe('admin');
    });

    it('does nothing once any user exists', async () => {
      await users.createUser('claire', 'planning-board', 'standard');

      expect(await users.ensureDefaultAdmin(seed)).toBe(false);
      expect(await repository.findByUsername('admin')).toBeNull();
    });

    it('runs only once', async () => {
      await users.ensureDefaultAdmin(seed);

      expect(await users.ensureDefaultAdmin(seed)).toBe(false);
      expect(await repository.count()).toBe(1);
    });
  });

  describe('best-effort bookkeeping', () => {
    it('records activity', async () => {
      await users.createUser('claire', 'planning-board', 'standard');
      clock.advance(42_000);

      await users.touch('claire');

      const stored = await repository.findByUsername('claire');
      expect(stored?.lastActiveAt).toEqual(new Date(START_TIME.getTime() + 42_000));
    });

    it('records logout', async () => {
      await users.createUser('claire', 'planning-board', 'standard');
      await users.authenticate('claire', 'planning-board');

      await users.recordLogout('claire');

      const stored = await repository.findByUsername('claire');
      expect(stored?.isOnline).toBe(false);
      expect(stored?.lastLogoutAt).toEqual(START_TIME);
    });

    it('swallows storage failures', async () => {
      const failing = new UserService(
        new FailingActivityRepository(),
        new PasswordService({ passwordMinLength: 8, bcryptRounds: 4 }),
        clock
      );

      await expect(failing.touch('claire')).resolves.toBeUndefined();
      await expect(failing.recordLogout('claire')).resolves.toBeUndefined();
    });
  });
});
