import { Database } from '../config/database';
import { handleDatabaseError } from '../middleware/error.middleware';
import { NewUser, Role, User, UserPatch } from '../types/user.types';

/**
 * Credential store. Implementations must reject duplicate usernames with a
 * ConflictError and treat activity timestamps as last-write-wins.
 */
export interface UserRepository {
  findByUsername(username: string): Promise<User | null>;
  create(user: NewUser, at: Date): Promise<User>;
  list(): Promise<User[]>;
  count(): Promise<number>;
  updatePassword(username: string, passwordHash: string, at: Date): Promise<boolean>;
  update(username: string, patch: UserPatch, at: Date): Promise<User | null>;
  recordLogin(username: string, at: Date): Promise<void>;
  recordLogout(username: string, at: Date): Promise<void>;
  touch(username: string, at: Date): Promise<void>;
}

interface UserRow {
  username: string;
  passwordHash: string;
  role: Role;
  isActive: boolean;
  isOnline: boolean;
  lastActiveAt: Date | null;
  lastLoginAt: Date | null;
  lastLogoutAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const USER_COLUMNS = `
  username, password_hash as "passwordHash", role, is_active as "isActive",
  is_online as "isOnline", last_active_at as "lastActiveAt",
  last_login_at as "lastLoginAt", last_logout_at as "lastLogoutAt",
  created_at as "createdAt", updated_at as "updatedAt"
`;

/**
 * PostgreSQL-backed user store
 */
export class PgUserRepository implements UserRepository {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async findByUsername(username: string): Promise<User | null> {
    const query = `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`;
    const result = await this.db.query<UserRow>(query, [username]);
    return result.rows[0] ?? null;
  }

  async create(user: NewUser, at: Date): Promise<User> {
    const query = `
      INSERT INTO users (username, password_hash, role, created_at, updated_at)
      VALUES ($1, $2, $3, $4, $4)
      RETURNING ${USER_COLUMNS}
    `;

    try {
      const result = await this.db.query<UserRow>(query, [
        user.username,
        user.passwordHash,
        user.role,
        at,
      ]);
      return result.rows[0];
    } catch (error) {
      handleDatabaseError(error, `User "${user.username}" already exists`);
    }
  }

  async list(): Promise<User[]> {
    const query = `SELECT ${USER_COLUMNS} FROM users ORDER BY created_at ASC, username ASC`;
    const result = await this.db.query<UserRow>(query);
    return result.rows;
  }

  async count(): Promise<number> {
    const result = await this.db.query<{ count: string }>('SELECT COUNT(*) as count FROM users');
    return parseInt(result.rows[0]?.count ?? '0', 10);
  }

  async updatePassword(username: string, passwordHash: string, at: Date): Promise<boolean> {
    const query = `
      UPDATE users
      SET password_hash = $2, updated_at = $3
      WHERE username = $1
    `;
    const result = await this.db.query(query, [username, passwordHash, at]);
    return (result.rowCount ?? 0) > 0;
  }

  async update(username: string, patch: UserPatch, at: Date): Promise<User | null> {
    // COALESCE keeps the stored value for fields absent from the patch
    const query = `
      UPDATE users
      SET role = COALESCE($2, role),
          is_active = COALESCE($3, is_active),
          is_online = CASE WHEN $3 = FALSE THEN FALSE ELSE is_online END,
          updated_at = $4
      WHERE username = $1
      RETURNING ${USER_COLUMNS}
    `;
    const result = await this.db.query<UserRow>(query, [
      username,
      patch.role ?? null,
      patch.isActive ?? null,
      at,
    ]);
    return result.rows[0] ?? null;
  }

  async recordLogin(username: string, at: Date): Promise<void> {
    const query = `
      UPDATE users
      SET last_login_at = $2, last_active_at = $2, is_online = TRUE
      WHERE username = $1
    `;
    await this.db.query(query, [username, at]);
  }

  async recordLogout(username: string, at: Date): Promise<void> {
    const query = `
      UPDATE users
      SET last_logout_at = $2, is_online = FALSE
      WHERE username = $1
    `;
    await this.db.query(query, [username, at]);
  }

  async touch(username: string, at: Date): Promise<void> {
    const query = `UPDATE users SET last_active_at = $2 WHERE username = $1`;
    await this.db.query(query, [username, at]);
  }
}
