// Closed set of roles; admin routes are gated on 'admin'
export const ROLES = ['admin', 'standard'] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && (ROLES as readonly string[]).includes(value);
}

export interface User {
  username: string;  // Primary key
  passwordHash: string;
  role: Role;
  isActive: boolean;  // Soft lifecycle: users are deactivated, never deleted
  isOnline: boolean;
  lastActiveAt: Date | null;
  lastLoginAt: Date | null;
  lastLogoutAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type PublicUser = Omit<User, 'passwordHash'>;

export interface NewUser {
  username: string;
  passwordHash: string;
  role: Role;
}

export interface UserPatch {
  role?: Role;
  isActive?: boolean;
}

/**
 * Identity attached to a request once the auth guard has resolved it
 */
export interface AuthenticatedUser {
  username: string;
  role: Role;
}

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}
