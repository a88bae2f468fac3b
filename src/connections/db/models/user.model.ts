import type { UserRole } from '../../../constants';

// User Model - migration 20261018_000001_create_users_table

export interface User {
  id: string; // UUID
  username: string; // unique
  email: string; // unique
  password_hash: string;
  full_name: string | null;
  role: UserRole;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

/**
 * User as returned by the API, never carries the password hash
 */
export type PublicUser = Omit<User, 'password_hash'>;

export interface CreateUserInput {
  username: string;
  email: string;
  password_hash: string;
  full_name?: string | null;
  role: UserRole;
  is_active?: boolean; // default: true
}

export interface UpdateUserInput {
  username?: string;
  email?: string;
  password_hash?: string;
  full_name?: string | null;
  role?: UserRole;
  is_active?: boolean;
}

export const toPublicUser = ({ password_hash: _passwordHash, ...user }: User): PublicUser => user;
