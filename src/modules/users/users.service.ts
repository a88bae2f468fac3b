import bcrypt from 'bcryptjs';
import type { Database } from '../../connections/db/database';
import type { PublicUser, UpdateUserInput, User } from '../../connections/db/models';
import { toPublicUser } from '../../connections/db/models';
import { BCRYPT_ROUNDS, USER_ROLE, type UserRole } from '../../constants';
import { authorize } from '../access/access-control';
import type { Actor } from '../../types/request.types';
import {
  AuthenticationError,
  AuthorizationError,
  ConflictError,
  NotFoundError,
} from '../../utils/errors';
import { auditLog } from '../../utils/logging';
import type { UserRepository } from './users.repository';

export interface CreateUserData {
  username: string;
  email: string;
  password: string;
  full_name?: string | null;
  role: UserRole;
}

export interface UpdateUserData {
  username?: string;
  email?: string;
  password?: string;
  full_name?: string | null;
  role?: UserRole;
  is_active?: boolean;
}

export const hashPassword = (password: string): Promise<string> => bcrypt.hash(password, BCRYPT_ROUNDS);

export const verifyPassword = (password: string, passwordHash: string): Promise<boolean> =>
  bcrypt.compare(password, passwordHash);

/**
 * User Directory: accounts, roles and credentials
 */
export class UsersService {
  constructor(private readonly db: Database) {}

  private async ensureUnique(
    users: UserRepository,
    username: string | undefined,
    email: string | undefined,
    excludeId?: string
  ): Promise<void> {
    const conflicts = await users.findConflicting(username, email, excludeId);
    if (conflicts.length === 0) {
      return;
    }

    const fields = [
      ...(conflicts.some(user => user.username === username) ? ['username'] : []),
      ...(conflicts.some(user => user.email === email) ? ['email'] : []),
    ];
    throw new ConflictError('Username or email already registered', { fields });
  }

  /**
   * Create the very first account, always as admin. Refused once any user exists.
   */
  async bootstrapAdmin(data: Omit<CreateUserData, 'role'>): Promise<PublicUser> {
    const passwordHash = await hashPassword(data.password);

    const user = await this.db.transaction(async ({ users }) => {
      await users.lockForBootstrap();

      if ((await users.count()) > 0) {
        throw new AuthorizationError('The system already has users. Setup is disabled.');
      }

      return users.create({
        username: data.username,
        email: data.email,
        password_hash: passwordHash,
        full_name: data.full_name,
        role: USER_ROLE.ADMIN,
      });
    });

    auditLog('SETUP_ADMIN_CREATED', { userId: user.id, username: user.username });
    return toPublicUser(user);
  }

  /**
   * Check credentials for token issuance. Unknown users, wrong passwords and
   * inactive accounts all fail the same way.
   */
  async authenticate(username: string, password: string): Promise<User> {
    const user = await this.db.read(({ users }) => users.findByUsername(username));

    if (!user || !(await verifyPassword(password, user.password_hash))) {
      throw new AuthenticationError('Incorrect username or password');
    }

    if (!user.is_active) {
      throw new AuthenticationError('Account is deactivated');
    }

    return user;
  }

  /**
   * Resolve the identity behind a verified token
   */
  async findActiveById(id: string): Promise<User | null> {
    const user = await this.db.read(({ users }) => users.findById(id));
    return user && user.is_active ? user : null;
  }

  async getProfile(actor: Actor): Promise<PublicUser> {
    const user = await this.db.read(({ users }) => users.findById(actor.id));
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return toPublicUser(user);
  }

  async listUsers(
    actor: Actor,
    filter: { role?: UserRole; offset: number; limit: number }
  ): Promise<{ users: PublicUser[]; total: number }> {
    authorize(actor.role, 'user', 'list');

    const { users, total } = await this.db.read(({ users: repo }) => repo.list(filter));
    return { users: users.map(toPublicUser), total };
  }

  async getUser(actor: Actor, id: string): Promise<PublicUser> {
    authorize(actor.role, 'user', 'read');

    const user = await this.db.read(({ users }) => users.findById(id));
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return toPublicUser(user);
  }

  async createUser(actor: Actor, data: CreateUserData): Promise<PublicUser> {
    authorize(actor.role, 'user', 'create');

    const passwordHash = await hashPassword(data.password);

    const user = await this.db.transaction(async ({ users }) => {
      await this.ensureUnique(users, data.username, data.email);
      return users.create({
        username: data.username,
        email: data.email,
        password_hash: passwordHash,
        full_name: data.full_name,
        role: data.role,
      });
    });

    auditLog('USER_CREATED', { actorId: actor.id, userId: user.id, role: user.role });
    return toPublicUser(user);
  }

  async updateUser(actor: Actor, id: string, data: UpdateUserData): Promise<PublicUser> {
    authorize(actor.role, 'user', 'update');

    if (actor.id === id) {
      if (data.is_active === false) {
        throw new ConflictError('You cannot deactivate your own account');
      }
      if (data.role !== undefined && data.role !== actor.role) {
        throw new ConflictError('You cannot change your own role');
      }
    }

    const { password, ...fields } = data;
    const changes: UpdateUserInput = { ...fields };
    if (password !== undefined) {
      changes.password_hash = await hashPassword(password);
    }

    const { before, after } = await this.db.transaction(async ({ users }) => {
      const existing = await users.findById(id);
      if (!existing) {
        throw new NotFoundError('User not found');
      }

      await this.ensureUnique(users, changes.username, changes.email, id);

      const updated = await users.update(id, changes);
      if (!updated) {
        throw new NotFoundError('User not found');
      }
      return { before: existing, after: updated };
    });

    if (before.role !== after.role) {
      auditLog('USER_ROLE_CHANGED', { actorId: actor.id, userId: id, from: before.role, to: after.role });
    }
    if (before.is_active !== after.is_active) {
      auditLog(after.is_active ? 'USER_REACTIVATED' : 'USER_DEACTIVATED', { actorId: actor.id, userId: id });
    }

    return toPublicUser(after);
  }

  /**
   * Accounts stay referenced by their orders, so deleting one deactivates it
   */
  async deleteUser(actor: Actor, id: string): Promise<PublicUser> {
    authorize(actor.role, 'user', 'delete');

    if (actor.id === id) {
      throw new ConflictError('You cannot delete your own account');
    }

    const user = await this.db.transaction(async ({ users }) => {
      const updated = await users.update(id, { is_active: false });
      if (!updated) {
        throw new NotFoundError('User not found');
      }
      return updated;
    });

    auditLog('USER_DEACTIVATED', { actorId: actor.id, userId: id });
    return toPublicUser(user);
  }
}
