import type { PoolClient } from 'pg';
import type { UserRole } from '../../constants';
import type { CreateUserInput, UpdateUserInput, User } from '../../connections/db/models';

export interface UserListFilter {
  role?: UserRole;
  offset: number;
  limit: number;
}

export interface UserRepository {
  findById(id: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  /** Users holding the username or email, optionally ignoring one id */
  findConflicting(username: string | undefined, email: string | undefined, excludeId?: string): Promise<User[]>;
  count(): Promise<number>;
  list(filter: UserListFilter): Promise<{ users: User[]; total: number }>;
  create(input: CreateUserInput): Promise<User>;
  update(id: string, input: UpdateUserInput): Promise<User | null>;
  /** Serialize first-user bootstrap against concurrent inserts */
  lockForBootstrap(): Promise<void>;
}

const USER_COLUMNS = 'id, username, email, password_hash, full_name, role, is_active, created_at, updated_at';

export class PgUserRepository implements UserRepository {
  constructor(private readonly client: PoolClient) {}

  async findById(id: string): Promise<User | null> {
    const result = await this.client.query<User>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.client.query<User>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username]
    );
    return result.rows[0] ?? null;
  }

  async findConflicting(username: string | undefined, email: string | undefined, excludeId?: string): Promise<User[]> {
    if (!username && !email) {
      return [];
    }

    const result = await this.client.query<User>(
      `SELECT ${USER_COLUMNS} FROM users
       WHERE (username = $1 OR email = $2)
         AND ($3::uuid IS NULL OR id <> $3::uuid)`,
      [username ?? null, email ?? null, excludeId ?? null]
    );
    return result.rows;
  }

  async count(): Promise<number> {
    const result = await this.client.query<{ count: string }>('SELECT COUNT(*) FROM users');
    return parseInt(result.rows[0].count);
  }

  async list({ role, offset, limit }: UserListFilter): Promise<{ users: User[]; total: number }> {
    const where = role ? 'WHERE role = $1' : '';
    const params: unknown[] = role ? [role] : [];

    const countResult = await this.client.query<{ count: string }>(
      `SELECT COUNT(*) FROM users ${where}`,
      params
    );

    const result = await this.client.query<User>(
      `SELECT ${USER_COLUMNS} FROM users ${where}
       ORDER BY created_at ASC, username ASC
       LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, limit, offset]
    );

    return { users: result.rows, total: parseInt(countResult.rows[0].count) };
  }

  async create(input: CreateUserInput): Promise<User> {
    const result = await this.client.query<User>(
      `INSERT INTO users (username, email, password_hash, full_name, role, is_active)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${USER_COLUMNS}`,
      [
        input.username,
        input.email,
        input.password_hash,
        input.full_name ?? null,
        input.role,
        input.is_active ?? true,
      ]
    );
    return result.rows[0];
  }

  async update(id: string, input: UpdateUserInput): Promise<User | null> {
    const updates: string[] = [];
    const values: unknown[] = [];

    for (const [field, value] of Object.entries(input)) {
      if (value !== undefined) {
        values.push(value);
        updates.push(`${field} = $${values.length}`);
      }
    }

    if (updates.length === 0) {
      return this.findById(id);
    }

    updates.push('updated_at = NOW()');
    values.push(id);

    const result = await this.client.query<User>(
      `UPDATE users
       SET ${updates.join(', ')}
       WHERE id = $${values.length}
       RETURNING ${USER_COLUMNS}`,
      values
    );
    return result.rows[0] ?? null;
  }

  async lockForBootstrap(): Promise<void> {
    await this.client.query('LOCK TABLE users IN SHARE ROW EXCLUSIVE MODE');
  }
}
