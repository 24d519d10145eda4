import type { PoolClient } from 'pg';
import type { User } from '../../domain/auth/user.js';
import { UserAlreadyExistsError } from '../../domain/errors.js';
import type { NewUser, UserRepository } from '../../application/ports.js';

interface UserRow {
  id: number;
  email: string;
  password: string;
  is_admin: boolean;
}

const UNIQUE_VIOLATION = '23505';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    password: row.password,
    isAdmin: row.is_admin,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

export class UserRepo implements UserRepository {
  constructor(private client: PoolClient) {}

  async findById(id: number): Promise<User | null> {
    const result = await this.client.query<UserRow>(
      'SELECT id, email, password, is_admin FROM users WHERE id = $1',
      [id]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.client.query<UserRow>(
      'SELECT id, email, password, is_admin FROM users WHERE email = $1',
      [email]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.client.query<UserRow>(
        `INSERT INTO users (email, password, is_admin)
         VALUES ($1, $2, $3)
         RETURNING id, email, password, is_admin`,
        [user.email, user.password, user.isAdmin]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      // A concurrent insert won the race past the findByEmail check
      if (isUniqueViolation(error)) {
        throw new UserAlreadyExistsError();
      }
      throw error;
    }
  }
}
