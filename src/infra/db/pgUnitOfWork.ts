import type { Repositories, UnitOfWork } from '../../application/ports.js';
import type { DbPool } from './pool.js';
import { UserRepo } from './userRepo.js';
import { BookRepo } from './bookRepo.js';
import { BorrowRequestRepo } from './borrowRequestRepo.js';

/**
 * One pooled connection and one transaction per unit of work. Row locks
 * taken through `forUpdate` are held until COMMIT or ROLLBACK.
 */
export class PgUnitOfWork implements UnitOfWork {
  constructor(private pool: DbPool) {}

  async run<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work({
        users: new UserRepo(client),
        books: new BookRepo(client),
        borrowRequests: new BorrowRequestRepo(client),
      });
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}
