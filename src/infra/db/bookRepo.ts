import type { PoolClient } from 'pg';
import type { Book } from '../../domain/library/book.js';
import type { BookRepository, LockOptions } from '../../application/ports.js';

interface BookRow {
  id: number;
  title: string;
  author: string;
  copies_available: number;
}

function toBook(row: BookRow): Book {
  return {
    id: row.id,
    title: row.title,
    author: row.author,
    copiesAvailable: row.copies_available,
  };
}

export class BookRepo implements BookRepository {
  constructor(private client: PoolClient) {}

  async list(): Promise<Book[]> {
    const result = await this.client.query<BookRow>(
      'SELECT id, title, author, copies_available FROM books ORDER BY id'
    );
    return result.rows.map(toBook);
  }

  async findById(id: number, options: LockOptions = {}): Promise<Book | null> {
    const lock = options.forUpdate ? ' FOR UPDATE' : '';
    const result = await this.client.query<BookRow>(
      `SELECT id, title, author, copies_available FROM books WHERE id = $1${lock}`,
      [id]
    );
    return result.rows.length === 0 ? null : toBook(result.rows[0]);
  }

  async decrementCopies(id: number): Promise<void> {
    await this.client.query(
      'UPDATE books SET copies_available = copies_available - 1 WHERE id = $1',
      [id]
    );
  }
}
