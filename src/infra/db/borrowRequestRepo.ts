import type { PoolClient } from 'pg';
import {
  isBorrowStatus,
  type BorrowRequest,
  type BorrowStatus,
  type DateRange,
} from '../../domain/library/borrowRequest.js';
import type {
  BorrowRequestRepository,
  BorrowRequestView,
  LockOptions,
  NewBorrowRequest,
} from '../../application/ports.js';

interface BorrowRequestRow {
  id: number;
  user_id: number;
  book_id: number;
  start_date: string;
  end_date: string;
  status: string;
}

interface BorrowRequestViewRow extends BorrowRequestRow {
  book_title: string;
}

const COLUMNS = 'br.id, br.user_id, br.book_id, br.start_date, br.end_date, br.status';

function toBorrowRequest(row: BorrowRequestRow): BorrowRequest {
  if (!isBorrowStatus(row.status)) {
    throw new Error(`Unknown borrow request status in row ${row.id}: ${row.status}`);
  }
  return {
    id: row.id,
    userId: row.user_id,
    bookId: row.book_id,
    range: { start: row.start_date, end: row.end_date },
    status: row.status,
  };
}

function toView(row: BorrowRequestViewRow): BorrowRequestView {
  return { ...toBorrowRequest(row), bookTitle: row.book_title };
}

export class BorrowRequestRepo implements BorrowRequestRepository {
  constructor(private client: PoolClient) {}

  async findById(id: number, options: LockOptions = {}): Promise<BorrowRequest | null> {
    const lock = options.forUpdate ? ' FOR UPDATE' : '';
    const result = await this.client.query<BorrowRequestRow>(
      `SELECT ${COLUMNS} FROM borrow_requests br WHERE br.id = $1${lock}`,
      [id]
    );
    return result.rows.length === 0 ? null : toBorrowRequest(result.rows[0]);
  }

  async findApprovedOverlap(
    bookId: number,
    range: DateRange,
    excludeId?: number
  ): Promise<BorrowRequest | null> {
    const result = await this.client.query<BorrowRequestRow>(
      `SELECT ${COLUMNS}
       FROM borrow_requests br
       WHERE br.book_id = $1
         AND br.status = 'Approved'
         AND br.start_date <= $3::date
         AND br.end_date >= $2::date
         AND ($4::int IS NULL OR br.id <> $4::int)
       ORDER BY br.id
       LIMIT 1`,
      [bookId, range.start, range.end, excludeId ?? null]
    );
    return result.rows.length === 0 ? null : toBorrowRequest(result.rows[0]);
  }

  async create(request: NewBorrowRequest): Promise<BorrowRequest> {
    const result = await this.client.query<BorrowRequestRow>(
      `INSERT INTO borrow_requests AS br (user_id, book_id, start_date, end_date)
       VALUES ($1, $2, $3, $4)
       RETURNING ${COLUMNS}`,
      [request.userId, request.bookId, request.range.start, request.range.end]
    );
    return toBorrowRequest(result.rows[0]);
  }

  async updateStatus(id: number, status: BorrowStatus): Promise<void> {
    await this.client.query('UPDATE borrow_requests SET status = $2 WHERE id = $1', [id, status]);
  }

  async listAll(): Promise<BorrowRequestView[]> {
    const result = await this.client.query<BorrowRequestViewRow>(
      `SELECT ${COLUMNS}, b.title AS book_title
       FROM borrow_requests br
       JOIN books b ON b.id = br.book_id
       ORDER BY br.id`
    );
    return result.rows.map(toView);
  }

  async listByUser(userId: number): Promise<BorrowRequestView[]> {
    const result = await this.client.query<BorrowRequestViewRow>(
      `SELECT ${COLUMNS}, b.title AS book_title
       FROM borrow_requests br
       JOIN books b ON b.id = br.book_id
       WHERE br.user_id = $1
       ORDER BY br.id`,
      [userId]
    );
    return result.rows.map(toView);
  }
}
