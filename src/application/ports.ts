import type { User } from '../domain/auth/user.js';
import type { Book } from '../domain/library/book.js';
import type { BorrowRequest, BorrowStatus, DateRange } from '../domain/library/borrowRequest.js';

export interface NewUser {
  email: string;
  password: string;
  isAdmin: boolean;
}

export interface NewBorrowRequest {
  userId: number;
  bookId: number;
  range: DateRange;
}

/** A borrow request joined with the title of its book. */
export interface BorrowRequestView extends BorrowRequest {
  readonly bookTitle: string;
}

export interface LockOptions {
  /** Hold a row lock on the read row until the unit of work ends. */
  forUpdate?: boolean;
}

export interface UserRepository {
  findById(id: number): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  /** Throws UserAlreadyExistsError when the email is taken. */
  create(user: NewUser): Promise<User>;
}

export interface BookRepository {
  list(): Promise<Book[]>;
  findById(id: number, options?: LockOptions): Promise<Book | null>;
  decrementCopies(id: number): Promise<void>;
}

export interface BorrowRequestRepository {
  findById(id: number, options?: LockOptions): Promise<BorrowRequest | null>;
  /**
   * First Approved request for the book whose range overlaps `range`,
   * ignoring the request with id `excludeId`.
   */
  findApprovedOverlap(bookId: number, range: DateRange, excludeId?: number): Promise<BorrowRequest | null>;
  create(request: NewBorrowRequest): Promise<BorrowRequest>;
  updateStatus(id: number, status: BorrowStatus): Promise<void>;
  listAll(): Promise<BorrowRequestView[]>;
  listByUser(userId: number): Promise<BorrowRequestView[]>;
}

export interface Repositories {
  users: UserRepository;
  books: BookRepository;
  borrowRequests: BorrowRequestRepository;
}

/**
 * Runs `work` against one store connection inside a single transaction.
 * Commits when `work` resolves, rolls back when it rejects, and always
 * releases the connection.
 */
export interface UnitOfWork {
  run<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
}
