import type { User } from '../../../domain/auth/user.js';
import type { Book } from '../../../domain/library/book.js';
import {
  BorrowStatus,
  rangesOverlap,
  type BorrowRequest,
  type DateRange,
} from '../../../domain/library/borrowRequest.js';
import { UserAlreadyExistsError } from '../../../domain/errors.js';
import type {
  BorrowRequestView,
  NewBorrowRequest,
  NewUser,
  Repositories,
  UnitOfWork,
} from '../../ports.js';

interface StoreState {
  users: User[];
  books: Book[];
  borrowRequests: BorrowRequest[];
  nextId: { users: number; books: number; borrowRequests: number };
}

function emptyState(): StoreState {
  return {
    users: [],
    books: [],
    borrowRequests: [],
    nextId: { users: 1, books: 1, borrowRequests: 1 },
  };
}

/**
 * In-process stand-in for the Postgres unit of work. Each run works on the
 * live state and restores a snapshot when the work rejects, so a failed
 * operation leaves nothing behind.
 */
export class InMemoryStore implements UnitOfWork {
  private state: StoreState = emptyState();

  /** Number of completed or rolled-back units of work. */
  runs = 0;

  async run<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const snapshot = structuredClone(this.state);
    try {
      return await work(this.repositories());
    } catch (error) {
      this.state = snapshot;
      throw error;
    } finally {
      this.runs += 1;
    }
  }

  addUser(user: Omit<User, 'id'>): User {
    const created: User = { id: this.state.nextId.users++, ...user };
    this.state.users.push(created);
    return created;
  }

  addBook(book: Omit<Book, 'id'>): Book {
    const created: Book = { id: this.state.nextId.books++, ...book };
    this.state.books.push(created);
    return created;
  }

  book(id: number): Book | undefined {
    return this.state.books.find((b) => b.id === id);
  }

  borrowRequest(id: number): BorrowRequest | undefined {
    return this.state.borrowRequests.find((r) => r.id === id);
  }

  allBorrowRequests(): readonly BorrowRequest[] {
    return this.state.borrowRequests;
  }

  user(email: string): User | undefined {
    return this.state.users.find((u) => u.email === email);
  }

  private repositories(): Repositories {
    const view = (request: BorrowRequest): BorrowRequestView => ({
      ...request,
      bookTitle: this.book(request.bookId)?.title ?? '',
    });

    return {
      users: {
        findById: async (id: number) => this.state.users.find((u) => u.id === id) ?? null,
        findByEmail: async (email: string) => this.user(email) ?? null,
        create: async (user: NewUser) => {
          if (this.user(user.email)) {
            throw new UserAlreadyExistsError();
          }
          return this.addUser(user);
        },
      },
      books: {
        list: async () => [...this.state.books],
        findById: async (id: number) => this.book(id) ?? null,
        decrementCopies: async (id: number) => {
          this.state.books = this.state.books.map((b) =>
            b.id === id ? { ...b, copiesAvailable: b.copiesAvailable - 1 } : b
          );
        },
      },
      borrowRequests: {
        findById: async (id: number) => this.borrowRequest(id) ?? null,
        findApprovedOverlap: async (bookId: number, range: DateRange, excludeId?: number) =>
          this.state.borrowRequests.find(
            (r) =>
              r.bookId === bookId &&
              r.status === BorrowStatus.Approved &&
              r.id !== excludeId &&
              rangesOverlap(r.range, range)
          ) ?? null,
        create: async (request: NewBorrowRequest) => {
          const created: BorrowRequest = {
            id: this.state.nextId.borrowRequests++,
            userId: request.userId,
            bookId: request.bookId,
            range: request.range,
            status: BorrowStatus.Pending,
          };
          this.state.borrowRequests.push(created);
          return created;
        },
        updateStatus: async (id: number, status: BorrowStatus) => {
          this.state.borrowRequests = this.state.borrowRequests.map((r) =>
            r.id === id ? { ...r, status } : r
          );
        },
        listAll: async () => this.state.borrowRequests.map(view),
        listByUser: async (userId: number) =>
          this.state.borrowRequests.filter((r) => r.userId === userId).map(view),
      },
    };
  }
}
