import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryStore } from '../../__tests__/support/inMemoryStore.js';
import { SubmitRequestUseCase } from '../submitRequest.js';
import { ReviewRequestUseCase } from '../reviewRequest.js';
import { NotFoundError } from '../../errors.js';
import {
  BookAlreadyBorrowedError,
  NoCopiesAvailableError,
} from '../../../domain/errors.js';
import { toIdentity, type UserIdentity } from '../../../domain/auth/user.js';

describe('SubmitRequestUseCase', () => {
  let store: InMemoryStore;
  let useCase: SubmitRequestUseCase;
  let reader: UserIdentity;
  let admin: UserIdentity;

  beforeEach(() => {
    store = new InMemoryStore();
    useCase = new SubmitRequestUseCase(store);
    reader = toIdentity(
      store.addUser({ email: 'reader@example.com', password: 'test-secret', isAdmin: false })
    );
    admin = toIdentity(
      store.addUser({ email: 'admin@example.com', password: 'test-secret', isAdmin: true })
    );
  });

  it('should create a Pending request owned by the caller', async () => {
    const book = store.addBook({ title: 'Moby-Dick', author: 'Herman Melville', copiesAvailable: 1 });

    const result = await useCase.execute({
      actor: reader,
      bookId: book.id,
      startDate: '2024-01-01',
      endDate: '2024-01-10',
    });

    expect(store.borrowRequest(result.requestId)).toEqual({
      id: result.requestId,
      userId: reader.id,
      bookId: book.id,
      range: { start: '2024-01-01', end: '2024-01-10' },
      status: 'Pending',
    });
  });

  it('should not change the copy counter', async () => {
    const book = store.addBook({ title: 'Moby-Dick', author: 'Herman Melville', copiesAvailable: 1 });

    await useCase.execute({ actor: reader, bookId: book.id, startDate: '2024-01-01', endDate: '2024-01-02' });

    expect(store.book(book.id)?.copiesAvailable).toBe(1);
  });

  it('should fail for an unknown book', async () => {
    await expect(
      useCase.execute({ actor: reader, bookId: 99, startDate: '2024-01-01', endDate: '2024-01-02' })
    ).rejects.toThrow(new NotFoundError('Book not found'));
  });

  it('should fail when no copies are available', async () => {
    const book = store.addBook({ title: 'Frankenstein', author: 'Mary Shelley', copiesAvailable: 0 });

    await expect(
      useCase.execute({ actor: reader, bookId: book.id, startDate: '2024-01-01', endDate: '2024-01-02' })
    ).rejects.toThrow(NoCopiesAvailableError);
    expect(store.allBorrowRequests()).toHaveLength(0);
  });

  it('should fail when the counter has gone negative', async () => {
    const book = store.addBook({ title: 'Frankenstein', author: 'Mary Shelley', copiesAvailable: -1 });

    await expect(
      useCase.execute({ actor: reader, bookId: book.id, startDate: '2024-01-01', endDate: '2024-01-02' })
    ).rejects.toThrow(NoCopiesAvailableError);
  });

  it('should fail when the range overlaps an approved request', async () => {
    const book = store.addBook({ title: 'Moby-Dick', author: 'Herman Melville', copiesAvailable: 2 });
    const first = await useCase.execute({
      actor: reader,
      bookId: book.id,
      startDate: '2024-01-01',
      endDate: '2024-01-10',
    });
    await new ReviewRequestUseCase(store).execute({
      actor: admin,
      requestId: first.requestId,
      action: 'approve',
    });

    await expect(
      useCase.execute({ actor: reader, bookId: book.id, startDate: '2024-01-10', endDate: '2024-01-12' })
    ).rejects.toThrow(BookAlreadyBorrowedError);
  });

  it('should ignore overlapping requests that are not approved', async () => {
    const book = store.addBook({ title: 'Moby-Dick', author: 'Herman Melville', copiesAvailable: 1 });
    await useCase.execute({ actor: reader, bookId: book.id, startDate: '2024-01-01', endDate: '2024-01-10' });

    const second = await useCase.execute({
      actor: reader,
      bookId: book.id,
      startDate: '2024-01-05',
      endDate: '2024-01-15',
    });

    expect(store.borrowRequest(second.requestId)?.status).toBe('Pending');
  });

  it('should store a reversed range as submitted', async () => {
    const book = store.addBook({ title: 'Moby-Dick', author: 'Herman Melville', copiesAvailable: 1 });

    const result = await useCase.execute({
      actor: reader,
      bookId: book.id,
      startDate: '2024-01-10',
      endDate: '2024-01-01',
    });

    expect(store.borrowRequest(result.requestId)).toEqual({
      id: result.requestId,
      userId: reader.id,
      bookId: book.id,
      range: { start: '2024-01-10', end: '2024-01-01' },
      status: 'Pending',
    });
  });

  it('should return 404 for a zero book id', async () => {
    await expect(
      useCase.execute({ actor: reader, bookId: 0, startDate: '2024-01-01', endDate: '2024-01-02' })
    ).rejects.toThrow(NotFoundError);
  });
});
