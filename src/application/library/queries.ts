import type { UserIdentity } from '../../domain/auth/user.js';
import type { Book } from '../../domain/library/book.js';
import type { BorrowRequestView, UnitOfWork } from '../ports.js';
import { ForbiddenError, NotFoundError } from '../errors.js';
import { renderHistoryCsv } from './historyCsv.js';

export class LibraryQueries {
  constructor(private uow: UnitOfWork) {}

  async listBooks(): Promise<Book[]> {
    return this.uow.run((repos) => repos.books.list());
  }

  async getOwnHistory(actor: UserIdentity): Promise<BorrowRequestView[]> {
    return this.uow.run((repos) => repos.borrowRequests.listByUser(actor.id));
  }

  async exportOwnHistoryCsv(actor: UserIdentity): Promise<string> {
    const history = await this.getOwnHistory(actor);
    return renderHistoryCsv(history);
  }

  async listAllRequests(actor: UserIdentity): Promise<BorrowRequestView[]> {
    assertAdmin(actor);
    return this.uow.run((repos) => repos.borrowRequests.listAll());
  }

  async getUserHistory(actor: UserIdentity, userId: number): Promise<BorrowRequestView[]> {
    assertAdmin(actor);
    return this.uow.run(async ({ users, borrowRequests }) => {
      const user = await users.findById(userId);
      if (!user) {
        throw new NotFoundError('User not found');
      }
      return borrowRequests.listByUser(user.id);
    });
  }
}

function assertAdmin(actor: UserIdentity): void {
  if (!actor.isAdmin) {
    throw new ForbiddenError();
  }
}
