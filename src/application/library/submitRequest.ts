import type { UserIdentity } from '../../domain/auth/user.js';
import { hasCopiesAvailable } from '../../domain/library/book.js';
import type { DateRange } from '../../domain/library/borrowRequest.js';
import { BookAlreadyBorrowedError, NoCopiesAvailableError } from '../../domain/errors.js';
import type { UnitOfWork } from '../ports.js';
import { NotFoundError } from '../errors.js';

export interface SubmitRequestCommand {
  actor: UserIdentity;
  bookId: number;
  startDate: string;
  endDate: string;
}

export interface SubmitRequestResult {
  requestId: number;
}

export class SubmitRequestUseCase {
  constructor(private uow: UnitOfWork) {}

  async execute(command: SubmitRequestCommand): Promise<SubmitRequestResult> {
    const range: DateRange = { start: command.startDate, end: command.endDate };

    return this.uow.run(async ({ books, borrowRequests }) => {
      // Lock the book so availability and overlap are read against settled approvals
      const book = await books.findById(command.bookId, { forUpdate: true });
      if (!book) {
        throw new NotFoundError('Book not found');
      }

      if (!hasCopiesAvailable(book)) {
        throw new NoCopiesAvailableError();
      }

      const overlapping = await borrowRequests.findApprovedOverlap(book.id, range);
      if (overlapping) {
        throw new BookAlreadyBorrowedError();
      }

      const request = await borrowRequests.create({
        userId: command.actor.id,
        bookId: book.id,
        range,
      });

      return { requestId: request.id };
    });
  }
}
