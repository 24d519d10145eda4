import type { Book } from '../../../domain/library/book.js';
import type { BorrowStatus } from '../../../domain/library/borrowRequest.js';
import type { BorrowRequestView } from '../../../application/ports.js';

// Wire shapes keep the snake_case field names clients already use.

export interface BookOut {
  id: number;
  title: string;
  author: string;
  copies_available: number;
}

export interface HistoryEntryOut {
  book_title: string;
  start_date: string;
  end_date: string;
  status: BorrowStatus;
}

export interface BorrowRequestOut extends HistoryEntryOut {
  id: number;
  book_id: number;
}

export function toBookOut(book: Book): BookOut {
  return {
    id: book.id,
    title: book.title,
    author: book.author,
    copies_available: book.copiesAvailable,
  };
}

export function toHistoryEntryOut(view: BorrowRequestView): HistoryEntryOut {
  return {
    book_title: view.bookTitle,
    start_date: view.range.start,
    end_date: view.range.end,
    status: view.status,
  };
}

export function toBorrowRequestOut(view: BorrowRequestView): BorrowRequestOut {
  return {
    id: view.id,
    book_id: view.bookId,
    ...toHistoryEntryOut(view),
  };
}
