export interface Book {
  readonly id: number;
  readonly title: string;
  readonly author: string;
  /** Decremented on every approval and never restored; may go negative. */
  readonly copiesAvailable: number;
}

export function hasCopiesAvailable(book: Book): boolean {
  return book.copiesAvailable > 0;
}
