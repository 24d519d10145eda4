/**
 * Domain errors carry a stable code so the HTTP layer can map them to
 * 400 responses without inspecting messages.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidEmailError extends DomainError {
  readonly code = 'INVALID_EMAIL';

  constructor(message = 'Invalid email format') {
    super(message);
  }
}

export class PasswordTooShortError extends DomainError {
  readonly code = 'PASSWORD_TOO_SHORT';

  constructor(message = 'Password must be at least 6 characters') {
    super(message);
  }
}

export class UserAlreadyExistsError extends DomainError {
  readonly code = 'USER_ALREADY_EXISTS';

  constructor(message = 'User already exists') {
    super(message);
  }
}

export class InvalidActionError extends DomainError {
  readonly code = 'INVALID_ACTION';

  constructor(message = 'Invalid action') {
    super(message);
  }
}

export class NoCopiesAvailableError extends DomainError {
  readonly code = 'NO_COPIES_AVAILABLE';

  constructor(message = 'No copies available') {
    super(message);
  }
}

export class BookAlreadyBorrowedError extends DomainError {
  readonly code = 'BOOK_ALREADY_BORROWED';

  constructor(message = 'Book already borrowed during this period') {
    super(message);
  }
}

export class RequestAlreadyProcessedError extends DomainError {
  readonly code = 'REQUEST_ALREADY_PROCESSED';

  constructor(message = 'Request already processed') {
    super(message);
  }
}
