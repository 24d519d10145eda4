/**
 * Errors raised by use cases that the HTTP layer maps to 401, 403 and 404.
 * Business rule violations are DomainErrors instead.
 */
export abstract class ApplicationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Unknown email and wrong password share one message. */
export class UnauthorizedError extends ApplicationError {
  constructor(message = 'Invalid email or password') {
    super(message);
  }
}

export class ForbiddenError extends ApplicationError {
  constructor(message = 'Access denied') {
    super(message);
  }
}

export class NotFoundError extends ApplicationError {
  constructor(message = 'Resource not found') {
    super(message);
  }
}
