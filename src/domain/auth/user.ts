import { InvalidEmailError, PasswordTooShortError } from '../errors.js';

export const MIN_PASSWORD_LENGTH = 6;

/**
 * User entity. `password` is whatever the configured PasswordHasher stores:
 * the plaintext value or an argon2 hash.
 */
export interface User {
  readonly id: number;
  readonly email: string;
  readonly password: string;
  readonly isAdmin: boolean;
}

/** What the rest of the system knows about an authenticated caller. */
export interface UserIdentity {
  readonly id: number;
  readonly email: string;
  readonly isAdmin: boolean;
}

export function toIdentity(user: User): UserIdentity {
  return { id: user.id, email: user.email, isAdmin: user.isAdmin };
}

/**
 * Field rules for a new account, checked in this order:
 * email must contain "@", then the password length.
 */
export function assertValidNewUser(email: string, password: string): void {
  if (!email.includes('@')) {
    throw new InvalidEmailError();
  }
  if (password.length < MIN_PASSWORD_LENGTH) {
    throw new PasswordTooShortError();
  }
}
