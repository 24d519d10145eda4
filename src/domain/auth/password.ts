import { hash, verify } from 'argon2';

export type PasswordStorage = 'plaintext' | 'argon2';

/**
 * How passwords are stored and checked. Credential verification only talks
 * to this interface, so switching storage does not touch the handlers.
 */
export interface PasswordHasher {
  hash(plainPassword: string): Promise<string>;
  verify(plainPassword: string, stored: string): Promise<boolean>;
}

/**
 * Stores the password as given and compares it directly.
 */
export class PlaintextPassword implements PasswordHasher {
  async hash(plainPassword: string): Promise<string> {
    return plainPassword;
  }

  async verify(plainPassword: string, stored: string): Promise<boolean> {
    return plainPassword === stored;
  }
}

/**
 * Password hashing using Argon2.
 */
export class Argon2Password implements PasswordHasher {
  async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword);
  }

  async verify(plainPassword: string, stored: string): Promise<boolean> {
    try {
      return await verify(stored, plainPassword);
    } catch {
      // Not an argon2 hash (e.g. a row written under plaintext storage)
      return false;
    }
  }
}

export function createPasswordHasher(storage: PasswordStorage): PasswordHasher {
  return storage === 'argon2' ? new Argon2Password() : new PlaintextPassword();
}
