import type { PasswordHasher } from '../../domain/auth/password.js';
import { toIdentity, type UserIdentity } from '../../domain/auth/user.js';
import type { UnitOfWork } from '../ports.js';
import { UnauthorizedError } from '../errors.js';

/**
 * The single capability that turns a credential pair into an identity.
 * Rejects with UnauthorizedError; never reveals which half was wrong.
 */
export interface CredentialVerifier {
  verify(email: string, password: string): Promise<UserIdentity>;
}

export class StoredCredentialVerifier implements CredentialVerifier {
  constructor(
    private uow: UnitOfWork,
    private passwords: PasswordHasher
  ) {}

  async verify(email: string, password: string): Promise<UserIdentity> {
    const user = await this.uow.run((repos) => repos.users.findByEmail(email));
    if (!user) {
      throw new UnauthorizedError();
    }

    const isValid = await this.passwords.verify(password, user.password);
    if (!isValid) {
      throw new UnauthorizedError();
    }

    return toIdentity(user);
  }
}
