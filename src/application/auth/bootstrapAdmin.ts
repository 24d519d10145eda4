import type { PasswordHasher } from '../../domain/auth/password.js';
import type { UnitOfWork } from '../ports.js';

export interface AdminCredentials {
  email: string;
  password: string;
}

export type BootstrapOutcome = 'created' | 'exists';

/**
 * Make sure the configured administrator account exists. An existing
 * account with that email is left as it is, admin flag included.
 */
export async function ensureAdminUser(
  uow: UnitOfWork,
  passwords: PasswordHasher,
  admin: AdminCredentials
): Promise<BootstrapOutcome> {
  const storedPassword = await passwords.hash(admin.password);

  return uow.run(async ({ users }) => {
    const existing = await users.findByEmail(admin.email);
    if (existing) {
      return 'exists';
    }

    await users.create({ email: admin.email, password: storedPassword, isAdmin: true });
    return 'created';
  });
}
