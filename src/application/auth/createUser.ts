import type { PasswordHasher } from '../../domain/auth/password.js';
import { assertValidNewUser, type UserIdentity } from '../../domain/auth/user.js';
import { UserAlreadyExistsError } from '../../domain/errors.js';
import type { UnitOfWork } from '../ports.js';
import { ForbiddenError } from '../errors.js';

export interface CreateUserCommand {
  actor: UserIdentity;
  email: string;
  password: string;
}

export interface CreateUserResult {
  userId: number;
}

export class CreateUserUseCase {
  constructor(
    private uow: UnitOfWork,
    private passwords: PasswordHasher
  ) {}

  async execute(command: CreateUserCommand): Promise<CreateUserResult> {
    if (!command.actor.isAdmin) {
      throw new ForbiddenError();
    }

    assertValidNewUser(command.email, command.password);

    const storedPassword = await this.passwords.hash(command.password);

    return this.uow.run(async ({ users }) => {
      const existing = await users.findByEmail(command.email);
      if (existing) {
        throw new UserAlreadyExistsError();
      }

      const user = await users.create({
        email: command.email,
        password: storedPassword,
        isAdmin: false,
      });

      return { userId: user.id };
    });
  }
}
