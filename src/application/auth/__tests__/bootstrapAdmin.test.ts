import { describe, it, expect } from 'vitest';
import { InMemoryStore } from '../../__tests__/support/inMemoryStore.js';
import { ensureAdminUser } from '../bootstrapAdmin.js';
import { PlaintextPassword } from '../../../domain/auth/password.js';

describe('ensureAdminUser', () => {
  const passwords = new PlaintextPassword();

  it('should create the admin when missing', async () => {
    const store = new InMemoryStore();

    const outcome = await ensureAdminUser(store, passwords, {
      email: 'admin@example.com',
      password: 'test-secret',
    });

    expect(outcome).toBe('created');
    expect(store.user('admin@example.com')).toEqual({
      id: 1,
      email: 'admin@example.com',
      password: 'test-secret',
      isAdmin: true,
    });
  });

  it('should leave an existing account untouched', async () => {
    const store = new InMemoryStore();
    store.addUser({ email: 'admin@example.com', password: 'old-secret', isAdmin: false });

    const outcome = await ensureAdminUser(store, passwords, {
      email: 'admin@example.com',
      password: 'test-secret',
    });

    expect(outcome).toBe('exists');
    expect(store.user('admin@example.com')).toEqual({
      id: 1,
      email: 'admin@example.com',
      password: 'old-secret',
      isAdmin: false,
    });
  });
});
