import { IdentityProviderError } from '../../common/errors';
import type { IdentityProvider, UserChangeListener } from '../IdentityProvider';

const EMAIL_SHAPE = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;
const MIN_PASSWORD_LENGTH = 6;

type Account = {
  userId: string;
  password: string;
};

/**
 * Process-local identity provider used by the `memory` backend and tests.
 * Reports the same error codes as the hosted provider.
 */
export class InMemoryIdentityProvider implements IdentityProvider {
  private readonly accounts = new Map<string, Account>();
  private readonly listeners = new Set<UserChangeListener>();
  private userId: string | null = null;
  private nextId = 1;

  get currentUserId(): string | null {
    return this.userId;
  }

  async signIn(email: string, password: string): Promise<string> {
    const key = normalizeEmail(email);
    if (!EMAIL_SHAPE.test(key)) {
      throw new IdentityProviderError('invalid-email', 'The email address is badly formatted.');
    }

    const account = this.accounts.get(key);
    if (!account) {
      throw new IdentityProviderError('user-not-found', 'There is no user record for this email.');
    }
    if (account.password !== password) {
      throw new IdentityProviderError('wrong-password', 'The password is invalid.');
    }

    this.setCurrentUser(account.userId);
    return account.userId;
  }

  async signUp(email: string, password: string): Promise<string> {
    const key = normalizeEmail(email);
    if (!EMAIL_SHAPE.test(key)) {
      throw new IdentityProviderError('invalid-email', 'The email address is badly formatted.');
    }
    if (this.accounts.has(key)) {
      throw new IdentityProviderError(
        'email-already-in-use',
        'The email address is already in use by another account.',
      );
    }
    if (password.length < MIN_PASSWORD_LENGTH) {
      throw new IdentityProviderError(
        'weak-password',
        `Password should be at least ${MIN_PASSWORD_LENGTH} characters.`,
      );
    }

    const userId = `user-${this.nextId++}`;
    this.accounts.set(key, { userId, password });
    this.setCurrentUser(userId);
    return userId;
  }

  async signOut(): Promise<void> {
    this.setCurrentUser(null);
  }

  onUserChanged(listener: UserChangeListener): () => void {
    this.listeners.add(listener);
    listener(this.userId);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private setCurrentUser(userId: string | null) {
    if (this.userId === userId) return;
    this.userId = userId;
    this.listeners.forEach((listener) => listener(userId));
  }
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
