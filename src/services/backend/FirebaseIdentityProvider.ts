import {
  createUserWithEmailAndPassword,
  onAuthStateChanged,
  signInWithEmailAndPassword,
  signOut as firebaseSignOut,
  type Auth,
} from 'firebase/auth';
import { IdentityProviderError, type IdentityProviderErrorCode } from '../common/errors';
import type { IdentityProvider, UserChangeListener } from './IdentityProvider';

const FIREBASE_AUTH_CODES: Record<string, IdentityProviderErrorCode> = {
  'auth/invalid-email': 'invalid-email',
  'auth/wrong-password': 'wrong-password',
  'auth/user-not-found': 'user-not-found',
  'auth/email-already-in-use': 'email-already-in-use',
  'auth/weak-password': 'weak-password',
  'auth/network-request-failed': 'network-error',
  'auth/invalid-credential': 'invalid-credential',
  'auth/too-many-requests': 'too-many-requests',
};

function readErrorCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : null;
  }
  return null;
}

export function toIdentityProviderError(error: unknown): IdentityProviderError {
  if (error instanceof IdentityProviderError) return error;

  const rawCode = readErrorCode(error);
  const providerCode = (rawCode && FIREBASE_AUTH_CODES[rawCode]) || 'unknown';
  const message = error instanceof Error ? error.message : 'Authentication request failed';
  return new IdentityProviderError(providerCode, message, rawCode);
}

export class FirebaseIdentityProvider implements IdentityProvider {
  constructor(private readonly auth: Auth) {}

  get currentUserId(): string | null {
    return this.auth.currentUser?.uid ?? null;
  }

  async signIn(email: string, password: string): Promise<string> {
    try {
      const credential = await signInWithEmailAndPassword(this.auth, email, password);
      return credential.user.uid;
    } catch (error) {
      console.error('[auth] Sign in error:', error);
      throw toIdentityProviderError(error);
    }
  }

  async signUp(email: string, password: string): Promise<string> {
    try {
      const credential = await createUserWithEmailAndPassword(this.auth, email, password);
      return credential.user.uid;
    } catch (error) {
      console.error('[auth] Sign up error:', error);
      throw toIdentityProviderError(error);
    }
  }

  async signOut(): Promise<void> {
    try {
      await firebaseSignOut(this.auth);
    } catch (error) {
      console.error('[auth] Sign out error:', error);
      throw toIdentityProviderError(error);
    }
  }

  onUserChanged(listener: UserChangeListener): () => void {
    return onAuthStateChanged(this.auth, (user) => listener(user?.uid ?? null));
  }
}
