import {
  USERS_COLLECTION,
  toUserProfileDocument,
  userProfileDocumentSchema,
  type UserProfile,
} from '../../../models/user';
import { InvalidProfileError } from '../../common/errors';
import type { DocumentStore } from '../../backend/DocumentStore';
import type { IdentityProvider } from '../../backend/IdentityProvider';
import type { UserRepository } from './UserRepository';

export class StoreUserRepository implements UserRepository {
  constructor(
    private readonly identity: IdentityProvider,
    private readonly store: DocumentStore,
  ) {}

  get currentUserId(): string | null {
    return this.identity.currentUserId;
  }

  async signIn(email: string, password: string): Promise<string> {
    return this.identity.signIn(email, password);
  }

  async signUp(email: string, password: string): Promise<string> {
    return this.identity.signUp(email, password);
  }

  async saveUserProfile(profile: UserProfile): Promise<void> {
    if (!profile.id) {
      throw new InvalidProfileError('User ID is missing.');
    }
    await this.store.set(USERS_COLLECTION, profile.id, toUserProfileDocument(profile));
  }

  async getUserProfile(userId: string): Promise<UserProfile | null> {
    const stored = await this.store.get(USERS_COLLECTION, userId);
    if (!stored) {
      return null;
    }

    const parsed = userProfileDocumentSchema.safeParse(stored.data);
    if (!parsed.success) {
      console.warn('[auth] Ignoring malformed user profile', userId, parsed.error.issues);
      return null;
    }

    return { id: stored.id, ...parsed.data };
  }
}
