import type { UserProfile } from '../../../models/user';
import { InvalidProfileError, OperationFailedError, wrapOperation } from '../../common/errors';
import type { UserRepository } from '../../repositories/users/UserRepository';
import type { Session } from '../../session/Session';
import { validateCredentials } from '../../validation/credentials';

type Clock = () => Date;

/**
 * Sign-in and sign-up. Credentials are validated locally before the identity
 * provider is called; every successful call overwrites the user's profile.
 */
export class UserUseCase {
  constructor(
    private readonly userRepository: UserRepository,
    private readonly session: Session,
    private readonly now: Clock = () => new Date(),
  ) {}

  async signIn(email: string, password: string): Promise<UserProfile> {
    const credentials = validateCredentials(email, password);
    const userId = await wrapOperation('sign-in', () =>
      this.userRepository.signIn(credentials.email, credentials.password),
    );
    return this.saveProfile(userId, credentials.email);
  }

  async signUp(email: string, password: string): Promise<UserProfile> {
    const credentials = validateCredentials(email, password);
    const userId = await wrapOperation('sign-up', () =>
      this.userRepository.signUp(credentials.email, credentials.password),
    );
    return this.saveProfile(userId, credentials.email);
  }

  async currentProfile(): Promise<UserProfile | null> {
    const userId = this.session.userId;
    if (!userId) return null;
    return wrapOperation('profile-fetch', () => this.userRepository.getUserProfile(userId));
  }

  private async saveProfile(userId: string, email: string): Promise<UserProfile> {
    if (!userId) {
      throw new InvalidProfileError('User profile ID is missing.');
    }

    const profile: UserProfile = { id: userId, email, lastLogin: this.now() };
    try {
      await this.userRepository.saveUserProfile(profile);
    } catch (error) {
      throw new OperationFailedError('profile-save', error);
    }
    return profile;
  }
}
