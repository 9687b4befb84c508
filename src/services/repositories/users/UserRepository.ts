import type { UserProfile } from '../../../models/user';

export interface UserRepository {
  readonly currentUserId: string | null;
  signIn(email: string, password: string): Promise<string>;
  signUp(email: string, password: string): Promise<string>;
  saveUserProfile(profile: UserProfile): Promise<void>;
  getUserProfile(userId: string): Promise<UserProfile | null>;
}
