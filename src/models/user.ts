/**
 * User Profile Model
 */

import { z } from 'zod';

export const USERS_COLLECTION = 'users';

export const userProfileDocumentSchema = z.object({
  email: z.string(),
  lastLogin: z.date(),
});

export type UserProfileDocument = z.infer<typeof userProfileDocumentSchema>;

export interface UserProfile extends UserProfileDocument {
  id?: string;
}

export function toUserProfileDocument(profile: UserProfile): UserProfileDocument {
  return {
    email: profile.email,
    lastLogin: profile.lastLogin,
  };
}
