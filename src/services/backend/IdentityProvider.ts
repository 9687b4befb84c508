export type UserChangeListener = (userId: string | null) => void;

export interface IdentityProvider {
  readonly currentUserId: string | null;
  signIn(email: string, password: string): Promise<string>;
  signUp(email: string, password: string): Promise<string>;
  signOut(): Promise<void>;
  onUserChanged(listener: UserChangeListener): () => void;
}
