import type { Post } from '../../../models/post';

export interface PostRepository {
  /** Posts owned by the session user. */
  fetchPosts(): Promise<Post[]>;
  getPost(id: string): Promise<Post | null>;
  /** Returns the id assigned by the store. */
  createPost(post: Post): Promise<string>;
  updatePost(post: Post): Promise<void>;
  deletePost(id: string): Promise<void>;
  signOut(): Promise<void>;
}
