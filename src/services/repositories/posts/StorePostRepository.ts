import {
  POSTS_COLLECTION,
  postDocumentSchema,
  toPostDocument,
  type Post,
} from '../../../models/post';
import { InvalidPostIdError } from '../../common/errors';
import type { DocumentStore, StoredDocument } from '../../backend/DocumentStore';
import type { IdentityProvider } from '../../backend/IdentityProvider';
import type { Session } from '../../session/Session';
import type { PostRepository } from './PostRepository';

function mapPostDoc(stored: StoredDocument): Post | null {
  const parsed = postDocumentSchema.safeParse(stored.data);
  if (!parsed.success) {
    console.warn('[posts] Skipping malformed post', stored.id, parsed.error.issues);
    return null;
  }
  return { id: stored.id, ...parsed.data };
}

export function sortByTimestampDescending(posts: Post[]): Post[] {
  return [...posts].sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
}

export class StorePostRepository implements PostRepository {
  constructor(
    private readonly store: DocumentStore,
    private readonly identity: IdentityProvider,
    private readonly session: Session,
  ) {}

  async fetchPosts(): Promise<Post[]> {
    const userId = this.session.requireUserId();
    const docs = await this.store.query(POSTS_COLLECTION, 'userId', userId);

    const posts: Post[] = [];
    docs.forEach((stored) => {
      const post = mapPostDoc(stored);
      if (post && post.userId === userId) {
        posts.push(post);
      }
    });
    return sortByTimestampDescending(posts);
  }

  async getPost(id: string): Promise<Post | null> {
    const stored = await this.store.get(POSTS_COLLECTION, id);
    return stored ? mapPostDoc(stored) : null;
  }

  async createPost(post: Post): Promise<string> {
    return this.store.create(POSTS_COLLECTION, toPostDocument(post));
  }

  async updatePost(post: Post): Promise<void> {
    if (!post.id) {
      throw new InvalidPostIdError();
    }
    await this.store.set(POSTS_COLLECTION, post.id, toPostDocument(post));
  }

  async deletePost(id: string): Promise<void> {
    await this.store.delete(POSTS_COLLECTION, id);
  }

  async signOut(): Promise<void> {
    await this.identity.signOut();
  }
}
