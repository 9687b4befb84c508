import { createPost, type Post } from '../../../models/post';
import { ForbiddenError, PostNotFoundError, wrapOperation } from '../../common/errors';
import type { PostRepository } from '../../repositories/posts/PostRepository';
import type { Session } from '../../session/Session';
import { validatePostFields, validatePostId } from '../../validation/posts';

type Clock = () => Date;

export class PostUseCase {
  constructor(
    private readonly postRepository: PostRepository,
    private readonly session: Session,
    private readonly now: Clock = () => new Date(),
  ) {}

  async fetchPosts(): Promise<Post[]> {
    return wrapOperation('fetch', () => this.postRepository.fetchPosts());
  }

  async createPost(title: string, content: string): Promise<Post> {
    const fields = validatePostFields(title, content);
    const userId = this.session.requireUserId();

    const post = createPost({ ...fields, userId, timestamp: this.now() });
    const id = await wrapOperation('create', () => this.postRepository.createPost(post));
    return { ...post, id };
  }

  async updatePost(id: string, title: string, content: string): Promise<Post> {
    const postId = validatePostId(id);
    const fields = validatePostFields(title, content);
    const userId = this.session.requireUserId();

    await this.requireOwnedPost(postId, userId, 'update');
    const post = createPost({ id: postId, ...fields, userId, timestamp: this.now() });
    await wrapOperation('update', () => this.postRepository.updatePost(post));
    return post;
  }

  async deletePost(id: string): Promise<void> {
    const postId = validatePostId(id);
    const userId = this.session.requireUserId();

    await this.requireOwnedPost(postId, userId, 'delete');
    await wrapOperation('delete', () => this.postRepository.deletePost(postId));
  }

  async signOut(): Promise<void> {
    await wrapOperation('sign-out', () => this.postRepository.signOut());
  }

  // Ownership is checked before every write.
  private async requireOwnedPost(
    postId: string,
    userId: string,
    operation: 'update' | 'delete',
  ): Promise<Post> {
    const existing = await wrapOperation(operation, () => this.postRepository.getPost(postId));
    if (!existing) {
      throw new PostNotFoundError(postId);
    }
    if (existing.userId !== userId) {
      throw new ForbiddenError(`Post ${postId} belongs to another user.`);
    }
    return existing;
  }
}
