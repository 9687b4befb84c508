import type { Post } from '../models/post';
import type { PostUseCase } from '../services/domain/posts/PostUseCase';
import type { Session } from '../services/session/Session';
import { postErrorMessage, type PostContext } from './errorMessages';
import { ViewStateStore } from './ViewStateStore';

export type PostListState = {
  posts: Post[];
};

/**
 * Post screen state. Every successful mutation is followed by a full refetch;
 * the list is never patched locally.
 */
export class PostViewState extends ViewStateStore<PostListState> {
  private readonly unsubscribe: () => void;

  constructor(
    private readonly postUseCase: PostUseCase,
    private readonly session: Session,
  ) {
    super({ posts: [] });
    this.unsubscribe = session.subscribe((snapshot) => {
      if (snapshot.userId === null && this.getSnapshot().posts.length > 0) {
        this.setState({ posts: [] });
      }
    });
  }

  async loadPosts(): Promise<void> {
    await this.run('loading posts', () => this.refresh());
  }

  async createPost(title: string, content: string): Promise<void> {
    await this.run('creating post', async () => {
      await this.postUseCase.createPost(title, content);
      await this.refresh();
    });
  }

  async updatePost(id: string, title: string, content: string): Promise<void> {
    await this.run('updating post', async () => {
      await this.postUseCase.updatePost(id, title, content);
      await this.refresh();
    });
  }

  async deletePost(id: string): Promise<void> {
    await this.run('deleting post', async () => {
      await this.postUseCase.deletePost(id);
      await this.refresh();
    });
  }

  async signOut(): Promise<void> {
    await this.run('signing out', async () => {
      await this.postUseCase.signOut();
      this.setState({ posts: [] });
      this.session.end();
    });
  }

  dispose() {
    this.unsubscribe();
  }

  private async refresh() {
    const posts = await this.postUseCase.fetchPosts();
    this.setState({ posts });
  }

  private async run(context: PostContext, action: () => Promise<void>): Promise<void> {
    try {
      await this.withLoading(action);
    } catch (error) {
      console.error(`[posts] Error ${context}:`, error);
      this.setStatus({ errorMessage: postErrorMessage(error, context) });
    }
  }
}
