/**
 * Post Model
 */

import { z } from 'zod';

export const POSTS_COLLECTION = 'posts';

export const postDocumentSchema = z.object({
  title: z.string(),
  content: z.string(),
  timestamp: z.date(),
  userId: z.string().min(1),
});

export type PostDocument = z.infer<typeof postDocumentSchema>;

export interface Post extends PostDocument {
  id?: string;
}

export function createPost(input: {
  id?: string;
  title: string;
  content: string;
  userId: string;
  timestamp?: Date;
}): Post {
  return {
    ...(input.id !== undefined ? { id: input.id } : {}),
    title: input.title,
    content: input.content,
    timestamp: input.timestamp ?? new Date(),
    userId: input.userId,
  };
}

export function toPostDocument(post: Post): PostDocument {
  return {
    title: post.title,
    content: post.content,
    timestamp: post.timestamp,
    userId: post.userId,
  };
}
