import { z } from 'zod';
import { commentTargetTypeSchema } from './enums';

export const createPostSchema = z.object({
  content: z.string().trim().min(1, 'Content is required').max(2000),
  images: z.array(z.string().url()).max(9, 'A post may have at most 9 images').default([]),
  recipeId: z.string().min(1).nullable().optional(),
});

export const commentBodySchema = z.object({
  content: z.string().trim().min(1, 'Comment cannot be empty').max(1000),
  parentId: z.string().min(1).nullable().optional(),
});

export const createCommentSchema = commentBodySchema.extend({
  targetType: commentTargetTypeSchema,
  targetId: z.string().min(1),
});

export type CommentTargetType = z.infer<typeof commentTargetTypeSchema>;
export type CreatePostInput = z.infer<typeof createPostSchema>;
export type CreateCommentInput = z.infer<typeof createCommentSchema>;
