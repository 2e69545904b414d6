import type { Comment, FoodPost, RecipeListItem } from '@smart-recipe/shared';
import type { CommentRow, FoodPostRow } from '../../db/schema';
import { serializeUserSummary } from '../user/serializers';
import type { RecipeAuthor } from '../recipe/serializers';

export interface PostListRow {
  post: FoodPostRow;
  author: RecipeAuthor;
}

export interface CommentListRow {
  comment: CommentRow;
  username: string;
}

export function serializePost(
  { post, author }: PostListRow,
  recipe: RecipeListItem | null,
  isLiked: boolean
): FoodPost {
  return {
    id: post.id,
    user: serializeUserSummary(author, author),
    recipe,
    content: post.content,
    images: post.images,
    likes: post.likes,
    commentsCount: post.commentsCount,
    isLiked,
    createdAt: post.createdAt,
  };
}

export function serializeComment({ comment, username }: CommentListRow, replies: Comment[] = []): Comment {
  return {
    id: comment.id,
    user: { id: comment.userId, username },
    targetId: comment.targetId,
    targetType: comment.targetType,
    content: comment.content,
    parentId: comment.parentId,
    replies,
    createdAt: comment.createdAt,
  };
}

/**
 * Nests a target's comments under their parents. `rows` must be oldest
 * first: replies keep that order, top-level comments are returned newest first.
 */
export function buildCommentTree(rows: CommentListRow[]): Comment[] {
  const children = new Map<string, CommentListRow[]>();
  const roots: CommentListRow[] = [];
  for (const row of rows) {
    const parentId = row.comment.parentId;
    if (parentId === null) {
      roots.push(row);
    } else {
      const siblings = children.get(parentId) ?? [];
      siblings.push(row);
      children.set(parentId, siblings);
    }
  }

  const build = (row: CommentListRow): Comment =>
    serializeComment(row, (children.get(row.comment.id) ?? []).map(build));

  return roots.reverse().map(build);
}
