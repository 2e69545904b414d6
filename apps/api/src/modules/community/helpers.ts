import { and, asc, desc, eq, inArray, sql, type SQL } from 'drizzle-orm';
import type { Comment, CommentTargetType, FoodPost } from '@smart-recipe/shared';
import type { DB } from '../../db';
import { comments, foodPosts, postLikes, recipes, userProfiles, users, type User } from '../../db/schema';
import { rowid } from '../../db/sql';
import { ApiError } from '../../http/errors';
import { selectRecipeList } from '../recipe/helpers';
import { serializeRecipeListItem } from '../recipe/serializers';
import {
  buildCommentTree,
  serializeComment,
  serializePost,
  type CommentListRow,
  type PostListRow,
} from './serializers';

export function postNotFound(): ApiError {
  return new ApiError({ code: 'NOT_FOUND', message: 'Post not found' });
}

export async function selectPosts(
  db: DB,
  options: { where: SQL | undefined; limit: number; offset: number }
): Promise<PostListRow[]> {
  const rows = await db
    .select({
      post: foodPosts,
      authorId: users.id,
      authorUsername: users.username,
      authorNickname: userProfiles.nickname,
    })
    .from(foodPosts)
    .innerJoin(users, eq(users.id, foodPosts.userId))
    .leftJoin(userProfiles, eq(userProfiles.userId, foodPosts.userId))
    .where(options.where)
    .orderBy(desc(foodPosts.createdAt), desc(rowid(foodPosts)))
    .limit(options.limit)
    .offset(options.offset);

  return rows.map((row) => ({
    post: row.post,
    author: { id: row.authorId, username: row.authorUsername, nickname: row.authorNickname },
  }));
}

// Attaches linked recipes and the viewer's likes
export async function hydratePosts(db: DB, rows: PostListRow[], viewer: User | null): Promise<FoodPost[]> {
  const recipeIds = [...new Set(rows.flatMap(({ post }) => (post.recipeId ? [post.recipeId] : [])))];
  const recipeRows =
    recipeIds.length > 0
      ? await selectRecipeList(db, {
          where: inArray(recipes.id, recipeIds),
          orderBy: [],
          limit: recipeIds.length,
          offset: 0,
        })
      : [];
  const recipeById = new Map(recipeRows.map((row) => [row.recipe.id, serializeRecipeListItem(row)]));

  const postIds = rows.map(({ post }) => post.id);
  const liked = new Set<string>();
  if (viewer && postIds.length > 0) {
    const likes = await db
      .select({ postId: postLikes.postId })
      .from(postLikes)
      .where(and(eq(postLikes.userId, viewer.id), inArray(postLikes.postId, postIds)));
    for (const like of likes) liked.add(like.postId);
  }

  return rows.map((row) =>
    serializePost(
      row,
      row.post.recipeId ? (recipeById.get(row.post.recipeId) ?? null) : null,
      liked.has(row.post.id)
    )
  );
}

export async function loadPost(db: DB, postId: string, viewer: User | null): Promise<FoodPost> {
  const [row] = await selectPosts(db, { where: eq(foodPosts.id, postId), limit: 1, offset: 0 });
  if (!row) throw postNotFound();
  const [post] = await hydratePosts(db, [row], viewer);
  return post;
}

async function selectComments(db: DB, where: SQL | undefined): Promise<CommentListRow[]> {
  return db
    .select({ comment: comments, username: users.username })
    .from(comments)
    .innerJoin(users, eq(users.id, comments.userId))
    .where(where)
    .orderBy(asc(comments.createdAt), asc(rowid(comments)));
}

export async function loadCommentTree(
  db: DB,
  targetType: CommentTargetType,
  targetId: string
): Promise<Comment[]> {
  const rows = await selectComments(
    db,
    and(eq(comments.targetType, targetType), eq(comments.targetId, targetId))
  );
  return buildCommentTree(rows);
}

export interface NewCommentInput {
  targetType: CommentTargetType;
  targetId: string;
  content: string;
  parentId?: string | null;
}

/**
 * Stores a comment on a post or published recipe. A reply's parent must sit
 * on the same target; comments on posts bump the post's counter.
 */
export async function createComment(db: DB, user: User, input: NewCommentInput): Promise<Comment> {
  const target =
    input.targetType === 'post'
      ? await db.query.foodPosts.findFirst({ where: eq(foodPosts.id, input.targetId) })
      : await db.query.recipes.findFirst({
          where: and(eq(recipes.id, input.targetId), eq(recipes.isPublished, true)),
        });
  if (!target) {
    throw new ApiError({ code: 'NOT_FOUND', message: 'Comment target not found' });
  }

  const parentId = input.parentId ?? null;
  if (parentId) {
    const parent = await db.query.comments.findFirst({
      where: and(
        eq(comments.id, parentId),
        eq(comments.targetType, input.targetType),
        eq(comments.targetId, input.targetId)
      ),
    });
    if (!parent) {
      throw new ApiError({
        code: 'BAD_REQUEST',
        message: 'Comment failed',
        data: { parentId: ['Parent comment does not exist on this target'] },
      });
    }
  }

  const comment = db.transaction((tx) => {
    const created = tx
      .insert(comments)
      .values({
        userId: user.id,
        targetType: input.targetType,
        targetId: input.targetId,
        content: input.content,
        parentId,
      })
      .returning()
      .get();

    if (input.targetType === 'post') {
      tx.update(foodPosts)
        .set({ commentsCount: sql`${foodPosts.commentsCount} + 1` })
        .where(eq(foodPosts.id, input.targetId))
        .run();
    }
    return created;
  });

  return serializeComment({ comment, username: user.username });
}
