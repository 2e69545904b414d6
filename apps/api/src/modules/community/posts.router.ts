import type { FastifyInstance } from 'fastify';
import { and, count, eq, sql } from 'drizzle-orm';
import { commentBodySchema, createPostSchema } from '@smart-recipe/shared';
import { comments, foodPosts, postLikes, recipes } from '../../db/schema';
import { ApiError, PERMISSION_DENIED } from '../../http/errors';
import { paginate } from '../../http/pagination';
import { protectedRoute, publicRoute, requireUser } from '../../http/procedures';
import { ok } from '../../http/response';
import { parseInput, pathParam } from '../../http/validate';
import {
  createComment,
  hydratePosts,
  loadCommentTree,
  loadPost,
  postNotFound,
  selectPosts,
} from './helpers';

export async function postsRoutes(app: FastifyInstance) {
  async function findPost(postId: string) {
    const post = await app.db.query.foodPosts.findFirst({ where: eq(foodPosts.id, postId) });
    if (!post) throw postNotFound();
    return post;
  }

  // Feed, newest first
  app.get('/posts', publicRoute, async (request) => {
    const [{ total }] = await app.db.select({ total: count() }).from(foodPosts);
    const page = await paginate(request, total, async (limit, offset) =>
      hydratePosts(app.db, await selectPosts(app.db, { where: undefined, limit, offset }), request.user)
    );
    return ok(page);
  });

  app.post('/posts', protectedRoute, async (request) => {
    const user = requireUser(request);
    const input = parseInput(createPostSchema, request.body, 'Post creation failed');

    const recipeId = input.recipeId ?? null;
    if (recipeId) {
      const recipe = await app.db.query.recipes.findFirst({
        where: and(eq(recipes.id, recipeId), eq(recipes.isPublished, true)),
      });
      if (!recipe) {
        throw new ApiError({
          code: 'BAD_REQUEST',
          message: 'Post creation failed',
          data: { recipeId: ['Recipe does not exist'] },
        });
      }
    }

    const [post] = await app.db
      .insert(foodPosts)
      .values({ userId: user.id, recipeId, content: input.content, images: input.images })
      .returning();

    request.log.info({ postId: post.id, userId: user.id }, 'post created');
    return ok(await loadPost(app.db, post.id, user), 'Post published');
  });

  app.get('/posts/:id', publicRoute, async (request) => {
    return ok(await loadPost(app.db, pathParam(request, 'id'), request.user));
  });

  // Removes the post together with its comments
  app.delete('/posts/:id', protectedRoute, async (request) => {
    const user = requireUser(request);
    const post = await findPost(pathParam(request, 'id'));
    if (post.userId !== user.id) {
      throw new ApiError({ code: 'FORBIDDEN', message: PERMISSION_DENIED });
    }

    app.db.transaction((tx) => {
      tx.delete(comments)
        .where(and(eq(comments.targetType, 'post'), eq(comments.targetId, post.id)))
        .run();
      tx.delete(foodPosts).where(eq(foodPosts.id, post.id)).run();
    });

    return ok(null, 'Post deleted');
  });

  app.post('/posts/:id/like', protectedRoute, async (request) => {
    const user = requireUser(request);
    const post = await findPost(pathParam(request, 'id'));

    const { liked, likes } = app.db.transaction((tx) => {
      const existing = tx
        .select({ id: postLikes.id })
        .from(postLikes)
        .where(and(eq(postLikes.userId, user.id), eq(postLikes.postId, post.id)))
        .get();

      if (existing) {
        tx.delete(postLikes).where(eq(postLikes.id, existing.id)).run();
      } else {
        tx.insert(postLikes).values({ userId: user.id, postId: post.id }).run();
      }
      const updated = tx
        .update(foodPosts)
        .set({
          likes: existing
            ? sql`max(${foodPosts.likes} - 1, 0)`
            : sql`${foodPosts.likes} + 1`,
        })
        .where(eq(foodPosts.id, post.id))
        .returning({ likes: foodPosts.likes })
        .get();
      return { liked: !existing, likes: updated.likes };
    });

    return ok({ liked, likes }, liked ? 'Liked' : 'Like removed');
  });

  app.get('/posts/:id/comments', publicRoute, async (request) => {
    const post = await findPost(pathParam(request, 'id'));
    return ok(await loadCommentTree(app.db, 'post', post.id));
  });

  app.post('/posts/:id/comments', protectedRoute, async (request) => {
    const user = requireUser(request);
    const post = await findPost(pathParam(request, 'id'));
    const input = parseInput(commentBodySchema, request.body, 'Comment failed');

    const comment = await createComment(app.db, user, {
      targetType: 'post',
      targetId: post.id,
      content: input.content,
      parentId: input.parentId,
    });
    return ok(comment, 'Comment posted');
  });
}
