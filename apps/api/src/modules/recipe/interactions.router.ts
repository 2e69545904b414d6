import type { FastifyInstance } from 'fastify';
import { and, count, desc, eq, sql } from 'drizzle-orm';
import { recipes, userBehaviors, userProfiles, users, type User } from '../../db/schema';
import { rowid } from '../../db/sql';
import { paginate } from '../../http/pagination';
import { protectedRoute, requireUser } from '../../http/procedures';
import { ok } from '../../http/response';
import { pathParam } from '../../http/validate';
import { recipeNotFound } from './helpers';
import { serializeRecipeListItem } from './serializers';

type ToggleKind = 'like' | 'favorite';

// SET clause for the recipe counter matching a toggle; decrements stop at zero
function counterChange(kind: ToggleKind, increment: boolean) {
  const column = kind === 'like' ? recipes.likes : recipes.favorites;
  const value = increment ? sql<number>`${column} + 1` : sql<number>`max(${column} - 1, 0)`;
  return kind === 'like' ? { likes: value } : { favorites: value };
}

export async function interactionRoutes(app: FastifyInstance) {
  // Flip a like/favorite for the caller and keep the recipe's counter in step
  async function toggle(user: User, recipeId: string, kind: ToggleKind) {
    const recipe = await app.db.query.recipes.findFirst({
      where: and(eq(recipes.id, recipeId), eq(recipes.isPublished, true)),
    });
    if (!recipe) throw recipeNotFound();

    // Lookup, write and counter read share one synchronous transaction
    return app.db.transaction((tx) => {
      const match = and(
        eq(userBehaviors.userId, user.id),
        eq(userBehaviors.recipeId, recipe.id),
        eq(userBehaviors.behaviorType, kind)
      );
      const active = tx.select({ id: userBehaviors.id }).from(userBehaviors).where(match).get() !== undefined;

      if (active) {
        tx.delete(userBehaviors).where(match).run();
      } else {
        tx.insert(userBehaviors).values({ userId: user.id, recipeId: recipe.id, behaviorType: kind }).run();
      }
      const counts = tx
        .update(recipes)
        .set(counterChange(kind, !active))
        .where(eq(recipes.id, recipe.id))
        .returning({ likes: recipes.likes, favorites: recipes.favorites })
        .get();

      return {
        active: !active,
        likes: counts.likes,
        favorites: counts.favorites,
      };
    });
  }

  app.post('/:id/like', protectedRoute, async (request) => {
    const user = requireUser(request);
    const result = await toggle(user, pathParam(request, 'id'), 'like');
    return ok({ liked: result.active, likes: result.likes }, result.active ? 'Liked' : 'Like removed');
  });

  app.post('/:id/favorite', protectedRoute, async (request) => {
    const user = requireUser(request);
    const result = await toggle(user, pathParam(request, 'id'), 'favorite');
    return ok(
      { favorited: result.active, favorites: result.favorites },
      result.active ? 'Added to favorites' : 'Removed from favorites'
    );
  });

  // Published recipes the caller has favorited, most recent first
  app.get('/favorites', protectedRoute, async (request) => {
    const user = requireUser(request);
    const where = and(
      eq(userBehaviors.userId, user.id),
      eq(userBehaviors.behaviorType, 'favorite'),
      eq(recipes.isPublished, true)
    );

    const [{ total }] = await app.db
      .select({ total: count() })
      .from(userBehaviors)
      .innerJoin(recipes, eq(recipes.id, userBehaviors.recipeId))
      .where(where);

    const page = await paginate(request, total, async (limit, offset) => {
      const rows = await app.db
        .select({
          recipe: recipes,
          authorId: users.id,
          authorUsername: users.username,
          authorNickname: userProfiles.nickname,
        })
        .from(userBehaviors)
        .innerJoin(recipes, eq(recipes.id, userBehaviors.recipeId))
        .innerJoin(users, eq(users.id, recipes.authorId))
        .leftJoin(userProfiles, eq(userProfiles.userId, recipes.authorId))
        .where(where)
        .orderBy(desc(userBehaviors.createdAt), desc(rowid(userBehaviors)))
        .limit(limit)
        .offset(offset);

      return rows.map((row) =>
        serializeRecipeListItem({
          recipe: row.recipe,
          author: { id: row.authorId, username: row.authorUsername, nickname: row.authorNickname },
        })
      );
    });

    return ok(page);
  });
}
