import type { FastifyInstance } from 'fastify';
import { and, asc, desc, eq, inArray, notExists, or, sql, type SQL } from 'drizzle-orm';
import {
  RECOMMENDATION_LIMIT,
  createRecipeSchema,
  cuisineTypeSchema,
  recipeCategorySchema,
  recipeDifficultySchema,
  recipeOrderingSchema,
  replaceRecipeSchema,
  updateRecipeSchema,
  type RecipeListItem,
  type RecipeOrderingField,
  type SearchPage,
  type UpdateRecipeInput,
} from '@smart-recipe/shared';
import { comments, ingredients, recipeIngredients, recipes, userBehaviors, userProfiles } from '../../db/schema';
import { containsText, jsonArrayContainsText } from '../../db/sql';
import { ApiError, PERMISSION_DENIED } from '../../http/errors';
import { paginate } from '../../http/pagination';
import { protectedRoute, publicRoute, requireUser } from '../../http/procedures';
import { ok } from '../../http/response';
import { parseInput, pathParam, queryParam } from '../../http/validate';
import {
  countRecipes,
  findUnknownIngredients,
  loadRecipeDetail,
  recipeNotFound,
  replaceCookingSteps,
  replaceRecipeIngredients,
  selectRecipeList,
} from './helpers';
import { serializeRecipeDetail, serializeRecipeListItem } from './serializers';

const ORDERING_COLUMNS = {
  createdAt: recipes.createdAt,
  views: recipes.views,
  likes: recipes.likes,
  favorites: recipes.favorites,
  cookingTime: recipes.cookingTime,
  name: recipes.name,
} satisfies Record<RecipeOrderingField, unknown>;

function isOrderingField(value: string): value is RecipeOrderingField {
  return value in ORDERING_COLUMNS;
}

function orderingClause(ordering: string): SQL {
  const descending = ordering.startsWith('-');
  const field = descending ? ordering.slice(1) : ordering;
  if (!isOrderingField(field)) {
    throw new ApiError({ code: 'BAD_REQUEST', message: 'Invalid ordering' });
  }
  const column = ORDERING_COLUMNS[field];
  return descending ? desc(column) : asc(column);
}

function searchCondition(term: string): SQL | undefined {
  return or(
    containsText(recipes.name, term),
    containsText(recipes.description, term),
    jsonArrayContainsText(recipes.tags, term)
  );
}

// Optional enum filter: an unknown value matches nothing rather than erroring
function enumFilter<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  build: (value: T) => SQL
): SQL | undefined {
  if (!value) return undefined;
  const match = allowed.find((option) => option === value);
  return match ? build(match) : sql`0`;
}

export async function recipeRoutes(app: FastifyInstance) {
  async function assertIngredientsExist(ids: string[] | undefined, message: string) {
    const unknown = await findUnknownIngredients(app.db, ids ?? []);
    if (unknown.length > 0) {
      throw new ApiError({
        code: 'BAD_REQUEST',
        message,
        data: { ingredients: unknown.map((id) => `Ingredient ${id} does not exist`) },
      });
    }
  }

  async function findOwnRecipe(recipeId: string, userId: string) {
    const recipe = await app.db.query.recipes.findFirst({ where: eq(recipes.id, recipeId) });
    if (!recipe) throw recipeNotFound();
    if (recipe.authorId !== userId) {
      throw new ApiError({ code: 'FORBIDDEN', message: PERMISSION_DENIED });
    }
    return recipe;
  }

  // Published recipes, filtered and ordered
  app.get('/', publicRoute, async (request) => {
    const ordering = recipeOrderingSchema.safeParse(queryParam(request.query, 'ordering'));
    if (!ordering.success) {
      throw new ApiError({ code: 'BAD_REQUEST', message: 'Invalid ordering' });
    }
    const search = queryParam(request.query, 'search')?.trim();

    const where = and(
      eq(recipes.isPublished, true),
      enumFilter(queryParam(request.query, 'category'), recipeCategorySchema.options, (value) =>
        eq(recipes.category, value)
      ),
      enumFilter(queryParam(request.query, 'difficulty'), recipeDifficultySchema.options, (value) =>
        eq(recipes.difficulty, value)
      ),
      enumFilter(queryParam(request.query, 'cuisineType'), cuisineTypeSchema.options, (value) =>
        eq(recipes.cuisineType, value)
      ),
      search ? searchCondition(search) : undefined
    );

    const orderBy = [orderingClause(ordering.data)];
    const page = await paginate(request, await countRecipes(app.db, where), async (limit, offset) =>
      (await selectRecipeList(app.db, { where, orderBy, limit, offset })).map(serializeRecipeListItem)
    );
    return ok(page);
  });

  app.post('/create', protectedRoute, async (request) => {
    const user = requireUser(request);
    const input = parseInput(createRecipeSchema, request.body, 'Recipe creation failed');
    await assertIngredientsExist(
      input.ingredients.map((item) => item.ingredientId),
      'Recipe creation failed'
    );

    const { ingredients: items, steps, ...fields } = input;
    const recipeId = app.db.transaction((tx) => {
      const recipe = tx
        .insert(recipes)
        .values({
          ...fields,
          coverImage: fields.coverImage ?? null,
          description: fields.description ?? null,
          authorId: user.id,
        })
        .returning()
        .get();

      replaceRecipeIngredients(tx, recipe.id, items);
      replaceCookingSteps(tx, recipe.id, steps);
      return recipe.id;
    });

    request.log.info({ recipeId, userId: user.id }, 'recipe created');
    return ok(serializeRecipeDetail(await loadRecipeDetail(app.db, recipeId, user)), 'Recipe created');
  });

  app.get('/search', publicRoute, async (request) => {
    const keyword = queryParam(request.query, 'q')?.trim() ?? '';
    if (!keyword) {
      throw new ApiError({ code: 'BAD_REQUEST', message: 'Please enter a search keyword' });
    }

    const where = and(eq(recipes.isPublished, true), searchCondition(keyword));
    const orderBy = [desc(recipes.createdAt)];
    const page = await paginate(request, await countRecipes(app.db, where), async (limit, offset) =>
      (await selectRecipeList(app.db, { where, orderBy, limit, offset })).map(serializeRecipeListItem)
    );
    const result: SearchPage<RecipeListItem> = { keyword, count: page.count, results: page.results };
    return ok(result, 'Search complete');
  });

  // Most viewed, then most liked; never suggests recipes with the caller's allergens
  app.get('/recommend', publicRoute, async (request) => {
    let allergies: string[] = [];
    if (request.user) {
      const profile = await app.db.query.userProfiles.findFirst({
        where: eq(userProfiles.userId, request.user.id),
      });
      allergies = profile?.allergies ?? [];
    }

    const excludeAllergens =
      allergies.length > 0
        ? notExists(
            app.db
              .select({ one: sql`1` })
              .from(recipeIngredients)
              .innerJoin(ingredients, eq(ingredients.id, recipeIngredients.ingredientId))
              .where(
                and(eq(recipeIngredients.recipeId, recipes.id), inArray(ingredients.name, allergies))
              )
          )
        : undefined;

    const rows = await selectRecipeList(app.db, {
      where: and(eq(recipes.isPublished, true), excludeAllergens),
      orderBy: [desc(recipes.views), desc(recipes.likes)],
      limit: RECOMMENDATION_LIMIT,
      offset: 0,
    });
    return ok(rows.map(serializeRecipeListItem));
  });

  // The caller's recipes, drafts included
  app.get('/my-recipes', protectedRoute, async (request) => {
    const user = requireUser(request);
    const where = eq(recipes.authorId, user.id);
    const orderBy = [desc(recipes.createdAt)];
    const page = await paginate(request, await countRecipes(app.db, where), async (limit, offset) =>
      (await selectRecipeList(app.db, { where, orderBy, limit, offset })).map(serializeRecipeListItem)
    );
    return ok(page);
  });

  // Published recipes, or the caller's own draft; every read counts as a view
  app.get('/:id', publicRoute, async (request) => {
    const recipeId = pathParam(request, 'id');
    const recipe = await app.db.query.recipes.findFirst({ where: eq(recipes.id, recipeId) });
    if (!recipe || (!recipe.isPublished && recipe.authorId !== request.user?.id)) {
      throw recipeNotFound();
    }

    await app.db
      .update(recipes)
      .set({ views: sql`${recipes.views} + 1` })
      .where(eq(recipes.id, recipeId));

    if (request.user) {
      await app.db
        .insert(userBehaviors)
        .values({ userId: request.user.id, recipeId, behaviorType: 'view' });
    }

    return ok(serializeRecipeDetail(await loadRecipeDetail(app.db, recipeId, request.user)));
  });

  // PUT requires the name, PATCH takes any subset; sent child arrays replace the stored set
  app.route({
    method: ['PUT', 'PATCH'],
    url: '/:id/update',
    ...protectedRoute,
    handler: async (request) => {
      const user = requireUser(request);
      const recipe = await findOwnRecipe(pathParam(request, 'id'), user.id);

      const input: UpdateRecipeInput =
        request.method === 'PUT'
          ? parseInput(replaceRecipeSchema, request.body, 'Recipe update failed')
          : parseInput(updateRecipeSchema, request.body, 'Recipe update failed');
      await assertIngredientsExist(
        input.ingredients?.map((item) => item.ingredientId),
        'Recipe update failed'
      );

      const { ingredients: items, steps, ...fields } = input;
      app.db.transaction((tx) => {
        tx.update(recipes)
          .set({ ...fields, updatedAt: new Date().toISOString() })
          .where(eq(recipes.id, recipe.id))
          .run();

        if (items) replaceRecipeIngredients(tx, recipe.id, items);
        if (steps) replaceCookingSteps(tx, recipe.id, steps);
      });

      return ok(
        serializeRecipeDetail(await loadRecipeDetail(app.db, recipe.id, user)),
        'Recipe updated'
      );
    },
  });

  app.delete('/:id/delete', protectedRoute, async (request) => {
    const user = requireUser(request);
    const recipe = await findOwnRecipe(pathParam(request, 'id'), user.id);

    // comments.target_id has no foreign key to cascade from
    app.db.transaction((tx) => {
      tx.delete(comments)
        .where(and(eq(comments.targetType, 'recipe'), eq(comments.targetId, recipe.id)))
        .run();
      tx.delete(recipes).where(eq(recipes.id, recipe.id)).run();
    });

    request.log.info({ recipeId: recipe.id, userId: user.id }, 'recipe deleted');
    return ok(null, 'Recipe deleted');
  });
}
