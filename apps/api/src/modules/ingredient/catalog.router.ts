import type { FastifyInstance, FastifyRequest } from 'fastify';
import { and, asc, count, desc, eq, inArray, ne, or, sql, type SQL } from 'drizzle-orm';
import {
  RECOMMENDATION_LIMIT,
  createIngredientSchema,
  currentMonth,
  ingredientCategorySchema,
  nutritionCalculateSchema,
  recommendByIngredientsSchema,
  scaleNutrition,
  updateIngredientSchema,
  type IngredientListItem,
  type SearchPage,
} from '@smart-recipe/shared';
import { ingredients, recipeIngredients, recipes } from '../../db/schema';
import { containsText, jsonArrayIncludes } from '../../db/sql';
import { ApiError } from '../../http/errors';
import { paginate } from '../../http/pagination';
import { adminRoute, publicRoute } from '../../http/procedures';
import { ok } from '../../http/response';
import { parseInput, pathParam, queryParam } from '../../http/validate';
import { selectRecipeList } from '../recipe/helpers';
import { serializeRecipeListItem } from '../recipe/serializers';
import { serializeIngredientDetail, serializeIngredientListItem } from './serializers';

const CATALOG_ORDER = [asc(ingredients.category), asc(ingredients.name)];

function ingredientNotFound(): ApiError {
  return new ApiError({ code: 'NOT_FOUND', message: 'Ingredient not found' });
}

function nameTaken(): ApiError {
  return new ApiError({
    code: 'BAD_REQUEST',
    message: 'Validation failed',
    data: { name: ['An ingredient with that name already exists.'] },
  });
}

function parseMonth(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return currentMonth();
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ApiError({ code: 'BAD_REQUEST', message: 'Invalid month format' });
  }
  const month = Number(raw);
  if (month < 1 || month > 12) {
    throw new ApiError({ code: 'BAD_REQUEST', message: 'Month must be between 1 and 12' });
  }
  return month;
}

export async function catalogRoutes(app: FastifyInstance) {
  async function pageOfIngredients(request: FastifyRequest, where: SQL | undefined) {
    const [{ total }] = await app.db.select({ total: count() }).from(ingredients).where(where);
    return paginate(request, total, async (limit, offset) => {
      const rows = await app.db
        .select()
        .from(ingredients)
        .where(where)
        .orderBy(...CATALOG_ORDER)
        .limit(limit)
        .offset(offset);
      return rows.map(serializeIngredientListItem);
    });
  }

  async function findIngredient(id: string) {
    const row = await app.db.query.ingredients.findFirst({ where: eq(ingredients.id, id) });
    if (!row) throw ingredientNotFound();
    return row;
  }

  app.get('/', publicRoute, async (request) => {
    const category = queryParam(request.query, 'category');
    const search = queryParam(request.query, 'search')?.trim();

    // An unknown category matches nothing
    let categoryFilter: SQL | undefined;
    if (category) {
      const parsed = ingredientCategorySchema.safeParse(category);
      categoryFilter = parsed.success ? eq(ingredients.category, parsed.data) : sql`0`;
    }

    const where = and(
      categoryFilter,
      search
        ? or(containsText(ingredients.name, search), containsText(ingredients.description, search))
        : undefined
    );
    return ok(await pageOfIngredients(request, where));
  });

  app.post('/', adminRoute, async (request) => {
    const input = parseInput(createIngredientSchema, request.body);
    const existing = await app.db.query.ingredients.findFirst({
      where: eq(ingredients.name, input.name),
    });
    if (existing) throw nameTaken();

    const [row] = await app.db
      .insert(ingredients)
      .values({
        ...input,
        imageUrl: input.imageUrl ?? null,
        description: input.description ?? null,
      })
      .returning();

    request.log.info({ ingredientId: row.id }, 'ingredient created');
    return ok(serializeIngredientDetail(row), 'Ingredient created');
  });

  app.get('/search', publicRoute, async (request) => {
    const keyword = queryParam(request.query, 'q')?.trim() ?? '';
    if (!keyword) {
      throw new ApiError({ code: 'BAD_REQUEST', message: 'Please enter a search keyword' });
    }

    const page = await pageOfIngredients(
      request,
      or(containsText(ingredients.name, keyword), containsText(ingredients.description, keyword))
    );
    const result: SearchPage<IngredientListItem> = { keyword, count: page.count, results: page.results };
    return ok(result, 'Search complete');
  });

  // Ingredients in season for ?month=1-12 (defaults to this month)
  app.get('/seasonal', publicRoute, async (request) => {
    const month = parseMonth(queryParam(request.query, 'month'));
    const page = await pageOfIngredients(request, jsonArrayIncludes(ingredients.season, month));
    return ok({ month, count: page.count, results: page.results });
  });

  app.post('/nutrition-calculate', publicRoute, async (request) => {
    const input = parseInput(nutritionCalculateSchema, request.body, 'Invalid parameters');
    const row = await findIngredient(input.ingredientId);

    return ok(
      {
        ingredient: { id: row.id, name: row.name },
        quantityGrams: input.quantityGrams,
        nutrition: scaleNutrition(row, input.quantityGrams),
      },
      'Calculation complete'
    );
  });

  // Published recipes using any of the named ingredients
  app.post('/recommend', publicRoute, async (request) => {
    const input = parseInput(
      recommendByIngredientsSchema,
      request.body,
      'Please provide a list of ingredients'
    );

    const matching = app.db
      .select({ recipeId: recipeIngredients.recipeId })
      .from(recipeIngredients)
      .innerJoin(ingredients, eq(ingredients.id, recipeIngredients.ingredientId))
      .where(inArray(ingredients.name, input.ingredients));

    const rows = await selectRecipeList(app.db, {
      where: and(eq(recipes.isPublished, true), inArray(recipes.id, matching)),
      orderBy: [desc(recipes.views), desc(recipes.likes)],
      limit: RECOMMENDATION_LIMIT,
      offset: 0,
    });
    return ok(rows.map(serializeRecipeListItem));
  });

  app.get('/:id', publicRoute, async (request) => {
    return ok(serializeIngredientDetail(await findIngredient(pathParam(request, 'id'))));
  });

  app.patch('/:id', adminRoute, async (request) => {
    const current = await findIngredient(pathParam(request, 'id'));
    const input = parseInput(updateIngredientSchema, request.body);

    if (input.name !== undefined) {
      const clash = await app.db.query.ingredients.findFirst({
        where: and(eq(ingredients.name, input.name), ne(ingredients.id, current.id)),
      });
      if (clash) throw nameTaken();
    }

    if (Object.keys(input).length === 0) {
      return ok(serializeIngredientDetail(current), 'Ingredient updated');
    }

    const [row] = await app.db
      .update(ingredients)
      .set(input)
      .where(eq(ingredients.id, current.id))
      .returning();
    return ok(serializeIngredientDetail(row), 'Ingredient updated');
  });

  app.delete('/:id', adminRoute, async (request) => {
    const current = await findIngredient(pathParam(request, 'id'));
    await app.db.delete(ingredients).where(eq(ingredients.id, current.id));

    request.log.info({ ingredientId: current.id }, 'ingredient deleted');
    return ok(null, 'Ingredient deleted');
  });
}
