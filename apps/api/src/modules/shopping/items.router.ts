import type { FastifyInstance } from 'fastify';
import { and, asc, count, desc, eq, ne } from 'drizzle-orm';
import {
  createShoppingItemSchema,
  generateShoppingListSchema,
  replaceShoppingItemSchema,
  updateShoppingItemSchema,
  type GenerateShoppingListResult,
  type UpdateShoppingItemInput,
} from '@smart-recipe/shared';
import { ingredients, recipeIngredients, recipes, shoppingItems } from '../../db/schema';
import { rowid } from '../../db/sql';
import { ApiError } from '../../http/errors';
import { paginate } from '../../http/pagination';
import { protectedRoute, requireUser } from '../../http/procedures';
import { ok } from '../../http/response';
import { parseInput, pathParam, queryParam } from '../../http/validate';
import { recipeNotFound } from '../recipe/helpers';
import { addToList, itemNotFound } from './helpers';
import { serializeShoppingItem } from './serializers';

export async function itemsRoutes(app: FastifyInstance) {
  async function loadItem(itemId: string) {
    const row = await app.db.query.shoppingItems.findFirst({
      where: eq(shoppingItems.id, itemId),
      with: { ingredient: true },
    });
    if (!row) throw itemNotFound();
    return serializeShoppingItem(row);
  }

  async function findOwnItem(itemId: string, userId: string) {
    const row = await app.db.query.shoppingItems.findFirst({
      where: and(eq(shoppingItems.id, itemId), eq(shoppingItems.userId, userId)),
    });
    if (!row) throw itemNotFound();
    return row;
  }

  // Unpurchased first, then newest
  app.get('/', protectedRoute, async (request) => {
    const user = requireUser(request);
    const where = and(
      eq(shoppingItems.userId, user.id),
      queryParam(request.query, 'onlyUnpurchased') === 'true'
        ? eq(shoppingItems.isPurchased, false)
        : undefined
    );

    const [{ total }] = await app.db.select({ total: count() }).from(shoppingItems).where(where);
    const page = await paginate(request, total, async (limit, offset) => {
      const rows = await app.db
        .select({ item: shoppingItems, ingredient: ingredients })
        .from(shoppingItems)
        .innerJoin(ingredients, eq(ingredients.id, shoppingItems.ingredientId))
        .where(where)
        .orderBy(
          asc(shoppingItems.isPurchased),
          desc(shoppingItems.createdAt),
          desc(rowid(shoppingItems))
        )
        .limit(limit)
        .offset(offset);
      return rows.map((row) => serializeShoppingItem({ ...row.item, ingredient: row.ingredient }));
    });

    return ok(page);
  });

  app.post('/', protectedRoute, async (request) => {
    const user = requireUser(request);
    const input = parseInput(createShoppingItemSchema, request.body);

    const ingredient = await app.db.query.ingredients.findFirst({
      where: eq(ingredients.id, input.ingredientId),
    });
    if (!ingredient) {
      throw new ApiError({
        code: 'BAD_REQUEST',
        message: 'Validation failed',
        data: { ingredientId: ['Ingredient does not exist'] },
      });
    }

    const { item, merged } = app.db.transaction((tx) => addToList(tx, user.id, input));
    return ok(await loadItem(item.id), merged ? 'Merged into existing item' : 'Added to shopping list');
  });

  app.post('/clear-purchased', protectedRoute, async (request) => {
    const user = requireUser(request);
    const deleted = await app.db
      .delete(shoppingItems)
      .where(and(eq(shoppingItems.userId, user.id), eq(shoppingItems.isPurchased, true)))
      .returning({ id: shoppingItems.id });

    return ok({ deletedCount: deleted.length }, 'Purchased items cleared');
  });

  // Adds every ingredient of a published recipe, scaled to the requested servings
  app.post('/generate', protectedRoute, async (request) => {
    const user = requireUser(request);
    const input = parseInput(
      generateShoppingListSchema,
      request.body,
      queryParam(request.body, 'recipeId') ? 'Invalid parameters' : 'recipeId is required'
    );

    const recipe = await app.db.query.recipes.findFirst({
      where: and(eq(recipes.id, input.recipeId), eq(recipes.isPublished, true)),
    });
    if (!recipe) throw recipeNotFound();

    const links = await app.db
      .select()
      .from(recipeIngredients)
      .where(eq(recipeIngredients.recipeId, recipe.id))
      .orderBy(asc(recipeIngredients.sortOrder));
    if (links.length === 0) {
      throw new ApiError({ code: 'BAD_REQUEST', message: 'This recipe has no ingredients' });
    }

    const factor = input.servings ? input.servings / Math.max(recipe.servings, 1) : 1;
    const result = app.db.transaction((tx) => {
      const summary: GenerateShoppingListResult = {
        addedCount: 0,
        mergedCount: 0,
        totalIngredients: links.length,
      };
      for (const link of links) {
        const { merged } = addToList(tx, user.id, {
          ingredientId: link.ingredientId,
          quantity: link.quantity * factor,
          unit: link.unit,
        });
        if (merged) summary.mergedCount += 1;
        else summary.addedCount += 1;
      }
      return summary;
    });

    request.log.info({ recipeId: recipe.id, userId: user.id, ...result }, 'shopping list generated');
    return ok(result, 'Shopping list generated');
  });

  // PUT requires quantity; PATCH takes any subset
  app.route({
    method: ['PUT', 'PATCH'],
    url: '/:id',
    ...protectedRoute,
    handler: async (request) => {
      const user = requireUser(request);
      const current = await findOwnItem(pathParam(request, 'id'), user.id);
      const input: UpdateShoppingItemInput =
        request.method === 'PUT'
          ? parseInput(replaceShoppingItemSchema, request.body)
          : parseInput(updateShoppingItemSchema, request.body);

      const unit = input.unit ?? current.unit;
      const isPurchased = input.isPurchased ?? current.isPurchased;
      if (!isPurchased) {
        const clash = await app.db.query.shoppingItems.findFirst({
          where: and(
            eq(shoppingItems.userId, user.id),
            eq(shoppingItems.ingredientId, current.ingredientId),
            eq(shoppingItems.unit, unit),
            eq(shoppingItems.isPurchased, false),
            ne(shoppingItems.id, current.id)
          ),
        });
        if (clash) {
          throw new ApiError({
            code: 'CONFLICT',
            message: 'An unpurchased item for this ingredient and unit already exists',
          });
        }
      }

      await app.db
        .update(shoppingItems)
        .set({ ...input, updatedAt: new Date().toISOString() })
        .where(eq(shoppingItems.id, current.id));

      return ok(await loadItem(current.id), 'Shopping list item updated');
    },
  });

  app.delete('/:id', protectedRoute, async (request) => {
    const user = requireUser(request);
    const current = await findOwnItem(pathParam(request, 'id'), user.id);
    await app.db.delete(shoppingItems).where(eq(shoppingItems.id, current.id));
    return ok(null, 'Shopping list item deleted');
  });
}
