import { and, asc, count, desc, eq, type SQL } from 'drizzle-orm';
import type { CookingStepInput, RecipeIngredientInput } from '@smart-recipe/shared';
import type { DB, Tx } from '../../db';
import {
  cookingSteps,
  ingredients,
  recipeIngredients,
  recipes,
  userBehaviors,
  userProfiles,
  users,
  type User,
} from '../../db/schema';
import { rowid } from '../../db/sql';
import { ApiError } from '../../http/errors';
import type { RecipeDetailParts, RecipeListRow } from './serializers';

export const RECIPE_NOT_FOUND = 'Recipe not found';

export function recipeNotFound(): ApiError {
  return new ApiError({ code: 'NOT_FOUND', message: RECIPE_NOT_FOUND });
}

export async function countRecipes(db: DB, where: SQL | undefined): Promise<number> {
  const [{ total }] = await db.select({ total: count() }).from(recipes).where(where);
  return total;
}

/**
 * Recipes with their author, for list payloads. The final sort key is always
 * insertion order so equal sort values page deterministically.
 */
export async function selectRecipeList(
  db: DB,
  options: { where: SQL | undefined; orderBy: SQL[]; limit: number; offset: number }
): Promise<RecipeListRow[]> {
  const rows = await db
    .select({
      recipe: recipes,
      authorId: users.id,
      authorUsername: users.username,
      authorNickname: userProfiles.nickname,
    })
    .from(recipes)
    .innerJoin(users, eq(users.id, recipes.authorId))
    .leftJoin(userProfiles, eq(userProfiles.userId, recipes.authorId))
    .where(options.where)
    .orderBy(...options.orderBy, desc(rowid(recipes)))
    .limit(options.limit)
    .offset(options.offset);

  return rows.map((row) => ({
    recipe: row.recipe,
    author: { id: row.authorId, username: row.authorUsername, nickname: row.authorNickname },
  }));
}

export async function hasBehavior(
  db: DB,
  userId: string,
  recipeId: string,
  behaviorType: 'like' | 'favorite'
): Promise<boolean> {
  const row = await db.query.userBehaviors.findFirst({
    where: and(
      eq(userBehaviors.userId, userId),
      eq(userBehaviors.recipeId, recipeId),
      eq(userBehaviors.behaviorType, behaviorType)
    ),
  });
  return Boolean(row);
}

export async function loadRecipeDetail(
  db: DB,
  recipeId: string,
  viewer: User | null
): Promise<RecipeDetailParts> {
  const [list] = await selectRecipeList(db, {
    where: eq(recipes.id, recipeId),
    orderBy: [],
    limit: 1,
    offset: 0,
  });
  if (!list) throw recipeNotFound();

  const ingredientRows = await db
    .select({ link: recipeIngredients, ingredient: ingredients })
    .from(recipeIngredients)
    .innerJoin(ingredients, eq(ingredients.id, recipeIngredients.ingredientId))
    .where(eq(recipeIngredients.recipeId, recipeId))
    .orderBy(desc(recipeIngredients.isMain), asc(recipeIngredients.sortOrder));

  const steps = await db
    .select()
    .from(cookingSteps)
    .where(eq(cookingSteps.recipeId, recipeId))
    .orderBy(asc(cookingSteps.stepNumber));

  return {
    ...list,
    ingredients: ingredientRows,
    steps,
    isLiked: viewer ? await hasBehavior(db, viewer.id, recipeId, 'like') : false,
    isFavorited: viewer ? await hasBehavior(db, viewer.id, recipeId, 'favorite') : false,
  };
}

// Ids from the list that are not in the ingredient catalogue
export async function findUnknownIngredients(db: DB, ids: string[]): Promise<string[]> {
  if (ids.length === 0) return [];
  const known = await db.query.ingredients.findMany({
    columns: { id: true },
    where: (table, { inArray }) => inArray(table.id, ids),
  });
  const knownIds = new Set(known.map((row) => row.id));
  return ids.filter((id) => !knownIds.has(id));
}

export function replaceRecipeIngredients(tx: Tx, recipeId: string, items: RecipeIngredientInput[]) {
  tx.delete(recipeIngredients).where(eq(recipeIngredients.recipeId, recipeId)).run();
  if (items.length === 0) return;
  tx.insert(recipeIngredients)
    .values(
      items.map((item, index) => ({
        recipeId,
        ingredientId: item.ingredientId,
        quantity: item.quantity,
        unit: item.unit,
        isMain: item.isMain,
        sortOrder: index,
      }))
    )
    .run();
}

export function replaceCookingSteps(tx: Tx, recipeId: string, steps: CookingStepInput[]) {
  tx.delete(cookingSteps).where(eq(cookingSteps.recipeId, recipeId)).run();
  if (steps.length === 0) return;
  tx.insert(cookingSteps)
    .values(
      steps.map((step) => ({
        recipeId,
        stepNumber: step.stepNumber,
        description: step.description,
        imageUrl: step.imageUrl ?? null,
        duration: step.duration,
        tips: step.tips ?? null,
      }))
    )
    .run();
}
