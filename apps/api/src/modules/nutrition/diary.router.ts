import type { FastifyInstance } from 'fastify';
import { and, asc, eq, or } from 'drizzle-orm';
import {
  createDietaryLogSchema,
  formatDateYMD,
  isValidDateYMD,
  roundTo,
  sumMacros,
  type DiaryDay,
  type Macros,
} from '@smart-recipe/shared';
import { dietaryLogs, recipes, userProfiles } from '../../db/schema';
import { rowid } from '../../db/sql';
import { ApiError } from '../../http/errors';
import { protectedRoute, requireUser } from '../../http/procedures';
import { ok } from '../../http/response';
import { parseInput, pathParam, queryParam } from '../../http/validate';
import { mealOrder, recipeMacros } from './helpers';
import { groupByMeal, serializeDietaryLog } from './serializers';

export const INVALID_DATE = 'Invalid date format, expected YYYY-MM-DD';

function roundMacros(macros: Macros): Macros {
  return {
    calories: roundTo(macros.calories, 2),
    protein: roundTo(macros.protein, 2),
    fat: roundTo(macros.fat, 2),
    carbohydrate: roundTo(macros.carbohydrate, 2),
  };
}

export async function diaryRoutes(app: FastifyInstance) {
  // One day of the caller's diary (today, UTC, by default)
  app.get('/diary', protectedRoute, async (request) => {
    const user = requireUser(request);
    const date = queryParam(request.query, 'date') ?? formatDateYMD(new Date());
    if (!isValidDateYMD(date)) {
      throw new ApiError({ code: 'BAD_REQUEST', message: INVALID_DATE });
    }

    const rows = await app.db
      .select({ log: dietaryLogs, recipeName: recipes.name })
      .from(dietaryLogs)
      .leftJoin(recipes, eq(recipes.id, dietaryLogs.recipeId))
      .where(and(eq(dietaryLogs.userId, user.id), eq(dietaryLogs.date, date)))
      .orderBy(asc(dietaryLogs.createdAt), asc(rowid(dietaryLogs)));

    const logs = rows
      .map(serializeDietaryLog)
      .sort((a, b) => mealOrder(a.mealType) - mealOrder(b.mealType));

    const profile = await app.db.query.userProfiles.findFirst({
      where: eq(userProfiles.userId, user.id),
    });

    const day: DiaryDay = {
      date,
      logs,
      mealGroups: groupByMeal(logs),
      summary: roundMacros(sumMacros(logs)),
      dailyTarget: profile?.dailyCaloriesTarget ?? null,
    };
    return ok(day);
  });

  // A linked recipe fills in calories and macros the caller leaves out
  app.post('/diary', protectedRoute, async (request) => {
    const user = requireUser(request);
    const input = parseInput(createDietaryLogSchema, request.body);

    const recipeId = input.recipeId ?? null;
    const recipe = recipeId
      ? await app.db.query.recipes.findFirst({
          where: and(
            eq(recipes.id, recipeId),
            or(eq(recipes.isPublished, true), eq(recipes.authorId, user.id))
          ),
        })
      : undefined;
    if (recipeId && !recipe) {
      throw new ApiError({
        code: 'BAD_REQUEST',
        message: 'Validation failed',
        data: { recipeId: ['Recipe does not exist'] },
      });
    }

    let { calories, protein, fat, carbohydrate } = input;
    if (recipe) {
      if (!calories) calories = recipe.totalCalories;
      if (protein === undefined || fat === undefined || carbohydrate === undefined) {
        const macros = await recipeMacros(app.db, recipe.id);
        protein ??= macros.protein;
        fat ??= macros.fat;
        carbohydrate ??= macros.carbohydrate;
      }
    }

    const [log] = await app.db
      .insert(dietaryLogs)
      .values({
        userId: user.id,
        recipeId,
        customName: input.customName ?? '',
        calories: calories ?? 0,
        protein: protein ?? 0,
        fat: fat ?? 0,
        carbohydrate: carbohydrate ?? 0,
        mealType: input.mealType,
        date: input.date ?? formatDateYMD(new Date()),
      })
      .returning();

    return ok(serializeDietaryLog({ log, recipeName: recipe?.name ?? null }), 'Log added');
  });

  app.delete('/diary/:id', protectedRoute, async (request) => {
    const user = requireUser(request);
    const deleted = await app.db
      .delete(dietaryLogs)
      .where(and(eq(dietaryLogs.id, pathParam(request, 'id')), eq(dietaryLogs.userId, user.id)))
      .returning({ id: dietaryLogs.id });
    if (deleted.length === 0) {
      throw new ApiError({ code: 'NOT_FOUND', message: 'Log not found' });
    }
    return ok(null, 'Log deleted');
  });
}
