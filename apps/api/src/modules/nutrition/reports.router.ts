import type { FastifyInstance } from 'fastify';
import { and, asc, desc, eq, gte, lte, sql } from 'drizzle-orm';
import {
  addDays,
  dateRangeYMD,
  formatDateYMD,
  parseDateYMD,
  reportPeriodSchema,
  roundTo,
  type DailyNutrition,
  type NutritionAdvice,
  type NutritionReport,
  type RecipeNutrition,
} from '@smart-recipe/shared';
import { dietaryLogs, ingredients, recipeIngredients, recipes, userProfiles } from '../../db/schema';
import { protectedRoute, publicRoute, requireUser } from '../../http/procedures';
import { ok } from '../../http/response';
import { pathParam, queryParam } from '../../http/validate';
import { recipeNotFound } from '../recipe/helpers';
import { buildAdvice } from './helpers';

const REPORT_DAYS = { week: 7, month: 30 } as const;
const ADVICE_DAYS = 7;

// Inclusive window of `days` dates ending today (UTC)
function trailingDays(days: number) {
  const endDate = formatDateYMD(new Date());
  const startDate = formatDateYMD(addDays(parseDateYMD(endDate), -(days - 1)));
  return { startDate, endDate };
}

export async function reportsRoutes(app: FastifyInstance) {
  // Daily totals over the last week or month; unknown periods fall back to a week
  app.get('/report', protectedRoute, async (request) => {
    const user = requireUser(request);
    const parsed = reportPeriodSchema.safeParse(queryParam(request.query, 'period'));
    const period = parsed.success ? parsed.data : 'week';
    const { startDate, endDate } = trailingDays(REPORT_DAYS[period]);

    const totals = await app.db
      .select({
        date: dietaryLogs.date,
        calories: sql<number>`total(${dietaryLogs.calories})`,
        protein: sql<number>`total(${dietaryLogs.protein})`,
        fat: sql<number>`total(${dietaryLogs.fat})`,
        carbohydrate: sql<number>`total(${dietaryLogs.carbohydrate})`,
      })
      .from(dietaryLogs)
      .where(
        and(
          eq(dietaryLogs.userId, user.id),
          gte(dietaryLogs.date, startDate),
          lte(dietaryLogs.date, endDate)
        )
      )
      .groupBy(dietaryLogs.date);
    const byDate = new Map(totals.map((row) => [row.date, row]));

    const daily: DailyNutrition[] = dateRangeYMD(startDate, endDate).map((date) => {
      const row = byDate.get(date);
      return {
        date,
        calories: roundTo(row?.calories ?? 0, 2),
        protein: roundTo(row?.protein ?? 0, 2),
        fat: roundTo(row?.fat ?? 0, 2),
        carbohydrate: roundTo(row?.carbohydrate ?? 0, 2),
      };
    });

    const logged = daily.filter((day) => day.calories > 0);
    const average = (pick: (day: DailyNutrition) => number) =>
      logged.length > 0 ? roundTo(logged.reduce((total, day) => total + pick(day), 0) / logged.length, 1) : 0;

    const report: NutritionReport = {
      period,
      startDate,
      endDate,
      daily,
      average: {
        calories: average((day) => day.calories),
        protein: average((day) => day.protein),
        fat: average((day) => day.fat),
        carbohydrate: average((day) => day.carbohydrate),
      },
    };
    return ok(report);
  });

  app.get('/advice', protectedRoute, async (request) => {
    const user = requireUser(request);
    const { startDate, endDate } = trailingDays(ADVICE_DAYS);

    const [stats] = await app.db
      .select({
        calories: sql<number>`total(${dietaryLogs.calories})`,
        days: sql<number>`count(distinct ${dietaryLogs.date})`,
      })
      .from(dietaryLogs)
      .where(
        and(
          eq(dietaryLogs.userId, user.id),
          gte(dietaryLogs.date, startDate),
          lte(dietaryLogs.date, endDate)
        )
      );

    const daysLogged = stats?.days ?? 0;
    const avgCalories = daysLogged > 0 ? roundTo((stats?.calories ?? 0) / daysLogged, 1) : 0;
    const profile = await app.db.query.userProfiles.findFirst({
      where: eq(userProfiles.userId, user.id),
    });
    const targetCalories = profile?.dailyCaloriesTarget ?? null;
    const healthGoal = profile?.healthGoal ?? null;

    const result: NutritionAdvice = {
      daysLogged,
      avgCalories,
      targetCalories,
      healthGoal,
      advice: buildAdvice({ daysLogged, avgCalories, targetCalories, healthGoal }),
    };
    return ok(result);
  });

  // Per-100 g facts for each ingredient of a published recipe
  app.get('/recipe/:recipeId', publicRoute, async (request) => {
    const recipe = await app.db.query.recipes.findFirst({
      where: and(eq(recipes.id, pathParam(request, 'recipeId')), eq(recipes.isPublished, true)),
    });
    if (!recipe) throw recipeNotFound();

    const rows = await app.db
      .select({
        name: ingredients.name,
        quantity: recipeIngredients.quantity,
        unit: recipeIngredients.unit,
        calories: ingredients.calories,
        protein: ingredients.protein,
        fat: ingredients.fat,
        carbohydrate: ingredients.carbohydrate,
      })
      .from(recipeIngredients)
      .innerJoin(ingredients, eq(ingredients.id, recipeIngredients.ingredientId))
      .where(eq(recipeIngredients.recipeId, recipe.id))
      .orderBy(desc(recipeIngredients.isMain), asc(recipeIngredients.sortOrder));

    const servings = Math.max(recipe.servings, 1);
    const result: RecipeNutrition = {
      recipeId: recipe.id,
      recipeName: recipe.name,
      servings,
      totalCalories: recipe.totalCalories,
      perServingCalories: roundTo(recipe.totalCalories / servings, 1),
      ingredients: rows,
    };
    return ok(result);
  });
}
