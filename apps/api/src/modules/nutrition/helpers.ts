import { eq } from 'drizzle-orm';
import { MEAL_TYPES, roundTo, type HealthGoal, type MealType } from '@smart-recipe/shared';
import type { DB } from '../../db';
import { ingredients, recipeIngredients } from '../../db/schema';

// Diary entries sort breakfast, lunch, dinner, snack
export function mealOrder(mealType: MealType): number {
  return MEAL_TYPES.find((meal) => meal.id === mealType)?.order ?? MEAL_TYPES.length + 1;
}

export interface RecipeMacros {
  protein: number;
  fat: number;
  carbohydrate: number;
}

// Macros contributed by the recipe's gram-measured ingredients
export async function recipeMacros(db: DB, recipeId: string): Promise<RecipeMacros> {
  const rows = await db
    .select({
      quantity: recipeIngredients.quantity,
      unit: recipeIngredients.unit,
      protein: ingredients.protein,
      fat: ingredients.fat,
      carbohydrate: ingredients.carbohydrate,
    })
    .from(recipeIngredients)
    .innerJoin(ingredients, eq(ingredients.id, recipeIngredients.ingredientId))
    .where(eq(recipeIngredients.recipeId, recipeId));

  const totals = { protein: 0, fat: 0, carbohydrate: 0 };
  for (const row of rows) {
    if (row.unit.toLowerCase() !== 'g') continue;
    const factor = row.quantity / 100;
    totals.protein += row.protein * factor;
    totals.fat += row.fat * factor;
    totals.carbohydrate += row.carbohydrate * factor;
  }

  return {
    protein: roundTo(totals.protein, 2),
    fat: roundTo(totals.fat, 2),
    carbohydrate: roundTo(totals.carbohydrate, 2),
  };
}

// Intake within this many kcal of the target counts as on target
export const TARGET_TOLERANCE = 100;

const GOAL_ADVICE: Partial<Record<HealthGoal, string>> = {
  lose_weight:
    'To lose weight, favour low-calorie, high-fibre recipes and cut back on fried and sugary food.',
  gain_muscle: 'To build muscle, eat enough protein: about 1.5-2 g per kg of body weight each day.',
  improve_nutrition:
    'To improve your nutrition, vary your meals and get enough vegetables, protein and healthy fats every day.',
};

export function buildAdvice(stats: {
  daysLogged: number;
  avgCalories: number;
  targetCalories: number | null;
  healthGoal: HealthGoal | null;
}): string[] {
  const { daysLogged, avgCalories, targetCalories, healthGoal } = stats;
  if (daysLogged === 0) {
    return ['You have not logged any meals yet. Start logging to track your nutrition.'];
  }

  const advice: string[] = [];
  const intake = `This week you averaged ${avgCalories} kcal a day`;
  if (targetCalories) {
    const diff = avgCalories - targetCalories;
    if (Math.abs(diff) <= TARGET_TOLERANCE) {
      advice.push(`${intake}, right on your ${targetCalories} kcal target. Keep it up!`);
    } else if (diff > 0) {
      advice.push(
        `${intake}, about ${Math.round(diff)} kcal over your ${targetCalories} kcal target. Consider smaller portions.`
      );
    } else {
      advice.push(
        `${intake}, about ${Math.round(-diff)} kcal under your ${targetCalories} kcal target. Make sure you eat enough.`
      );
    }
  } else {
    advice.push(`${intake}. Set a daily calorie target in your profile for more precise advice.`);
  }

  const goalLine = healthGoal ? GOAL_ADVICE[healthGoal] : undefined;
  if (goalLine) advice.push(goalLine);
  return advice;
}
