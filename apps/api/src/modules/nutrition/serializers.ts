import { MEAL_TYPES, labelFor, type DietaryLog, type MealType } from '@smart-recipe/shared';
import type { DietaryLogRow } from '../../db/schema';

export interface DietaryLogListRow {
  log: DietaryLogRow;
  recipeName: string | null;
}

export function serializeDietaryLog({ log, recipeName }: DietaryLogListRow): DietaryLog {
  return {
    id: log.id,
    recipeId: log.recipeId,
    customName: log.customName,
    foodName: recipeName ?? log.customName,
    calories: log.calories,
    protein: log.protein,
    fat: log.fat,
    carbohydrate: log.carbohydrate,
    mealType: log.mealType,
    mealTypeDisplay: labelFor(MEAL_TYPES, log.mealType),
    date: log.date,
    createdAt: log.createdAt,
  };
}

export function groupByMeal(logs: DietaryLog[]): Partial<Record<MealType, DietaryLog[]>> {
  const groups: Partial<Record<MealType, DietaryLog[]>> = {};
  for (const log of logs) {
    (groups[log.mealType] ??= []).push(log);
  }
  return groups;
}
