import {
  INGREDIENT_CATEGORIES,
  currentMonth,
  isSeasonal,
  labelFor,
  type IngredientDetail,
  type IngredientListItem,
  type RecognitionRecord,
} from '@smart-recipe/shared';
import type { IngredientRecognitionRow, IngredientRow, User } from '../../db/schema';

export function serializeIngredientListItem(row: IngredientRow): IngredientListItem {
  return {
    id: row.id,
    name: row.name,
    category: row.category,
    categoryDisplay: labelFor(INGREDIENT_CATEGORIES, row.category),
    imageUrl: row.imageUrl,
    calories: row.calories,
    isSeasonalNow: isSeasonal(row.season, currentMonth()),
  };
}

export function serializeIngredientDetail(row: IngredientRow): IngredientDetail {
  return {
    ...serializeIngredientListItem(row),
    protein: row.protein,
    fat: row.fat,
    carbohydrate: row.carbohydrate,
    fiber: row.fiber,
    vitamin: row.vitamin,
    description: row.description,
    season: row.season,
    nutritionSummary: {
      calories: row.calories,
      protein: row.protein,
      fat: row.fat,
      carbohydrate: row.carbohydrate,
      fiber: row.fiber,
      vitamin: row.vitamin,
    },
    createdAt: row.createdAt,
  };
}

export function serializeRecognition(
  row: IngredientRecognitionRow,
  user: Pick<User, 'id' | 'username'>
): RecognitionRecord {
  const found = row.result.ingredients;
  const top = found.reduce<(typeof found)[number] | null>(
    (best, item) => (best === null || item.confidence > best.confidence ? item : best),
    null
  );

  return {
    id: row.id,
    user: { id: user.id, username: user.username },
    imageUrl: row.imageUrl,
    recognitionResult: row.result,
    recognizedIngredients: found.map((item) => item.name),
    topIngredient: top,
    createdAt: row.createdAt,
  };
}
