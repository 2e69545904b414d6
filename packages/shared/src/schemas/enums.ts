import { z } from 'zod';
import { INGREDIENT_CATEGORIES, type IngredientCategoryId } from '../constants/categories';
import {
  RECIPE_DIFFICULTIES,
  RECIPE_CATEGORIES,
  CUISINE_TYPES,
  MEAL_TYPES,
  type RecipeDifficulty,
  type RecipeCategory,
  type CuisineType,
  type MealType,
} from '../constants/recipes';
import { GENDERS, HEALTH_GOALS, type Gender, type HealthGoal } from '../constants/users';

// z.enum needs a non-empty tuple of the constants' literal ids
function idsOf<T extends string>(options: readonly { id: T }[]): [T, ...T[]] {
  const [first, ...rest] = options.map((option) => option.id);
  return [first, ...rest];
}

export const ingredientCategorySchema = z.enum(idsOf<IngredientCategoryId>(INGREDIENT_CATEGORIES));
export const recipeDifficultySchema = z.enum(idsOf<RecipeDifficulty>(RECIPE_DIFFICULTIES));
export const recipeCategorySchema = z.enum(idsOf<RecipeCategory>(RECIPE_CATEGORIES));
export const cuisineTypeSchema = z.enum(idsOf<CuisineType>(CUISINE_TYPES));
export const mealTypeSchema = z.enum(idsOf<MealType>(MEAL_TYPES));
export const genderSchema = z.enum(idsOf<Gender>(GENDERS));
export const healthGoalSchema = z.enum(idsOf<HealthGoal>(HEALTH_GOALS));
export const commentTargetTypeSchema = z.enum(['recipe', 'post']);
