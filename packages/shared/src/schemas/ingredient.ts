import { z } from 'zod';
import { IMAGE_EXTENSIONS } from '../constants/categories';
import { ingredientCategorySchema } from './enums';

const per100g = z.number().nonnegative().max(100000);

const seasonSchema = z
  .array(z.number().int('Months must be integers between 1 and 12').min(1).max(12))
  .max(12);

export const createIngredientSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(100),
  category: ingredientCategorySchema.default('other'),
  imageUrl: z.string().url().max(500).nullable().optional(),
  calories: per100g.default(0),
  protein: per100g.default(0),
  fat: per100g.default(0),
  carbohydrate: per100g.default(0),
  fiber: per100g.default(0),
  vitamin: z.record(z.string(), z.number().nonnegative()).default({}),
  description: z.string().max(2000).nullable().optional(),
  season: seasonSchema.default([]),
});

export const updateIngredientSchema = z.object({
  name: z.string().trim().min(1).max(100).optional(),
  category: ingredientCategorySchema.optional(),
  imageUrl: z.string().url().max(500).nullable().optional(),
  calories: per100g.optional(),
  protein: per100g.optional(),
  fat: per100g.optional(),
  carbohydrate: per100g.optional(),
  fiber: per100g.optional(),
  vitamin: z.record(z.string(), z.number().nonnegative()).optional(),
  description: z.string().max(2000).nullable().optional(),
  season: seasonSchema.optional(),
});

export const nutritionCalculateSchema = z.object({
  ingredientId: z.string().min(1, 'ingredientId is required'),
  quantityGrams: z
    .number()
    .min(0.1, 'Quantity must be between 0.1 and 10000 grams')
    .max(10000, 'Quantity must be between 0.1 and 10000 grams'),
});

export const recommendByIngredientsSchema = z.object({
  ingredients: z.array(z.string().min(1)).min(1),
});

export const recognizeIngredientSchema = z.object({
  imageUrl: z
    .string()
    .url('Enter a valid URL')
    .max(500)
    .refine(
      (url) => IMAGE_EXTENSIONS.some((ext) => url.toLowerCase().endsWith(ext)),
      `Image URL must end with a supported extension (${IMAGE_EXTENSIONS.map((ext) => ext.slice(1)).join(', ')})`
    ),
});

export type CreateIngredientInput = z.infer<typeof createIngredientSchema>;
export type UpdateIngredientInput = z.infer<typeof updateIngredientSchema>;
export type NutritionCalculateInput = z.infer<typeof nutritionCalculateSchema>;
