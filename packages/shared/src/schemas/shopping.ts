import { z } from 'zod';
import { DEFAULT_UNIT } from '../constants/categories';

// ============================================
// Shopping Item Schemas
// ============================================

export const createShoppingItemSchema = z.object({
  ingredientId: z.string().min(1, 'ingredientId is required'),
  quantity: z.number().positive('Quantity must be greater than 0'),
  unit: z.string().trim().min(1).max(20).default(DEFAULT_UNIT),
});

// PUT replaces the editable fields; quantity is required
export const replaceShoppingItemSchema = z.object({
  quantity: z.number().positive('Quantity must be greater than 0'),
  unit: z.string().trim().min(1).max(20).default(DEFAULT_UNIT),
  isPurchased: z.boolean().default(false),
});

export const updateShoppingItemSchema = z.object({
  quantity: z.number().positive('Quantity must be greater than 0').optional(),
  unit: z.string().trim().min(1).max(20).optional(),
  isPurchased: z.boolean().optional(),
});

export const generateShoppingListSchema = z.object({
  recipeId: z.string({ required_error: 'recipeId is required' }).min(1, 'recipeId is required'),
  servings: z.number().int().min(1).optional(),
});

export type CreateShoppingItemInput = z.infer<typeof createShoppingItemSchema>;
export type UpdateShoppingItemInput = z.infer<typeof updateShoppingItemSchema>;
export type GenerateShoppingListInput = z.infer<typeof generateShoppingListSchema>;
