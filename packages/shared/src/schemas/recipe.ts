import { z } from 'zod';
import { DEFAULT_UNIT } from '../constants/categories';
import { RECIPE_ORDERING_FIELDS } from '../constants/recipes';
import { cuisineTypeSchema, recipeCategorySchema, recipeDifficultySchema } from './enums';

// ============================================
// Recipe Children
// ============================================

export const recipeIngredientInputSchema = z.object({
  ingredientId: z.string().min(1),
  quantity: z.number().positive('Quantity must be greater than 0'),
  unit: z.string().trim().min(1).max(20).default(DEFAULT_UNIT),
  isMain: z.boolean().default(false),
});

export const cookingStepInputSchema = z.object({
  stepNumber: z.number().int().min(1),
  description: z.string().trim().min(1, 'Step description is required').max(2000),
  imageUrl: z.string().url().max(500).nullable().optional(),
  duration: z.number().int().nonnegative().default(0),
  tips: z.string().max(1000).nullable().optional(),
});

// ============================================
// Recipe Create / Update
// ============================================

const recipeFieldsSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(200, 'Name must be 200 characters or less'),
  coverImage: z.string().url().max(500).nullable().optional(),
  difficulty: recipeDifficultySchema.default('medium'),
  cookingTime: z.number().int().nonnegative().default(0),
  servings: z.number().int().min(1).default(1),
  category: recipeCategorySchema.default('other'),
  cuisineType: cuisineTypeSchema.default('chinese'),
  tags: z.array(z.string().trim().min(1).max(30)).max(20).default([]),
  totalCalories: z.number().nonnegative().default(0),
  description: z.string().max(5000).nullable().optional(),
  isPublished: z.boolean().default(true),
  ingredients: z.array(recipeIngredientInputSchema).max(100).default([]),
  steps: z.array(cookingStepInputSchema).max(100).default([]),
});

interface RecipeChildren {
  ingredients?: { ingredientId: string }[];
  steps?: { stepNumber: number }[];
}

function checkRecipeChildren(data: RecipeChildren, ctx: z.RefinementCtx) {
  const ingredientIds = (data.ingredients ?? []).map((item) => item.ingredientId);
  if (new Set(ingredientIds).size !== ingredientIds.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Each ingredient may only appear once',
      path: ['ingredients'],
    });
  }

  const stepNumbers = (data.steps ?? []).map((step) => step.stepNumber);
  if (new Set(stepNumbers).size !== stepNumbers.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Step numbers must be unique',
      path: ['steps'],
    });
  }
}

export const createRecipeSchema = recipeFieldsSchema.superRefine(checkRecipeChildren);

// PATCH: only provided fields change; a provided child array replaces the whole set
export const updateRecipeSchema = recipeFieldsSchema.partial().superRefine(checkRecipeChildren);

// PUT: as PATCH, but the name must be sent
export const replaceRecipeSchema = recipeFieldsSchema
  .partial()
  .required({ name: true })
  .superRefine(checkRecipeChildren);

// ============================================
// Listing
// ============================================

const orderingValues = RECIPE_ORDERING_FIELDS.flatMap((field) => [field, `-${field}`]);

export const recipeOrderingSchema = z
  .string()
  .refine((value) => orderingValues.includes(value), 'Invalid ordering')
  .default('-createdAt');

export type RecipeIngredientInput = z.infer<typeof recipeIngredientInputSchema>;
export type CookingStepInput = z.infer<typeof cookingStepInputSchema>;
export type CreateRecipeInput = z.infer<typeof createRecipeSchema>;
export type UpdateRecipeInput = z.infer<typeof updateRecipeSchema>;
