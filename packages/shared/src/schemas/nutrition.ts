import { z } from 'zod';
import { isValidDateYMD } from '../utils';
import { mealTypeSchema } from './enums';

export const dateYMDSchema = z
  .string()
  .refine(isValidDateYMD, 'Invalid date format, expected YYYY-MM-DD');

const macroSchema = z.number().nonnegative().max(100000);

export const createDietaryLogSchema = z
  .object({
    recipeId: z.string().min(1).nullable().optional(),
    customName: z.string().trim().max(100).optional(),
    calories: macroSchema.optional(),
    protein: macroSchema.optional(),
    fat: macroSchema.optional(),
    carbohydrate: macroSchema.optional(),
    mealType: mealTypeSchema.default('lunch'),
    date: dateYMDSchema.optional(),
  })
  .refine((data) => Boolean(data.recipeId) || Boolean(data.customName), {
    message: 'Either recipeId or customName is required',
    path: ['customName'],
  });

export const reportPeriodSchema = z.enum(['week', 'month']).default('week');

export type CreateDietaryLogInput = z.infer<typeof createDietaryLogSchema>;
export type ReportPeriod = z.infer<typeof reportPeriodSchema>;
