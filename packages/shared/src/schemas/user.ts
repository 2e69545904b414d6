import { z } from 'zod';
import { AGE_RANGE, DAILY_CALORIES_RANGE } from '../constants/users';
import { genderSchema, healthGoalSchema } from './enums';

// ============================================
// Auth Schemas
// ============================================

export const registerSchema = z
  .object({
    username: z
      .string()
      .trim()
      .min(3, 'Username must be at least 3 characters')
      .max(30, 'Username must be 30 characters or less'),
    password: z
      .string()
      .min(6, 'Password must be at least 6 characters')
      .max(128, 'Password must be 128 characters or less'),
    passwordConfirm: z.string().min(6).max(128),
    email: z.union([z.string().email('Enter a valid email address'), z.literal('')]).optional(),
    nickname: z.string().max(50).optional(),
    phone: z.string().max(20).optional(),
  })
  .refine((data) => data.password === data.passwordConfirm, {
    message: 'Passwords do not match',
    path: ['passwordConfirm'],
  });

export const loginSchema = z.object({
  username: z.string().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

export const refreshTokenSchema = z.object({
  refresh: z.string().min(1, 'Refresh token is required'),
});

export const changePasswordSchema = z
  .object({
    oldPassword: z.string().min(1, 'Current password is required'),
    newPassword: z
      .string()
      .min(6, 'Password must be at least 6 characters')
      .max(128, 'Password must be 128 characters or less'),
    newPasswordConfirm: z.string().min(6).max(128),
  })
  .refine((data) => data.newPassword === data.newPasswordConfirm, {
    message: 'Passwords do not match',
    path: ['newPasswordConfirm'],
  });

// ============================================
// Profile Schemas
// ============================================

const ageSchema = z
  .number()
  .int()
  .min(AGE_RANGE.min, `Age must be between ${AGE_RANGE.min} and ${AGE_RANGE.max}`)
  .max(AGE_RANGE.max, `Age must be between ${AGE_RANGE.min} and ${AGE_RANGE.max}`);

const dailyCaloriesSchema = z
  .number()
  .int()
  .min(
    DAILY_CALORIES_RANGE.min,
    `Daily calorie target must be between ${DAILY_CALORIES_RANGE.min} and ${DAILY_CALORIES_RANGE.max}`
  )
  .max(
    DAILY_CALORIES_RANGE.max,
    `Daily calorie target must be between ${DAILY_CALORIES_RANGE.min} and ${DAILY_CALORIES_RANGE.max}`
  );

const tagListSchema = z.array(z.string().min(1).max(50)).max(50);

export const healthProfileSchema = z.object({
  gender: genderSchema.nullable().optional(),
  age: ageSchema.nullable().optional(),
  dietaryPreference: tagListSchema.optional(),
  allergies: tagListSchema.optional(),
  healthGoal: healthGoalSchema.nullable().optional(),
  dailyCaloriesTarget: dailyCaloriesSchema.nullable().optional(),
});

export const updateProfileSchema = healthProfileSchema.extend({
  nickname: z.string().max(50).nullable().optional(),
  avatar: z.string().url().max(500).nullable().optional(),
});

export type RegisterInput = z.infer<typeof registerSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;
export type HealthProfileInput = z.infer<typeof healthProfileSchema>;
export type UpdateProfileInput = z.infer<typeof updateProfileSchema>;
