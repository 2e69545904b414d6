/**
 * Recipe Module Constants
 *
 * Enumerations used by recipes, behaviors and the dietary diary,
 * each paired with the label shown to clients.
 */

// ============================================
// Difficulty
// ============================================

export const RECIPE_DIFFICULTIES = [
  { id: 'easy', name: 'Easy' },
  { id: 'medium', name: 'Medium' },
  { id: 'hard', name: 'Hard' },
] as const;

export type RecipeDifficulty = (typeof RECIPE_DIFFICULTIES)[number]['id'];

// ============================================
// Category
// ============================================

export const RECIPE_CATEGORIES = [
  { id: 'breakfast', name: 'Breakfast' },
  { id: 'lunch', name: 'Lunch' },
  { id: 'dinner', name: 'Dinner' },
  { id: 'dessert', name: 'Dessert' },
  { id: 'snack', name: 'Snack' },
  { id: 'soup', name: 'Soup' },
  { id: 'staple', name: 'Staple' },
  { id: 'other', name: 'Other' },
] as const;

export type RecipeCategory = (typeof RECIPE_CATEGORIES)[number]['id'];

// ============================================
// Cuisine
// ============================================

export const CUISINE_TYPES = [
  { id: 'chinese', name: 'Chinese' },
  { id: 'cantonese', name: 'Cantonese' },
  { id: 'sichuan', name: 'Sichuan' },
  { id: 'hunan', name: 'Hunan' },
  { id: 'shandong', name: 'Shandong' },
  { id: 'jiangsu', name: 'Jiangsu' },
  { id: 'zhejiang', name: 'Zhejiang' },
  { id: 'fujian', name: 'Fujian' },
  { id: 'anhui', name: 'Anhui' },
  { id: 'western', name: 'Western' },
  { id: 'japanese', name: 'Japanese' },
  { id: 'korean', name: 'Korean' },
  { id: 'other', name: 'Other' },
] as const;

export type CuisineType = (typeof CUISINE_TYPES)[number]['id'];

// ============================================
// User Behavior
// ============================================

export const BEHAVIOR_TYPES = ['view', 'like', 'favorite', 'cook'] as const;

export type BehaviorType = (typeof BEHAVIOR_TYPES)[number];

// ============================================
// Meal Types (dietary diary)
// ============================================

export const MEAL_TYPES = [
  { id: 'breakfast', name: 'Breakfast', order: 1 },
  { id: 'lunch', name: 'Lunch', order: 2 },
  { id: 'dinner', name: 'Dinner', order: 3 },
  { id: 'snack', name: 'Snack', order: 4 },
] as const;

export type MealType = (typeof MEAL_TYPES)[number]['id'];

// ============================================
// Listing
// ============================================

/**
 * Fields a recipe list may be ordered by. Prefix with `-` for descending.
 */
export const RECIPE_ORDERING_FIELDS = [
  'createdAt',
  'views',
  'likes',
  'favorites',
  'cookingTime',
  'name',
] as const;

export type RecipeOrderingField = (typeof RECIPE_ORDERING_FIELDS)[number];

export const RECOMMENDATION_LIMIT = 20;

// ============================================
// Labels
// ============================================

type Labelled = readonly { readonly id: string; readonly name: string }[];

/**
 * Look up the display label for an enum id, falling back to the id itself
 */
export function labelFor(options: Labelled, id: string): string {
  return options.find((option) => option.id === id)?.name ?? id;
}
