import { sqliteTable, text, integer, real, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { relations, sql } from 'drizzle-orm';
import type {
  BehaviorType,
  CuisineType,
  RecipeCategory,
  RecipeDifficulty,
} from '@smart-recipe/shared';
import { id, createdAt, updatedAt } from './columns';
import { users } from './users';
import { ingredients } from './ingredients';

// ============================================
// Recipes
// ============================================

export const recipes = sqliteTable(
  'recipes',
  {
    id: id(),
    name: text('name').notNull(),
    coverImage: text('cover_image'),
    authorId: text('author_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    difficulty: text('difficulty').$type<RecipeDifficulty>().notNull().default('medium'),
    cookingTime: integer('cooking_time').notNull().default(0), // minutes
    servings: integer('servings').notNull().default(1),
    category: text('category').$type<RecipeCategory>().notNull().default('other'),
    cuisineType: text('cuisine_type').$type<CuisineType>().notNull().default('chinese'),
    tags: text('tags', { mode: 'json' }).$type<string[]>().notNull().default([]),
    totalCalories: real('total_calories').notNull().default(0),
    description: text('description'),
    views: integer('views').notNull().default(0),
    likes: integer('likes').notNull().default(0),
    favorites: integer('favorites').notNull().default(0),
    isPublished: integer('is_published', { mode: 'boolean' }).notNull().default(true),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => ({
    authorPublishedIdx: index('recipes_author_published_idx').on(table.authorId, table.isPublished),
    categoryPublishedIdx: index('recipes_category_published_idx').on(table.category, table.isPublished),
    viewsIdx: index('recipes_views_idx').on(table.views),
    likesIdx: index('recipes_likes_idx').on(table.likes),
  })
);

// ============================================
// Recipe ingredients
// ============================================

export const recipeIngredients = sqliteTable(
  'recipe_ingredients',
  {
    id: id(),
    recipeId: text('recipe_id')
      .notNull()
      .references(() => recipes.id, { onDelete: 'cascade' }),
    ingredientId: text('ingredient_id')
      .notNull()
      .references(() => ingredients.id, { onDelete: 'cascade' }),
    quantity: real('quantity').notNull(),
    unit: text('unit').notNull().default('g'),
    isMain: integer('is_main', { mode: 'boolean' }).notNull().default(false),
    sortOrder: integer('sort_order').notNull().default(0),
  },
  (table) => ({
    recipeIngredientIdx: uniqueIndex('recipe_ingredients_pair_idx').on(table.recipeId, table.ingredientId),
  })
);

// ============================================
// Cooking steps
// ============================================

export const cookingSteps = sqliteTable(
  'cooking_steps',
  {
    id: id(),
    recipeId: text('recipe_id')
      .notNull()
      .references(() => recipes.id, { onDelete: 'cascade' }),
    stepNumber: integer('step_number').notNull(),
    description: text('description').notNull(),
    imageUrl: text('image_url'),
    duration: integer('duration').notNull().default(0), // minutes
    tips: text('tips'),
  },
  (table) => ({
    recipeStepIdx: uniqueIndex('cooking_steps_recipe_step_idx').on(table.recipeId, table.stepNumber),
  })
);

// ============================================
// User behaviors (view / like / favorite / cook)
// ============================================

export const userBehaviors = sqliteTable(
  'user_behaviors',
  {
    id: id(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    recipeId: text('recipe_id')
      .notNull()
      .references(() => recipes.id, { onDelete: 'cascade' }),
    behaviorType: text('behavior_type').$type<BehaviorType>().notNull(),
    createdAt: createdAt(),
  },
  (table) => ({
    userTypeIdx: index('user_behaviors_user_type_idx').on(table.userId, table.behaviorType),
    recipeTypeIdx: index('user_behaviors_recipe_type_idx').on(table.recipeId, table.behaviorType),
    // Likes and favorites are toggles; views and cooks repeat
    toggleIdx: uniqueIndex('user_behaviors_toggle_idx')
      .on(table.userId, table.recipeId, table.behaviorType)
      .where(sql`${table.behaviorType} in ('like', 'favorite')`),
  })
);

// ============================================
// Relations
// ============================================

export const recipesRelations = relations(recipes, ({ one, many }) => ({
  author: one(users, {
    fields: [recipes.authorId],
    references: [users.id],
  }),
  ingredients: many(recipeIngredients),
  steps: many(cookingSteps),
}));

export const recipeIngredientsRelations = relations(recipeIngredients, ({ one }) => ({
  recipe: one(recipes, {
    fields: [recipeIngredients.recipeId],
    references: [recipes.id],
  }),
  ingredient: one(ingredients, {
    fields: [recipeIngredients.ingredientId],
    references: [ingredients.id],
  }),
}));

export const cookingStepsRelations = relations(cookingSteps, ({ one }) => ({
  recipe: one(recipes, {
    fields: [cookingSteps.recipeId],
    references: [recipes.id],
  }),
}));

// ============================================
// Types
// ============================================

export type RecipeRow = typeof recipes.$inferSelect;
export type NewRecipe = typeof recipes.$inferInsert;

export type RecipeIngredientRow = typeof recipeIngredients.$inferSelect;
export type CookingStepRow = typeof cookingSteps.$inferSelect;
export type UserBehaviorRow = typeof userBehaviors.$inferSelect;
