import { sqliteTable, text, real, index } from 'drizzle-orm/sqlite-core';
import { relations } from 'drizzle-orm';
import type { IngredientCategoryId, RecognitionResult } from '@smart-recipe/shared';
import { id, createdAt } from './columns';
import { users } from './users';

// ============================================
// Ingredient catalogue (nutrition per 100g)
// ============================================

export const ingredients = sqliteTable(
  'ingredients',
  {
    id: id(),
    name: text('name').notNull().unique(),
    category: text('category').$type<IngredientCategoryId>().notNull().default('other'),
    imageUrl: text('image_url'),
    calories: real('calories').notNull().default(0),
    protein: real('protein').notNull().default(0),
    fat: real('fat').notNull().default(0),
    carbohydrate: real('carbohydrate').notNull().default(0),
    fiber: real('fiber').notNull().default(0),
    // e.g. { "C": 19, "A": 900 }
    vitamin: text('vitamin', { mode: 'json' }).$type<Record<string, number>>().notNull().default({}),
    description: text('description'),
    // Months (1-12) the ingredient is in season
    season: text('season', { mode: 'json' }).$type<number[]>().notNull().default([]),
    createdAt: createdAt(),
  },
  (table) => ({
    categoryIdx: index('ingredients_category_idx').on(table.category),
  })
);

// ============================================
// Recognition history
// ============================================

export const ingredientRecognitions = sqliteTable(
  'ingredient_recognitions',
  {
    id: id(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    imageUrl: text('image_url').notNull(),
    result: text('result', { mode: 'json' }).$type<RecognitionResult>().notNull(),
    createdAt: createdAt(),
  },
  (table) => ({
    userIdx: index('ingredient_recognitions_user_idx').on(table.userId),
  })
);

export const ingredientRecognitionsRelations = relations(ingredientRecognitions, ({ one }) => ({
  user: one(users, {
    fields: [ingredientRecognitions.userId],
    references: [users.id],
  }),
}));

export type IngredientRow = typeof ingredients.$inferSelect;
export type NewIngredient = typeof ingredients.$inferInsert;

export type IngredientRecognitionRow = typeof ingredientRecognitions.$inferSelect;
