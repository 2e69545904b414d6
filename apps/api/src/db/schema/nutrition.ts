import { sqliteTable, text, real, index } from 'drizzle-orm/sqlite-core';
import type { MealType } from '@smart-recipe/shared';
import { id, createdAt } from './columns';
import { users } from './users';
import { recipes } from './recipes';

// ============================================
// Dietary diary
// ============================================

export const dietaryLogs = sqliteTable(
  'dietary_logs',
  {
    id: id(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    recipeId: text('recipe_id').references(() => recipes.id, { onDelete: 'set null' }),
    // Used when no recipe is linked
    customName: text('custom_name').notNull().default(''),
    calories: real('calories').notNull().default(0), // kcal
    protein: real('protein').notNull().default(0), // grams
    fat: real('fat').notNull().default(0), // grams
    carbohydrate: real('carbohydrate').notNull().default(0), // grams
    mealType: text('meal_type').$type<MealType>().notNull().default('lunch'),
    date: text('date').notNull(), // YYYY-MM-DD
    createdAt: createdAt(),
  },
  (table) => ({
    userDateIdx: index('dietary_logs_user_date_idx').on(table.userId, table.date),
  })
);

export type DietaryLogRow = typeof dietaryLogs.$inferSelect;
export type NewDietaryLog = typeof dietaryLogs.$inferInsert;
