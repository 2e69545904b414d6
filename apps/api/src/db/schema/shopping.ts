import { sqliteTable, text, real, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { relations, sql } from 'drizzle-orm';
import { id, createdAt, updatedAt } from './columns';
import { users } from './users';
import { ingredients } from './ingredients';

// ============================================
// Shopping Items
// ============================================
// At most one unpurchased row per (user, ingredient, unit)

export const shoppingItems = sqliteTable(
  'shopping_items',
  {
    id: id(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    ingredientId: text('ingredient_id')
      .notNull()
      .references(() => ingredients.id, { onDelete: 'cascade' }),
    quantity: real('quantity').notNull(),
    unit: text('unit').notNull().default('g'),
    isPurchased: integer('is_purchased', { mode: 'boolean' }).notNull().default(false),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => ({
    userIdx: index('shopping_items_user_idx').on(table.userId),
    purchasedIdx: index('shopping_items_purchased_idx').on(table.isPurchased),
    openIdx: uniqueIndex('shopping_items_open_idx')
      .on(table.userId, table.ingredientId, table.unit)
      .where(sql`${table.isPurchased} = 0`),
  })
);

export const shoppingItemsRelations = relations(shoppingItems, ({ one }) => ({
  user: one(users, {
    fields: [shoppingItems.userId],
    references: [users.id],
  }),
  ingredient: one(ingredients, {
    fields: [shoppingItems.ingredientId],
    references: [ingredients.id],
  }),
}));

export type ShoppingItemRow = typeof shoppingItems.$inferSelect;
export type NewShoppingItem = typeof shoppingItems.$inferInsert;
