import { sqliteTable, text, integer, index, uniqueIndex, type AnySQLiteColumn } from 'drizzle-orm/sqlite-core';
import { relations } from 'drizzle-orm';
import type { CommentTargetType } from '@smart-recipe/shared';
import { id, createdAt } from './columns';
import { users } from './users';
import { recipes } from './recipes';

// ============================================
// Food posts
// ============================================

export const foodPosts = sqliteTable(
  'food_posts',
  {
    id: id(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    recipeId: text('recipe_id').references(() => recipes.id, { onDelete: 'set null' }),
    content: text('content').notNull(),
    images: text('images', { mode: 'json' }).$type<string[]>().notNull().default([]),
    likes: integer('likes').notNull().default(0),
    commentsCount: integer('comments_count').notNull().default(0),
    createdAt: createdAt(),
  },
  (table) => ({
    userIdx: index('food_posts_user_idx').on(table.userId),
  })
);

export const postLikes = sqliteTable(
  'post_likes',
  {
    id: id(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    postId: text('post_id')
      .notNull()
      .references(() => foodPosts.id, { onDelete: 'cascade' }),
    createdAt: createdAt(),
  },
  (table) => ({
    pairIdx: uniqueIndex('post_likes_pair_idx').on(table.userId, table.postId),
  })
);

// ============================================
// Comments (on recipes or posts, threaded)
// ============================================

export const comments = sqliteTable(
  'comments',
  {
    id: id(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    targetType: text('target_type').$type<CommentTargetType>().notNull(),
    targetId: text('target_id').notNull(),
    content: text('content').notNull(),
    parentId: text('parent_id').references((): AnySQLiteColumn => comments.id, { onDelete: 'cascade' }),
    createdAt: createdAt(),
  },
  (table) => ({
    targetIdx: index('comments_target_idx').on(table.targetType, table.targetId),
  })
);

export const foodPostsRelations = relations(foodPosts, ({ one }) => ({
  user: one(users, {
    fields: [foodPosts.userId],
    references: [users.id],
  }),
  recipe: one(recipes, {
    fields: [foodPosts.recipeId],
    references: [recipes.id],
  }),
}));

export type FoodPostRow = typeof foodPosts.$inferSelect;
export type NewFoodPost = typeof foodPosts.$inferInsert;

export type CommentRow = typeof comments.$inferSelect;
export type NewComment = typeof comments.$inferInsert;
