import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { relations } from 'drizzle-orm';
import { id, createdAt, updatedAt } from './columns';
import type { Gender, HealthGoal, UserRole } from '@smart-recipe/shared';

// ============================================
// Users (credentials)
// ============================================

export const users = sqliteTable('users', {
  id: id(),
  username: text('username').notNull().unique(),
  email: text('email'),
  passwordHash: text('password_hash').notNull(),
  role: text('role').$type<UserRole>().notNull().default('member'),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

// ============================================
// User Profiles (one per user)
// ============================================

export const userProfiles = sqliteTable(
  'user_profiles',
  {
    id: id(),
    userId: text('user_id')
      .notNull()
      .unique()
      .references(() => users.id, { onDelete: 'cascade' }),
    nickname: text('nickname'),
    avatar: text('avatar'),
    gender: text('gender').$type<Gender>(),
    age: integer('age'),
    phone: text('phone'),
    dietaryPreference: text('dietary_preference', { mode: 'json' })
      .$type<string[]>()
      .notNull()
      .default([]),
    allergies: text('allergies', { mode: 'json' }).$type<string[]>().notNull().default([]),
    healthGoal: text('health_goal').$type<HealthGoal>(),
    dailyCaloriesTarget: integer('daily_calories_target'),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => ({
    userIdx: index('idx_user_profiles_user').on(table.userId),
  })
);

// ============================================
// Follows
// ============================================

export const follows = sqliteTable(
  'follows',
  {
    id: id(),
    followerId: text('follower_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    followingId: text('following_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    createdAt: createdAt(),
  },
  (table) => ({
    pairIdx: uniqueIndex('follows_pair_idx').on(table.followerId, table.followingId),
    followingIdx: index('follows_following_idx').on(table.followingId),
  })
);

// ============================================
// Revoked refresh tokens (logout)
// ============================================

export const revokedTokens = sqliteTable('revoked_tokens', {
  jti: text('jti').primaryKey(),
  userId: text('user_id')
    .notNull()
    .references(() => users.id, { onDelete: 'cascade' }),
  expiresAt: text('expires_at').notNull(),
  revokedAt: createdAt(),
});

// ============================================
// Relations
// ============================================

export const usersRelations = relations(users, ({ one }) => ({
  profile: one(userProfiles, {
    fields: [users.id],
    references: [userProfiles.userId],
  }),
}));

export const userProfilesRelations = relations(userProfiles, ({ one }) => ({
  user: one(users, {
    fields: [userProfiles.userId],
    references: [users.id],
  }),
}));

// ============================================
// Types
// ============================================

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;

export type UserProfileRow = typeof userProfiles.$inferSelect;
export type NewUserProfile = typeof userProfiles.$inferInsert;

export type FollowRow = typeof follows.$inferSelect;
