import { and, count, eq } from 'drizzle-orm';
import type { DB } from '../../db';
import { follows, recipes, userProfiles, type User, type UserProfileRow } from '../../db/schema';

// Profiles are created with the account, but older rows may lack one
export async function getOrCreateProfile(db: DB, user: User): Promise<UserProfileRow> {
  const existing = await db.query.userProfiles.findFirst({
    where: eq(userProfiles.userId, user.id),
  });
  if (existing) return existing;

  const [profile] = await db
    .insert(userProfiles)
    .values({ userId: user.id, nickname: user.username })
    .returning();
  return profile;
}

export async function countFollowers(db: DB, userId: string): Promise<number> {
  const [{ total }] = await db
    .select({ total: count() })
    .from(follows)
    .where(eq(follows.followingId, userId));
  return total;
}

export async function countFollowing(db: DB, userId: string): Promise<number> {
  const [{ total }] = await db
    .select({ total: count() })
    .from(follows)
    .where(eq(follows.followerId, userId));
  return total;
}

export async function countPublishedRecipes(db: DB, userId: string): Promise<number> {
  const [{ total }] = await db
    .select({ total: count() })
    .from(recipes)
    .where(and(eq(recipes.authorId, userId), eq(recipes.isPublished, true)));
  return total;
}

export async function findFollow(db: DB, followerId: string, followingId: string) {
  return db.query.follows.findFirst({
    where: and(eq(follows.followerId, followerId), eq(follows.followingId, followingId)),
  });
}
