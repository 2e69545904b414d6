import type { FastifyInstance } from 'fastify';
import { and, count, desc, eq } from 'drizzle-orm';
import type { FollowingEntry, PublicUserProfile } from '@smart-recipe/shared';
import { follows, userProfiles, users } from '../../db/schema';
import { rowid } from '../../db/sql';
import { ApiError } from '../../http/errors';
import { paginate } from '../../http/pagination';
import { protectedRoute, publicRoute, requireUser } from '../../http/procedures';
import { ok } from '../../http/response';
import { pathParam } from '../../http/validate';
import {
  countFollowers,
  countFollowing,
  countPublishedRecipes,
  findFollow,
} from './helpers';

export async function socialRoutes(app: FastifyInstance) {
  async function findActiveUser(userId: string) {
    const user = await app.db.query.users.findFirst({ where: eq(users.id, userId) });
    if (!user || !user.isActive) {
      throw new ApiError({ code: 'NOT_FOUND', message: 'User not found' });
    }
    return user;
  }

  // Accounts the caller follows, newest first
  app.get('/following', protectedRoute, async (request) => {
    const user = requireUser(request);
    const where = eq(follows.followerId, user.id);

    const [{ total }] = await app.db.select({ total: count() }).from(follows).where(where);

    const page = await paginate(request, total, async (limit, offset) => {
      const rows = await app.db
        .select({ follow: follows, user: users, profile: userProfiles })
        .from(follows)
        .innerJoin(users, eq(users.id, follows.followingId))
        .leftJoin(userProfiles, eq(userProfiles.userId, users.id))
        .where(where)
        .orderBy(desc(follows.createdAt), desc(rowid(follows)))
        .limit(limit)
        .offset(offset);

      return rows.map(
        (row): FollowingEntry => ({
          id: row.user.id,
          username: row.user.username,
          nickname: row.profile?.nickname || row.user.username,
          avatar: row.profile?.avatar ?? null,
          followedAt: row.follow.createdAt,
        })
      );
    });

    return ok(page);
  });

  app.get('/:userId', publicRoute, async (request) => {
    const target = await findActiveUser(pathParam(request, 'userId'));
    const profile = await app.db.query.userProfiles.findFirst({
      where: eq(userProfiles.userId, target.id),
    });

    const isFollowing = request.user
      ? Boolean(await findFollow(app.db, request.user.id, target.id))
      : false;

    const result: PublicUserProfile = {
      id: target.id,
      username: target.username,
      nickname: profile?.nickname || target.username,
      avatar: profile?.avatar ?? null,
      dateJoined: target.createdAt,
      recipeCount: await countPublishedRecipes(app.db, target.id),
      followerCount: await countFollowers(app.db, target.id),
      followingCount: await countFollowing(app.db, target.id),
      isFollowing,
    };
    return ok(result);
  });

  // Toggle following
  app.post('/:userId/follow', protectedRoute, async (request) => {
    const user = requireUser(request);
    const targetId = pathParam(request, 'userId');
    if (targetId === user.id) {
      throw new ApiError({ code: 'BAD_REQUEST', message: 'You cannot follow yourself' });
    }
    const target = await findActiveUser(targetId);

    const existing = await findFollow(app.db, user.id, target.id);
    if (existing) {
      await app.db
        .delete(follows)
        .where(and(eq(follows.followerId, user.id), eq(follows.followingId, target.id)));
    } else {
      await app.db
        .insert(follows)
        .values({ followerId: user.id, followingId: target.id })
        .onConflictDoNothing();
    }

    const following = !existing;
    return ok(
      { following, followerCount: await countFollowers(app.db, target.id) },
      following ? 'Followed' : 'Unfollowed'
    );
  });
}
