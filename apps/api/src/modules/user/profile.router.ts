import type { FastifyInstance } from 'fastify';
import { eq } from 'drizzle-orm';
import { healthProfileSchema, updateProfileSchema } from '@smart-recipe/shared';
import { userProfiles } from '../../db/schema';
import { protectedRoute, requireUser } from '../../http/procedures';
import { ok } from '../../http/response';
import { parseInput } from '../../http/validate';
import { getOrCreateProfile } from './helpers';
import { serializeHealthProfile, serializeProfile } from './serializers';

export async function profileRoutes(app: FastifyInstance) {
  app.get('/profile', protectedRoute, async (request) => {
    const user = requireUser(request);
    const profile = await getOrCreateProfile(app.db, user);
    return ok(serializeProfile(user, profile));
  });

  // PUT and PATCH both apply a partial update
  app.route({
    method: ['PUT', 'PATCH'],
    url: '/profile',
    ...protectedRoute,
    handler: async (request) => {
      const user = requireUser(request);
      const input = parseInput(updateProfileSchema, request.body, 'Profile update failed');
      const current = await getOrCreateProfile(app.db, user);

      const [profile] = await app.db
        .update(userProfiles)
        .set({ ...input, updatedAt: new Date().toISOString() })
        .where(eq(userProfiles.id, current.id))
        .returning();

      return ok(serializeProfile(user, profile), 'Profile updated');
    },
  });

  app.get('/health-profile', protectedRoute, async (request) => {
    const user = requireUser(request);
    const profile = await getOrCreateProfile(app.db, user);
    return ok(serializeHealthProfile(profile));
  });

  app.put('/health-profile', protectedRoute, async (request) => {
    const user = requireUser(request);
    const input = parseInput(healthProfileSchema, request.body, 'Health profile update failed');
    const current = await getOrCreateProfile(app.db, user);

    const [profile] = await app.db
      .update(userProfiles)
      .set({ ...input, updatedAt: new Date().toISOString() })
      .where(eq(userProfiles.id, current.id))
      .returning();

    return ok(serializeHealthProfile(profile), 'Health profile updated');
  });
}
