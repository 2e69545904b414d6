import type { FastifyInstance, FastifyRequest } from 'fastify';
import { count, eq } from 'drizzle-orm';
import {
  changePasswordSchema,
  loginSchema,
  refreshTokenSchema,
  registerSchema,
  type LoginResult,
} from '@smart-recipe/shared';
import { revokedTokens, userProfiles, users } from '../../db/schema';
import { ApiError } from '../../http/errors';
import { protectedRoute, publicRoute, requireUser } from '../../http/procedures';
import { ok } from '../../http/response';
import { NON_FIELD_ERRORS, parseInput } from '../../http/validate';
import { hashPassword, verifyPassword } from '../../services/passwords';
import { getOrCreateProfile } from './helpers';
import { serializeProfile } from './serializers';

function loginFailed(reason: string): ApiError {
  return new ApiError({
    code: 'BAD_REQUEST',
    message: 'Login failed',
    data: { [NON_FIELD_ERRORS]: [reason] },
  });
}

// Exchanges a refresh token for a new access token; shared with /api/token/refresh
export async function refreshAccessToken(request: FastifyRequest) {
  const { db, tokens } = request.server;
  const input = parseInput(refreshTokenSchema, request.body, 'Refresh token is required');

  const verified = await tokens.verify(input.refresh, 'refresh');
  if (!verified || !verified.jti) {
    throw new ApiError({ code: 'UNAUTHORIZED', message: 'Invalid or expired token' });
  }

  const revoked = await db.query.revokedTokens.findFirst({
    where: eq(revokedTokens.jti, verified.jti),
  });
  if (revoked) {
    throw new ApiError({ code: 'UNAUTHORIZED', message: 'Token has been revoked' });
  }

  const user = await db.query.users.findFirst({ where: eq(users.id, verified.userId) });
  if (!user || !user.isActive) {
    throw new ApiError({ code: 'UNAUTHORIZED', message: 'User is inactive or does not exist' });
  }

  return ok({ access: await tokens.sign(user.id, 'access') }, 'Token refreshed');
}

export async function authRoutes(app: FastifyInstance) {
  // Create an account (the first account becomes admin)
  app.post('/register', publicRoute, async (request) => {
    const input = parseInput(registerSchema, request.body, 'Registration failed');

    const usernameTaken = () =>
      new ApiError({
        code: 'BAD_REQUEST',
        message: 'Registration failed',
        data: { username: ['A user with that username already exists.'] },
      });

    const taken = await app.db.query.users.findFirst({
      where: eq(users.username, input.username),
    });
    if (taken) throw usernameTaken();

    const passwordHash = await hashPassword(input.password);
    const nickname = input.nickname?.trim() || input.username;

    // Uniqueness and the first-admin count are decided in the same transaction as the insert
    const user = app.db.transaction((tx) => {
      const existing = tx
        .select({ id: users.id })
        .from(users)
        .where(eq(users.username, input.username))
        .get();
      if (existing) throw usernameTaken();

      const { total } = tx.select({ total: count() }).from(users).get() ?? { total: 0 };
      const created = tx
        .insert(users)
        .values({
          username: input.username,
          email: input.email || null,
          passwordHash,
          role: total === 0 ? 'admin' : 'member',
        })
        .returning()
        .get();

      tx.insert(userProfiles)
        .values({ userId: created.id, nickname, phone: input.phone || null })
        .run();

      return created;
    });

    request.log.info({ userId: user.id, role: user.role }, 'user registered');

    return ok({ userId: user.id, username: user.username, nickname }, 'Registration successful');
  });

  app.post('/login', publicRoute, async (request) => {
    const input = parseInput(loginSchema, request.body, 'Login failed');

    const user = await app.db.query.users.findFirst({
      where: eq(users.username, input.username),
    });
    if (!user || !(await verifyPassword(input.password, user.passwordHash))) {
      throw loginFailed('Invalid username or password');
    }
    if (!user.isActive) {
      throw loginFailed('This account has been disabled');
    }

    const pair = await app.tokens.issuePair(user.id);
    const profile = await getOrCreateProfile(app.db, user);

    const result: LoginResult = {
      ...pair,
      user: { id: user.id, username: user.username, email: user.email },
      profile: serializeProfile(user, profile),
    };
    return ok(result, 'Login successful');
  });

  // Revokes the given refresh token
  app.post('/logout', protectedRoute, async (request) => {
    const user = requireUser(request);
    const input = parseInput(refreshTokenSchema, request.body, 'Refresh token is required');

    const verified = await app.tokens.verify(input.refresh, 'refresh');
    if (!verified || !verified.jti || verified.userId !== user.id) {
      throw new ApiError({ code: 'BAD_REQUEST', message: 'Logout failed' });
    }

    await app.db
      .insert(revokedTokens)
      .values({
        jti: verified.jti,
        userId: user.id,
        expiresAt: verified.expiresAt.toISOString(),
      })
      .onConflictDoNothing();

    return ok(null, 'Logout successful');
  });

  app.post('/token/refresh', publicRoute, refreshAccessToken);

  // Issued tokens stay valid after a password change
  app.post('/change-password', protectedRoute, async (request) => {
    const user = requireUser(request);
    const input = parseInput(changePasswordSchema, request.body, 'Password change failed');

    if (!(await verifyPassword(input.oldPassword, user.passwordHash))) {
      throw new ApiError({
        code: 'BAD_REQUEST',
        message: 'Password change failed',
        data: { oldPassword: ['Current password is incorrect'] },
      });
    }

    await app.db
      .update(users)
      .set({
        passwordHash: await hashPassword(input.newPassword),
        updatedAt: new Date().toISOString(),
      })
      .where(eq(users.id, user.id));

    return ok(null, 'Password changed');
  });
}
