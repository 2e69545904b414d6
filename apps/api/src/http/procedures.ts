import type { FastifyRequest, RouteShorthandOptions } from 'fastify';
import { eq } from 'drizzle-orm';
import { users, type User } from '../db/schema';
import { ApiError } from './errors';
import type { AuthFailure } from './context';

const BEARER_PREFIX = 'Bearer ';

async function resolveUser(request: FastifyRequest): Promise<User | AuthFailure | null> {
  const header = request.headers.authorization;
  if (!header || !header.startsWith(BEARER_PREFIX)) return null;

  const verified = await request.server.tokens.verify(header.slice(BEARER_PREFIX.length).trim(), 'access');
  if (!verified) return 'invalid_token';

  const user = await request.server.db.query.users.findFirst({
    where: eq(users.id, verified.userId),
  });
  if (!user || !user.isActive) return 'inactive_user';

  return user;
}

// onRequest hook: attaches the caller to every request, never rejects
export async function authenticate(request: FastifyRequest) {
  const resolved = await resolveUser(request);
  if (resolved === null) return;

  if (typeof resolved === 'string') {
    request.authFailure = resolved;
  } else {
    request.user = resolved;
  }
}

function unauthorized(failure: AuthFailure | null): ApiError {
  switch (failure) {
    case 'invalid_token':
      return new ApiError({ code: 'UNAUTHORIZED', message: 'Invalid or expired token' });
    case 'inactive_user':
      return new ApiError({ code: 'UNAUTHORIZED', message: 'User is inactive or does not exist' });
    default:
      return new ApiError({
        code: 'UNAUTHORIZED',
        message: 'Authentication credentials were not provided.',
      });
  }
}

export function requireUser(request: FastifyRequest): User {
  if (!request.user) {
    throw unauthorized(request.authFailure);
  }
  return request.user;
}

async function isAuthenticated(request: FastifyRequest) {
  requireUser(request);
}

async function isAdmin(request: FastifyRequest) {
  const user = requireUser(request);
  if (user.role !== 'admin') {
    throw new ApiError({ code: 'FORBIDDEN', message: 'Admin access required' });
  }
}

// Route option presets
export const publicRoute: RouteShorthandOptions = {};
export const protectedRoute: RouteShorthandOptions = { preHandler: isAuthenticated };
export const adminRoute: RouteShorthandOptions = { preHandler: [isAuthenticated, isAdmin] };
