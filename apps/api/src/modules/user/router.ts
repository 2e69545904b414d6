import type { FastifyInstance } from 'fastify';
import { authRoutes } from './auth.router';
import { profileRoutes } from './profile.router';
import { socialRoutes } from './social.router';

export async function userRouter(app: FastifyInstance) {
  await app.register(authRoutes);
  await app.register(profileRoutes);
  await app.register(socialRoutes);
}
