import type { FastifyInstance } from 'fastify';
import { commentsRoutes } from './comments.router';
import { postsRoutes } from './posts.router';

export async function communityRouter(app: FastifyInstance) {
  await app.register(postsRoutes);
  await app.register(commentsRoutes);
}
