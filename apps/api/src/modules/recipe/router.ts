import type { FastifyInstance } from 'fastify';
import { interactionRoutes } from './interactions.router';
import { recipeRoutes } from './recipes.router';

export async function recipeRouter(app: FastifyInstance) {
  await app.register(recipeRoutes);
  await app.register(interactionRoutes);
}
