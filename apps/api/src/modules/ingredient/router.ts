import type { FastifyInstance } from 'fastify';
import { catalogRoutes } from './catalog.router';
import { recognitionRoutes } from './recognition.router';

export async function ingredientRouter(app: FastifyInstance) {
  await app.register(recognitionRoutes);
  await app.register(catalogRoutes);
}
