import type { FastifyInstance } from 'fastify';
import { itemsRoutes } from './items.router';

export async function shoppingRouter(app: FastifyInstance) {
  await app.register(itemsRoutes);
}
