import type { FastifyInstance } from 'fastify';
import { diaryRoutes } from './diary.router';
import { reportsRoutes } from './reports.router';

export async function nutritionRouter(app: FastifyInstance) {
  await app.register(diaryRoutes);
  await app.register(reportsRoutes);
}
