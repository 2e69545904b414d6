import type { FastifyInstance } from 'fastify';
import { count, desc, eq, inArray } from 'drizzle-orm';
import {
  recognizeIngredientSchema,
  type RecognitionResult,
  type RecognizedIngredient,
} from '@smart-recipe/shared';
import { ingredientRecognitions, ingredients } from '../../db/schema';
import { rowid } from '../../db/sql';
import { paginate } from '../../http/pagination';
import { protectedRoute, requireUser } from '../../http/procedures';
import { ok } from '../../http/response';
import { parseInput } from '../../http/validate';
import { serializeRecognition } from './serializers';

export async function recognitionRoutes(app: FastifyInstance) {
  // Run the recognizer on an image URL and keep the result in the caller's history
  app.post('/recognize', protectedRoute, async (request) => {
    const user = requireUser(request);
    const input = parseInput(recognizeIngredientSchema, request.body, 'Invalid parameters');

    const output = await app.recognizer.recognize(input.imageUrl);
    const names = output.candidates.map((candidate) => candidate.name);
    const known =
      names.length > 0
        ? await app.db
            .select({ id: ingredients.id, name: ingredients.name })
            .from(ingredients)
            .where(inArray(ingredients.name, names))
        : [];
    const idByName = new Map(known.map((row) => [row.name, row.id]));

    const found: RecognizedIngredient[] = output.candidates.map((candidate) => ({
      name: candidate.name,
      confidence: candidate.confidence,
      ingredientId: idByName.get(candidate.name) ?? null,
    }));
    const result: RecognitionResult = {
      ingredients: found,
      totalItems: found.length,
      processingTime: output.processingTime,
    };

    const [recognition] = await app.db
      .insert(ingredientRecognitions)
      .values({ userId: user.id, imageUrl: input.imageUrl, result })
      .returning();

    return ok(
      { recognitionId: recognition.id, ingredients: result.ingredients, totalItems: result.totalItems },
      'Recognition complete'
    );
  });

  app.get('/history', protectedRoute, async (request) => {
    const user = requireUser(request);
    const where = eq(ingredientRecognitions.userId, user.id);
    const [{ total }] = await app.db
      .select({ total: count() })
      .from(ingredientRecognitions)
      .where(where);

    const page = await paginate(request, total, async (limit, offset) => {
      const rows = await app.db
        .select()
        .from(ingredientRecognitions)
        .where(where)
        .orderBy(desc(ingredientRecognitions.createdAt), desc(rowid(ingredientRecognitions)))
        .limit(limit)
        .offset(offset);
      return rows.map((row) => serializeRecognition(row, user));
    });

    return ok(page);
  });
}
