import fs from 'fs';
import os from 'os';
import path from 'path';
import type { LightMyRequestResponse } from 'fastify';
import { createIngredientSchema, type ApiEnvelope } from '@smart-recipe/shared';
import { buildApp, type App } from '../app';
import { loadConfig, type AppConfig } from '../config';
import { createDatabase, type DB } from '../db';
import { ingredients, recipes, recipeIngredients, type IngredientRow, type RecipeRow } from '../db/schema';
import type { IngredientRecognizer } from '../services/ingredient-recognition';

export const TEST_PASSWORD = 'test-pass-123';

export interface TestContext {
  app: App;
  db: DB;
  config: AppConfig;
  close: () => Promise<void>;
}

/**
 * Builds the app over a fresh in-memory database, with uploads going to a
 * temporary directory that close() removes.
 */
export async function createTestApp(
  options: { recognizer?: IngredientRecognizer; config?: Partial<AppConfig> } = {}
): Promise<TestContext> {
  const mediaRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'smart-recipe-test-'));
  const config: AppConfig = {
    ...loadConfig({
      NODE_ENV: 'test',
      DATABASE_URL: ':memory:',
      JWT_SECRET: 'test-secret',
      MEDIA_ROOT: mediaRoot,
    }),
    ...options.config,
  };

  const { sqlite, db } = createDatabase(':memory:');
  const app = await buildApp({ config, db, recognizer: options.recognizer });
  await app.ready();

  return {
    app,
    db,
    config,
    close: async () => {
      await app.close();
      sqlite.close();
      fs.rmSync(mediaRoot, { recursive: true, force: true });
    },
  };
}

// Parses an injected response's envelope
export function body<T = unknown>(response: LightMyRequestResponse): ApiEnvelope<T> {
  return response.json<ApiEnvelope<T>>();
}

export function bearer(token: string) {
  return { authorization: `Bearer ${token}` };
}

export interface TestUser {
  id: string;
  username: string;
  access: string;
  refresh: string;
  headers: { authorization: string };
}

export async function registerAndLogin(app: App, username: string, password = TEST_PASSWORD): Promise<TestUser> {
  const registered = await app.inject({
    method: 'POST',
    url: '/api/user/register',
    payload: { username, password, passwordConfirm: password },
  });
  if (registered.statusCode !== 200) {
    throw new Error(`register ${username} failed: ${registered.body}`);
  }

  const login = await app.inject({
    method: 'POST',
    url: '/api/user/login',
    payload: { username, password },
  });
  const data = body<{ access: string; refresh: string; user: { id: string } }>(login).data;
  return {
    id: data.user.id,
    username,
    access: data.access,
    refresh: data.refresh,
    headers: bearer(data.access),
  };
}

export async function seedIngredient(db: DB, input: Record<string, unknown>): Promise<IngredientRow> {
  const values = createIngredientSchema.parse(input);
  const [row] = await db
    .insert(ingredients)
    .values({ ...values, imageUrl: values.imageUrl ?? null, description: values.description ?? null })
    .returning();
  return row;
}

export async function seedRecipe(
  db: DB,
  authorId: string,
  fields: Partial<Omit<RecipeRow, 'id' | 'authorId'>> & { name: string },
  items: { ingredientId: string; quantity: number; unit?: string; isMain?: boolean }[] = []
): Promise<RecipeRow> {
  const [recipe] = await db
    .insert(recipes)
    .values({ ...fields, authorId })
    .returning();

  if (items.length > 0) {
    await db.insert(recipeIngredients).values(
      items.map((item, index) => ({
        recipeId: recipe.id,
        ingredientId: item.ingredientId,
        quantity: item.quantity,
        unit: item.unit ?? 'g',
        isMain: item.isMain ?? false,
        sortOrder: index,
      }))
    );
  }
  return recipe;
}
