import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createIngredientSchema } from '@smart-recipe/shared';
import { loadConfig } from '../config';
import { createDatabase } from './index';
import { ingredients } from './schema';

// ESM-compatible __dirname
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const catalogPath = path.resolve(__dirname, '../../data/ingredients.json');

async function seed() {
  const config = loadConfig();
  const { sqlite, db } = createDatabase(config.databaseUrl);

  console.log(`[Seed] Reading ${catalogPath}`);
  const raw: unknown = JSON.parse(fs.readFileSync(catalogPath, 'utf-8'));
  const catalog = z.array(createIngredientSchema).parse(raw);

  const inserted = await db
    .insert(ingredients)
    .values(
      catalog.map((item) => ({
        ...item,
        imageUrl: item.imageUrl ?? null,
        description: item.description ?? null,
      }))
    )
    .onConflictDoNothing({ target: ingredients.name })
    .returning({ id: ingredients.id });

  console.log(`[Seed] Ingredients: ${inserted.length} added, ${catalog.length - inserted.length} already present`);
  sqlite.close();
}

seed().catch((error) => {
  console.error('[Seed] Seeding failed:', error);
  process.exit(1);
});
