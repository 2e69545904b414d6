import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  body,
  createTestApp,
  registerAndLogin,
  seedIngredient,
  seedRecipe,
  type TestContext,
  type TestUser,
} from '../../test/helpers';

interface Page<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

interface Item {
  id: string;
  name: string;
  category: string;
  categoryDisplay: string;
  isSeasonalNow: boolean;
}

describe('ingredient catalogue routes', () => {
  let ctx: TestContext;
  let admin: TestUser;

  beforeEach(async () => {
    ctx = await createTestApp();
    admin = await registerAndLogin(ctx.app, 'admin');
  });

  afterEach(async () => {
    vi.useRealTimers();
    await ctx.close();
  });

  it('lists by category, then name', async () => {
    await seedIngredient(ctx.db, { name: 'Tomato', category: 'vegetable' });
    await seedIngredient(ctx.db, { name: 'Beef', category: 'meat' });
    await seedIngredient(ctx.db, { name: 'Cabbage', category: 'vegetable' });

    const response = await ctx.app.inject({ method: 'GET', url: '/api/ingredient/' });

    const page = body<Page<Item>>(response).data;
    expect(page.count).toBe(3);
    expect(page.results.map((item) => item.name)).toEqual(['Beef', 'Cabbage', 'Tomato']);
    expect(page.results[0].categoryDisplay).toBe('Meat');
  });

  it('filters by category and search term', async () => {
    await seedIngredient(ctx.db, { name: 'Tomato', category: 'vegetable', description: 'Red and juicy' });
    await seedIngredient(ctx.db, { name: 'Cherry', category: 'fruit', description: 'Small and red' });

    const byCategory = await ctx.app.inject({ method: 'GET', url: '/api/ingredient?category=fruit' });
    const bySearch = await ctx.app.inject({ method: 'GET', url: '/api/ingredient?search=red' });
    const unknownCategory = await ctx.app.inject({ method: 'GET', url: '/api/ingredient?category=rocks' });

    expect(body<Page<Item>>(byCategory).data.results.map((item) => item.name)).toEqual(['Cherry']);
    expect(body<Page<Item>>(bySearch).data.count).toBe(2);
    expect(body<Page<Item>>(unknownCategory).data.count).toBe(0);
  });

  it('answers 404 for a page past the end', async () => {
    await seedIngredient(ctx.db, { name: 'Tomato' });

    const response = await ctx.app.inject({ method: 'GET', url: '/api/ingredient?page=2' });

    expect(response.statusCode).toBe(404);
    expect(body(response)).toEqual({ code: 404, message: 'Invalid page.', data: null });
  });

  it('requires a keyword to search', async () => {
    const response = await ctx.app.inject({ method: 'GET', url: '/api/ingredient/search?q=%20' });

    expect(response.statusCode).toBe(400);
    expect(body(response).message).toBe('Please enter a search keyword');
  });

  it('escapes LIKE wildcards in the search keyword', async () => {
    await seedIngredient(ctx.db, { name: 'Salt' });
    await seedIngredient(ctx.db, { name: '100% Juice' });

    const response = await ctx.app.inject({ method: 'GET', url: '/api/ingredient/search?q=%25' });

    const data = body<{ keyword: string; count: number; results: Item[] }>(response).data;
    expect(data.keyword).toBe('%');
    expect(data.results.map((item) => item.name)).toEqual(['100% Juice']);
  });

  it('returns what is in season for a month', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-07-15T12:00:00Z'));
    await seedIngredient(ctx.db, { name: 'Watermelon', category: 'fruit', season: [6, 7, 8] });
    await seedIngredient(ctx.db, { name: 'Chestnut', category: 'nuts', season: [10, 11] });

    const current = await ctx.app.inject({ method: 'GET', url: '/api/ingredient/seasonal' });
    const october = await ctx.app.inject({ method: 'GET', url: '/api/ingredient/seasonal?month=10' });

    const currentData = body<{ month: number; results: Item[] }>(current).data;
    expect(currentData.month).toBe(7);
    expect(currentData.results.map((item) => item.name)).toEqual(['Watermelon']);
    expect(currentData.results[0].isSeasonalNow).toBe(true);

    const octoberData = body<{ month: number; results: Item[] }>(october).data;
    expect(octoberData.results.map((item) => item.name)).toEqual(['Chestnut']);
    expect(octoberData.results[0].isSeasonalNow).toBe(false);
  });

  it('rejects a month outside 1-12', async () => {
    const response = await ctx.app.inject({ method: 'GET', url: '/api/ingredient/seasonal?month=13' });
    const garbage = await ctx.app.inject({ method: 'GET', url: '/api/ingredient/seasonal?month=june' });

    expect(body(response).message).toBe('Month must be between 1 and 12');
    expect(body(garbage).message).toBe('Invalid month format');
  });

  it('scales nutrition facts to a gram quantity', async () => {
    const rice = await seedIngredient(ctx.db, {
      name: 'Rice',
      category: 'grain',
      calories: 130,
      protein: 2.7,
      fat: 0.3,
      carbohydrate: 28,
      fiber: 0.4,
    });

    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/ingredient/nutrition-calculate',
      payload: { ingredientId: rice.id, quantityGrams: 250 },
    });

    expect(body(response)).toEqual({
      code: 200,
      message: 'Calculation complete',
      data: {
        ingredient: { id: rice.id, name: 'Rice' },
        quantityGrams: 250,
        nutrition: { calories: 325, protein: 6.75, fat: 0.75, carbohydrate: 70, fiber: 1 },
      },
    });
  });

  it('recommends published recipes that use the named ingredients', async () => {
    const egg = await seedIngredient(ctx.db, { name: 'Egg', category: 'egg' });
    const leek = await seedIngredient(ctx.db, { name: 'Leek' });
    await seedRecipe(ctx.db, admin.id, { name: 'Omelette', views: 5 }, [{ ingredientId: egg.id, quantity: 100 }]);
    await seedRecipe(ctx.db, admin.id, { name: 'Egg fried rice', views: 9 }, [{ ingredientId: egg.id, quantity: 50 }]);
    await seedRecipe(ctx.db, admin.id, { name: 'Secret eggs', isPublished: false }, [
      { ingredientId: egg.id, quantity: 50 },
    ]);
    await seedRecipe(ctx.db, admin.id, { name: 'Leek soup' }, [{ ingredientId: leek.id, quantity: 200 }]);

    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/ingredient/recommend',
      payload: { ingredients: ['Egg'] },
    });
    const empty = await ctx.app.inject({
      method: 'POST',
      url: '/api/ingredient/recommend',
      payload: { ingredients: [] },
    });

    expect(body<{ name: string }[]>(response).data.map((recipe) => recipe.name)).toEqual([
      'Egg fried rice',
      'Omelette',
    ]);
    expect(empty.statusCode).toBe(400);
    expect(body(empty).message).toBe('Please provide a list of ingredients');
  });

  describe('admin writes', () => {
    it('rejects a duplicate name', async () => {
      await seedIngredient(ctx.db, { name: 'Tomato' });

      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/ingredient',
        headers: admin.headers,
        payload: { name: 'Tomato' },
      });

      expect(response.statusCode).toBe(400);
      expect(body(response).data).toEqual({ name: ['An ingredient with that name already exists.'] });
    });

    it('updates and deletes an ingredient', async () => {
      const tomato = await seedIngredient(ctx.db, { name: 'Tomato', calories: 18 });

      const update = await ctx.app.inject({
        method: 'PATCH',
        url: `/api/ingredient/${tomato.id}`,
        headers: admin.headers,
        payload: { calories: 20 },
      });
      expect(body<{ name: string; calories: number }>(update).data).toMatchObject({ name: 'Tomato', calories: 20 });

      const remove = await ctx.app.inject({
        method: 'DELETE',
        url: `/api/ingredient/${tomato.id}`,
        headers: admin.headers,
      });
      expect(body(remove)).toEqual({ code: 200, message: 'Ingredient deleted', data: null });

      const detail = await ctx.app.inject({ method: 'GET', url: `/api/ingredient/${tomato.id}` });
      expect(detail.statusCode).toBe(404);
      expect(body(detail).message).toBe('Ingredient not found');
    });
  });
});
