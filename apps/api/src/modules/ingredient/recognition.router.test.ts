import { describe, it, expect, afterEach, vi } from 'vitest';
import type { IngredientRecognizer } from '../../services/ingredient-recognition';
import { body, createTestApp, registerAndLogin, seedIngredient, type TestContext } from '../../test/helpers';

describe('ingredient recognition routes', () => {
  let ctx: TestContext;

  afterEach(async () => {
    await ctx.close();
  });

  it('links recognised names to catalogue entries', async () => {
    ctx = await createTestApp();
    const alice = await registerAndLogin(ctx.app, 'alice');
    const tomato = await seedIngredient(ctx.db, { name: 'Tomato' });

    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/ingredient/recognize',
      headers: alice.headers,
      payload: { imageUrl: 'https://img.example.com/fridge.JPG' },
    });

    expect(response.statusCode).toBe(200);
    const envelope = body<{ recognitionId: string; ingredients: unknown[]; totalItems: number }>(response);
    expect(envelope.message).toBe('Recognition complete');
    expect(envelope.data.totalItems).toBe(2);
    expect(envelope.data.ingredients).toEqual([
      { name: 'Tomato', confidence: 0.95, ingredientId: tomato.id },
      { name: 'Egg', confidence: 0.88, ingredientId: null },
    ]);
  });

  it('rejects URLs that are not images', async () => {
    const recognize = vi.fn<IngredientRecognizer['recognize']>();
    ctx = await createTestApp({ recognizer: { recognize } });
    const alice = await registerAndLogin(ctx.app, 'alice');

    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/ingredient/recognize',
      headers: alice.headers,
      payload: { imageUrl: 'https://img.example.com/notes.txt' },
    });

    expect(response.statusCode).toBe(400);
    expect(body(response).message).toBe('Invalid parameters');
    expect(recognize).not.toHaveBeenCalled();
  });

  it('keeps a per-user history with the top match', async () => {
    const recognize = vi.fn<IngredientRecognizer['recognize']>().mockResolvedValue({
      candidates: [
        { name: 'Carrot', confidence: 0.6 },
        { name: 'Potato', confidence: 0.9 },
      ],
      processingTime: 0.5,
    });
    ctx = await createTestApp({ recognizer: { recognize } });
    const alice = await registerAndLogin(ctx.app, 'alice');
    const bob = await registerAndLogin(ctx.app, 'bob');

    await ctx.app.inject({
      method: 'POST',
      url: '/api/ingredient/recognize',
      headers: alice.headers,
      payload: { imageUrl: 'https://img.example.com/basket.png' },
    });

    const history = await ctx.app.inject({
      method: 'GET',
      url: '/api/ingredient/history',
      headers: alice.headers,
    });
    const bobHistory = await ctx.app.inject({
      method: 'GET',
      url: '/api/ingredient/history',
      headers: bob.headers,
    });

    expect(recognize).toHaveBeenCalledWith('https://img.example.com/basket.png');
    const page = body<{
      count: number;
      results: {
        user: { username: string };
        recognizedIngredients: string[];
        topIngredient: { name: string } | null;
        recognitionResult: { processingTime: number };
      }[];
    }>(history).data;
    expect(page.count).toBe(1);
    expect(page.results[0].user.username).toBe('alice');
    expect(page.results[0].recognizedIngredients).toEqual(['Carrot', 'Potato']);
    expect(page.results[0].topIngredient?.name).toBe('Potato');
    expect(page.results[0].recognitionResult.processingTime).toBe(0.5);
    expect(body<{ count: number }>(bobHistory).data.count).toBe(0);
  });
});
