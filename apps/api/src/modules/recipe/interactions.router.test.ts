import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { and, eq } from 'drizzle-orm';
import { recipes, userBehaviors } from '../../db/schema';
import { body, createTestApp, registerAndLogin, seedRecipe, type TestContext, type TestUser } from '../../test/helpers';

describe('recipe interaction routes', () => {
  let ctx: TestContext;
  let alice: TestUser;
  let bob: TestUser;

  beforeEach(async () => {
    ctx = await createTestApp();
    alice = await registerAndLogin(ctx.app, 'alice');
    bob = await registerAndLogin(ctx.app, 'bob');
  });

  afterEach(async () => {
    await ctx.close();
  });

  it('toggles a like and keeps the counter in step', async () => {
    const recipe = await seedRecipe(ctx.db, alice.id, { name: 'Toast' });

    const like = await ctx.app.inject({ method: 'POST', url: `/api/recipe/${recipe.id}/like`, headers: bob.headers });
    const secondLike = await ctx.app.inject({
      method: 'POST',
      url: `/api/recipe/${recipe.id}/like`,
      headers: alice.headers,
    });
    const unlike = await ctx.app.inject({ method: 'POST', url: `/api/recipe/${recipe.id}/like`, headers: bob.headers });

    expect(body(like)).toEqual({ code: 200, message: 'Liked', data: { liked: true, likes: 1 } });
    expect(body(secondLike).data).toEqual({ liked: true, likes: 2 });
    expect(body(unlike)).toEqual({ code: 200, message: 'Like removed', data: { liked: false, likes: 1 } });

    const detail = await ctx.app.inject({ method: 'GET', url: `/api/recipe/${recipe.id}`, headers: alice.headers });
    expect(body<{ isLiked: boolean; isFavorited: boolean }>(detail).data).toMatchObject({
      isLiked: true,
      isFavorited: false,
    });
  });

  it('keeps rows and counter in step under concurrent likes', async () => {
    const recipe = await seedRecipe(ctx.db, alice.id, { name: 'Toast' });
    const like = () =>
      ctx.app.inject({ method: 'POST', url: `/api/recipe/${recipe.id}/like`, headers: bob.headers });

    const responses = await Promise.all([like(), like()]);

    expect(responses.map((response) => response.statusCode)).toEqual([200, 200]);
    const results = responses
      .map((response) => body<{ liked: boolean; likes: number }>(response).data)
      .sort((a, b) => Number(b.liked) - Number(a.liked));
    expect(results).toEqual([
      { liked: true, likes: 1 },
      { liked: false, likes: 0 },
    ]);
    const rows = await ctx.db
      .select()
      .from(userBehaviors)
      .where(and(eq(userBehaviors.recipeId, recipe.id), eq(userBehaviors.behaviorType, 'like')));
    const [stored] = await ctx.db.select({ likes: recipes.likes }).from(recipes).where(eq(recipes.id, recipe.id));
    expect(rows).toHaveLength(0);
    expect(stored.likes).toBe(0);
  });

  it('does not let a counter drop below zero', async () => {
    const recipe = await seedRecipe(ctx.db, alice.id, { name: 'Toast' });
    await ctx.app.inject({ method: 'POST', url: `/api/recipe/${recipe.id}/like`, headers: bob.headers });
    // Counter out of step with the behaviour rows
    await ctx.db.update(recipes).set({ likes: 0 }).where(eq(recipes.id, recipe.id));

    const unlike = await ctx.app.inject({ method: 'POST', url: `/api/recipe/${recipe.id}/like`, headers: bob.headers });

    expect(body(unlike).data).toEqual({ liked: false, likes: 0 });
  });

  it('does not toggle on drafts', async () => {
    const draft = await seedRecipe(ctx.db, alice.id, { name: 'Draft', isPublished: false });

    const response = await ctx.app.inject({ method: 'POST', url: `/api/recipe/${draft.id}/favorite`, headers: alice.headers });

    expect(response.statusCode).toBe(404);
  });

  it('lists favourites newest first', async () => {
    const toast = await seedRecipe(ctx.db, alice.id, { name: 'Toast' });
    const soup = await seedRecipe(ctx.db, alice.id, { name: 'Soup' });
    await ctx.app.inject({ method: 'POST', url: `/api/recipe/${toast.id}/favorite`, headers: bob.headers });
    const favorite = await ctx.app.inject({ method: 'POST', url: `/api/recipe/${soup.id}/favorite`, headers: bob.headers });

    const response = await ctx.app.inject({ method: 'GET', url: '/api/recipe/favorites', headers: bob.headers });

    expect(body(favorite)).toEqual({
      code: 200,
      message: 'Added to favorites',
      data: { favorited: true, favorites: 1 },
    });
    const page = body<{ count: number; results: { name: string }[] }>(response).data;
    expect(page.count).toBe(2);
    expect(page.results.map((recipe) => recipe.name)).toEqual(['Soup', 'Toast']);
  });
});
