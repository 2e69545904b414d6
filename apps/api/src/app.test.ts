import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { body, createTestApp, type TestContext } from './test/helpers';

describe('app', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await ctx.close();
  });

  it('answers the health check', async () => {
    const response = await ctx.app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok', environment: 'test' });
  });

  it('lists the API sections at the root', async () => {
    const response = await ctx.app.inject({ method: 'GET', url: '/api/' });

    expect(body(response).message).toBe('Smart Recipe API');
    expect(body<Record<string, string>>(response).data).toMatchObject({
      recipe: '/api/recipe/',
      shoppingList: '/api/shopping-list/',
      tokenRefresh: '/api/token/refresh/',
    });
  });

  it('wraps unknown routes in the envelope', async () => {
    const response = await ctx.app.inject({ method: 'GET', url: '/api/nowhere' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ code: 404, message: 'Not found', data: null });
  });

  it('wraps malformed JSON bodies in the envelope', async () => {
    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/user/login',
      headers: { 'content-type': 'application/json' },
      payload: '{not json',
    });

    expect(response.statusCode).toBe(400);
    expect(body(response).code).toBe(400);
  });
});
