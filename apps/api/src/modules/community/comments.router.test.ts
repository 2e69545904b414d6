import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Comment } from '@smart-recipe/shared';
import {
  body,
  createTestApp,
  registerAndLogin,
  seedRecipe,
  type TestContext,
  type TestUser,
} from '../../test/helpers';

describe('comment routes', () => {
  let ctx: TestContext;
  let alice: TestUser;

  beforeEach(async () => {
    ctx = await createTestApp();
    alice = await registerAndLogin(ctx.app, 'alice');
  });

  afterEach(async () => {
    await ctx.close();
  });

  function comment(payload: Record<string, unknown>) {
    return ctx.app.inject({
      method: 'POST',
      url: '/api/community/comment/create',
      headers: alice.headers,
      payload,
    });
  }

  it('comments on a published recipe', async () => {
    const recipe = await seedRecipe(ctx.db, alice.id, { name: 'Dumplings' });

    const response = await comment({ targetType: 'recipe', targetId: recipe.id, content: 'Tasty' });

    expect(body(response).message).toBe('Comment posted');
    expect(body<Comment>(response).data).toMatchObject({
      user: { id: alice.id, username: 'alice' },
      targetType: 'recipe',
      targetId: recipe.id,
      content: 'Tasty',
      parentId: null,
      replies: [],
    });
  });

  it('returns top-level comments newest first with replies oldest first', async () => {
    const recipe = await seedRecipe(ctx.db, alice.id, { name: 'Dumplings' });
    const target = { targetType: 'recipe', targetId: recipe.id };
    const first = body<Comment>(await comment({ ...target, content: 'first' })).data;
    await comment({ ...target, content: 'second' });
    await comment({ ...target, content: 'reply a', parentId: first.id });
    await comment({ ...target, content: 'reply b', parentId: first.id });

    const response = await ctx.app.inject({
      method: 'GET',
      url: `/api/community/comment?targetType=recipe&targetId=${recipe.id}`,
    });
    const tree = body<Comment[]>(response).data;

    expect(tree.map((node) => node.content)).toEqual(['second', 'first']);
    expect(tree[1].replies.map((node) => node.content)).toEqual(['reply a', 'reply b']);
  });

  it('refuses drafts and unknown targets', async () => {
    const draft = await seedRecipe(ctx.db, alice.id, { name: 'Secret', isPublished: false });

    const onDraft = await comment({ targetType: 'recipe', targetId: draft.id, content: 'Hm' });
    const onNothing = await comment({ targetType: 'post', targetId: 'missing', content: 'Hm' });

    expect(onDraft.statusCode).toBe(404);
    expect(body(onDraft).message).toBe('Comment target not found');
    expect(onNothing.statusCode).toBe(404);
  });

  it('validates the body', async () => {
    const response = await comment({ targetType: 'video', targetId: 'x', content: '' });

    expect(response.statusCode).toBe(400);
    expect(body(response).message).toBe('Comment failed');
    expect(Object.keys(body<Record<string, string[]>>(response).data).sort()).toEqual(['content', 'targetType']);
  });

  describe('GET /api/community/comment', () => {
    it('requires both target parameters', async () => {
      const response = await ctx.app.inject({ method: 'GET', url: '/api/community/comment?targetType=recipe' });

      expect(response.statusCode).toBe(400);
      expect(body(response)).toEqual({ code: 400, message: 'Missing parameters', data: null });
    });

    it('returns nothing for an unknown target type', async () => {
      const response = await ctx.app.inject({
        method: 'GET',
        url: '/api/community/comment?targetType=video&targetId=abc',
      });

      expect(body(response)).toEqual({ code: 200, message: 'Success', data: [] });
    });
  });
});
