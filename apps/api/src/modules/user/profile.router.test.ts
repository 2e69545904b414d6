import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { eq } from 'drizzle-orm';
import { users } from '../../db/schema';
import { body, createTestApp, registerAndLogin, seedRecipe, type TestContext } from '../../test/helpers';

describe('profile routes', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await ctx.close();
  });

  it('applies a partial update on PATCH and PUT alike', async () => {
    const alice = await registerAndLogin(ctx.app, 'alice');

    await ctx.app.inject({
      method: 'PATCH',
      url: '/api/user/profile',
      headers: alice.headers,
      payload: { nickname: 'Chef Al', age: 30 },
    });
    const response = await ctx.app.inject({
      method: 'PUT',
      url: '/api/user/profile/',
      headers: alice.headers,
      payload: { allergies: ['Peanut'] },
    });

    expect(response.statusCode).toBe(200);
    const envelope = body<{ nickname: string; age: number; ageGroup: string; allergies: string[] }>(response);
    expect(envelope.message).toBe('Profile updated');
    expect(envelope.data).toMatchObject({
      nickname: 'Chef Al',
      age: 30,
      ageGroup: 'young_adult',
      allergies: ['Peanut'],
    });
  });

  it('validates the age range', async () => {
    const alice = await registerAndLogin(ctx.app, 'alice');

    const response = await ctx.app.inject({
      method: 'PATCH',
      url: '/api/user/profile',
      headers: alice.headers,
      payload: { age: 200 },
    });

    expect(response.statusCode).toBe(400);
    expect(body(response)).toEqual({
      code: 400,
      message: 'Profile update failed',
      data: { age: ['Age must be between 1 and 150'] },
    });
  });

  it('reads and writes the health profile', async () => {
    const alice = await registerAndLogin(ctx.app, 'alice');

    const update = await ctx.app.inject({
      method: 'PUT',
      url: '/api/user/health-profile',
      headers: alice.headers,
      payload: { healthGoal: 'lose_weight', dailyCaloriesTarget: 1800 },
    });
    expect(body(update).message).toBe('Health profile updated');

    const response = await ctx.app.inject({
      method: 'GET',
      url: '/api/user/health-profile',
      headers: alice.headers,
    });
    expect(body(response).data).toEqual({
      gender: null,
      age: null,
      dietaryPreference: [],
      allergies: [],
      healthGoal: 'lose_weight',
      dailyCaloriesTarget: 1800,
      ageGroup: 'unknown',
    });
  });
});

describe('social routes', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await ctx.close();
  });

  it('toggles following and reports the follower count', async () => {
    const alice = await registerAndLogin(ctx.app, 'alice');
    const bob = await registerAndLogin(ctx.app, 'bob');

    const follow = await ctx.app.inject({
      method: 'POST',
      url: `/api/user/${bob.id}/follow`,
      headers: alice.headers,
    });
    expect(body(follow)).toEqual({ code: 200, message: 'Followed', data: { following: true, followerCount: 1 } });

    const unfollow = await ctx.app.inject({
      method: 'POST',
      url: `/api/user/${bob.id}/follow`,
      headers: alice.headers,
    });
    expect(body(unfollow)).toEqual({
      code: 200,
      message: 'Unfollowed',
      data: { following: false, followerCount: 0 },
    });
  });

  it('does not let a user follow themselves', async () => {
    const alice = await registerAndLogin(ctx.app, 'alice');

    const response = await ctx.app.inject({
      method: 'POST',
      url: `/api/user/${alice.id}/follow`,
      headers: alice.headers,
    });

    expect(response.statusCode).toBe(400);
    expect(body(response).message).toBe('You cannot follow yourself');
  });

  it('shows a public profile with counts and the viewer relation', async () => {
    const alice = await registerAndLogin(ctx.app, 'alice');
    const bob = await registerAndLogin(ctx.app, 'bob');
    await seedRecipe(ctx.db, bob.id, { name: 'Toast' });
    await seedRecipe(ctx.db, bob.id, { name: 'Draft soup', isPublished: false });
    await ctx.app.inject({ method: 'POST', url: `/api/user/${bob.id}/follow`, headers: alice.headers });

    const asAlice = await ctx.app.inject({ method: 'GET', url: `/api/user/${bob.id}`, headers: alice.headers });
    const anonymous = await ctx.app.inject({ method: 'GET', url: `/api/user/${bob.id}` });

    expect(body(asAlice).data).toMatchObject({
      username: 'bob',
      nickname: 'bob',
      recipeCount: 1,
      followerCount: 1,
      followingCount: 0,
      isFollowing: true,
    });
    expect(body<{ isFollowing: boolean }>(anonymous).data.isFollowing).toBe(false);
  });

  it('answers 404 for an unknown user', async () => {
    const response = await ctx.app.inject({ method: 'GET', url: '/api/user/missing-user' });

    expect(response.statusCode).toBe(404);
    expect(body(response)).toEqual({ code: 404, message: 'User not found', data: null });
  });

  it('hides a disabled account', async () => {
    const alice = await registerAndLogin(ctx.app, 'alice');
    await ctx.db.update(users).set({ isActive: false }).where(eq(users.id, alice.id));

    const response = await ctx.app.inject({ method: 'GET', url: `/api/user/${alice.id}/` });

    expect(response.statusCode).toBe(404);
    expect(body(response)).toEqual({ code: 404, message: 'User not found', data: null });
  });

  it('pages the accounts the caller follows', async () => {
    const alice = await registerAndLogin(ctx.app, 'alice');
    const bob = await registerAndLogin(ctx.app, 'bob');
    const carol = await registerAndLogin(ctx.app, 'carol');
    await ctx.app.inject({ method: 'POST', url: `/api/user/${bob.id}/follow`, headers: alice.headers });
    await ctx.app.inject({ method: 'POST', url: `/api/user/${carol.id}/follow`, headers: alice.headers });

    const response = await ctx.app.inject({
      method: 'GET',
      url: '/api/user/following?pageSize=1',
      headers: alice.headers,
    });

    const envelope = body<{ count: number; next: string | null; previous: string | null; results: { username: string }[] }>(
      response
    );
    expect(envelope.data.count).toBe(2);
    expect(envelope.data.next).toBe('/api/user/following?pageSize=1&page=2');
    expect(envelope.data.previous).toBeNull();
    expect(envelope.data.results.map((entry) => entry.username)).toEqual(['carol']);
  });
});
