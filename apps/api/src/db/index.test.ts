import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createDatabase } from './index';
import { users, userBehaviors } from './schema';
import { seedRecipe } from '../test/helpers';

describe('createDatabase', () => {
  let handle: ReturnType<typeof createDatabase>;

  beforeEach(() => {
    handle = createDatabase(':memory:');
  });

  afterEach(() => {
    handle.sqlite.close();
  });

  it('applies the checked-in migrations', () => {
    const journal = handle.sqlite.prepare('select count(*) as total from __drizzle_migrations').get();
    const index = handle.sqlite
      .prepare("select name from sqlite_master where type = 'index' and name = 'user_behaviors_toggle_idx'")
      .get();

    expect(journal).toEqual({ total: 1 });
    expect(index).toEqual({ name: 'user_behaviors_toggle_idx' });
  });

  it('allows one like per user and recipe but repeated views', async () => {
    const [user] = await handle.db.insert(users).values({ username: 'alice', passwordHash: 'test-hash' }).returning();
    const recipe = await seedRecipe(handle.db, user.id, { name: 'Toast' });
    const behavior = (behaviorType: 'like' | 'view') =>
      handle.db.insert(userBehaviors).values({ userId: user.id, recipeId: recipe.id, behaviorType }).run();

    behavior('view');
    behavior('view');
    behavior('like');

    expect(() => behavior('like')).toThrow(/UNIQUE constraint failed/);
  });
});
