import { text } from 'drizzle-orm/sqlite-core';
import { nanoid } from 'nanoid';

// ISO timestamps with millisecond precision so newest-first ordering is stable
const now = () => new Date().toISOString();

export const id = () =>
  text('id')
    .primaryKey()
    .$defaultFn(() => nanoid());

export const createdAt = () => text('created_at').notNull().$defaultFn(now);

export const updatedAt = () => text('updated_at').notNull().$defaultFn(now).$onUpdate(now);
