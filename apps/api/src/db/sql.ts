import { sql, type SQL } from 'drizzle-orm';
import type { SQLiteColumn, SQLiteTable } from 'drizzle-orm/sqlite-core';

// Insertion order; breaks ties between rows created in the same millisecond
export function rowid(table: SQLiteTable) {
  return sql`${table}.rowid`;
}

function likePattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
}

// Case-insensitive (ASCII) substring match
export function containsText(column: SQLiteColumn, term: string): SQL {
  return sql`${column} LIKE ${likePattern(term)} ESCAPE '\\'`;
}

// Matches when any element of a JSON text array contains the term
export function jsonArrayContainsText(column: SQLiteColumn, term: string): SQL {
  return sql`EXISTS (SELECT 1 FROM json_each(${column}) WHERE json_each.value LIKE ${likePattern(term)} ESCAPE '\\')`;
}

// Matches when a JSON array holds exactly this value
export function jsonArrayIncludes(column: SQLiteColumn, value: number | string): SQL {
  return sql`EXISTS (SELECT 1 FROM json_each(${column}) WHERE json_each.value = ${value})`;
}
