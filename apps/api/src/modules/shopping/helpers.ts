import { and, asc, eq } from 'drizzle-orm';
import { canCombineUnits, convertQuantity, roundTo } from '@smart-recipe/shared';
import type { Tx } from '../../db';
import { shoppingItems, type ShoppingItemRow } from '../../db/schema';
import { rowid } from '../../db/sql';
import { ApiError } from '../../http/errors';

export interface ListEntry {
  ingredientId: string;
  quantity: number;
  unit: string;
}

export interface AddResult {
  item: ShoppingItemRow;
  merged: boolean;
}

export function itemNotFound(): ApiError {
  return new ApiError({ code: 'NOT_FOUND', message: 'Shopping list item not found' });
}

/**
 * Adds an entry to the user's open list. An unpurchased row for the same
 * ingredient absorbs the amount when the units combine (an exact unit match
 * wins over a convertible one); otherwise a new row is inserted.
 */
export function addToList(tx: Tx, userId: string, entry: ListEntry): AddResult {
  const open = tx
    .select()
    .from(shoppingItems)
    .where(
      and(
        eq(shoppingItems.userId, userId),
        eq(shoppingItems.ingredientId, entry.ingredientId),
        eq(shoppingItems.isPurchased, false)
      )
    )
    .orderBy(asc(rowid(shoppingItems)))
    .all();

  const target =
    open.find((row) => row.unit.toLowerCase() === entry.unit.toLowerCase()) ??
    open.find((row) => canCombineUnits(entry.unit, row.unit));

  if (target) {
    const quantity = roundTo(target.quantity + convertQuantity(entry.quantity, entry.unit, target.unit), 4);
    const item = tx
      .update(shoppingItems)
      .set({ quantity, updatedAt: new Date().toISOString() })
      .where(eq(shoppingItems.id, target.id))
      .returning()
      .get();
    return { item, merged: true };
  }

  const item = tx
    .insert(shoppingItems)
    .values({
      userId,
      ingredientId: entry.ingredientId,
      quantity: roundTo(entry.quantity, 4),
      unit: entry.unit,
    })
    .returning()
    .get();
  return { item, merged: false };
}
