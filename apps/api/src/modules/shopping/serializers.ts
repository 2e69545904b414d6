import type { ShoppingItem } from '@smart-recipe/shared';
import type { IngredientRow, ShoppingItemRow } from '../../db/schema';
import { serializeIngredientListItem } from '../ingredient/serializers';

export function serializeShoppingItem(row: ShoppingItemRow & { ingredient: IngredientRow }): ShoppingItem {
  return {
    id: row.id,
    ingredient: serializeIngredientListItem(row.ingredient),
    quantity: row.quantity,
    unit: row.unit,
    isPurchased: row.isPurchased,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}
