// Ingredient categories, in catalogue display order

export const INGREDIENT_CATEGORIES = [
  { id: 'vegetable', name: 'Vegetables', order: 1 },
  { id: 'meat', name: 'Meat', order: 2 },
  { id: 'seafood', name: 'Seafood', order: 3 },
  { id: 'fruit', name: 'Fruit', order: 4 },
  { id: 'grain', name: 'Grains', order: 5 },
  { id: 'dairy', name: 'Dairy', order: 6 },
  { id: 'egg', name: 'Eggs', order: 7 },
  { id: 'seasoning', name: 'Seasonings', order: 8 },
  { id: 'oil', name: 'Oils', order: 9 },
  { id: 'bean', name: 'Bean Products', order: 10 },
  { id: 'nuts', name: 'Nuts', order: 11 },
  { id: 'other', name: 'Other', order: 12 },
] as const;

export type IngredientCategoryId = (typeof INGREDIENT_CATEGORIES)[number]['id'];

// Default unit for recipe ingredients and shopping items
export const DEFAULT_UNIT = 'g';

// Units that can be converted into each other, keyed to their base unit factor
export const WEIGHT_UNITS: Record<string, number> = {
  g: 1,
  gram: 1,
  grams: 1,
  kg: 1000,
};

export const VOLUME_UNITS: Record<string, number> = {
  ml: 1,
  l: 1000,
  liter: 1000,
  litre: 1000,
};

// Image extensions accepted for ingredient recognition
export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.bmp', '.webp'] as const;
