import {
  CUISINE_TYPES,
  RECIPE_CATEGORIES,
  RECIPE_DIFFICULTIES,
  labelFor,
  type CookingStep,
  type RecipeDetail,
  type RecipeListItem,
} from '@smart-recipe/shared';
import type { CookingStepRow, IngredientRow, RecipeIngredientRow, RecipeRow } from '../../db/schema';
import { serializeIngredientListItem } from '../ingredient/serializers';

export interface RecipeAuthor {
  id: string;
  username: string;
  nickname: string | null;
}

export interface RecipeListRow {
  recipe: RecipeRow;
  author: RecipeAuthor;
}

export interface RecipeDetailParts extends RecipeListRow {
  ingredients: { link: RecipeIngredientRow; ingredient: IngredientRow }[];
  steps: CookingStepRow[];
  isLiked: boolean;
  isFavorited: boolean;
}

export function serializeRecipeListItem({ recipe, author }: RecipeListRow): RecipeListItem {
  return {
    id: recipe.id,
    name: recipe.name,
    coverImage: recipe.coverImage,
    author: {
      id: author.id,
      username: author.username,
      nickname: author.nickname || author.username,
    },
    difficulty: recipe.difficulty,
    difficultyDisplay: labelFor(RECIPE_DIFFICULTIES, recipe.difficulty),
    cookingTime: recipe.cookingTime,
    servings: recipe.servings,
    category: recipe.category,
    categoryDisplay: labelFor(RECIPE_CATEGORIES, recipe.category),
    cuisineType: recipe.cuisineType,
    cuisineTypeDisplay: labelFor(CUISINE_TYPES, recipe.cuisineType),
    tags: recipe.tags,
    totalCalories: recipe.totalCalories,
    views: recipe.views,
    likes: recipe.likes,
    favorites: recipe.favorites,
    createdAt: recipe.createdAt,
  };
}

function serializeStep(step: CookingStepRow): CookingStep {
  return {
    id: step.id,
    stepNumber: step.stepNumber,
    description: step.description,
    imageUrl: step.imageUrl,
    duration: step.duration,
    tips: step.tips,
  };
}

export function serializeRecipeDetail(parts: RecipeDetailParts): RecipeDetail {
  const { recipe } = parts;
  return {
    ...serializeRecipeListItem(parts),
    description: recipe.description,
    isPublished: recipe.isPublished,
    ingredients: parts.ingredients.map(({ link, ingredient }) => ({
      id: link.id,
      ingredient: serializeIngredientListItem(ingredient),
      quantity: link.quantity,
      unit: link.unit,
      isMain: link.isMain,
    })),
    steps: parts.steps.map(serializeStep),
    updatedAt: recipe.updatedAt,
    isLiked: parts.isLiked,
    isFavorited: parts.isFavorited,
  };
}
