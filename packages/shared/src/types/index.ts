import type { IngredientCategoryId } from '../constants/categories';
import type { RecipeDifficulty, RecipeCategory, CuisineType, MealType } from '../constants/recipes';
import type { Gender, HealthGoal, AgeGroup } from '../constants/users';
import type { Macros, NutritionFacts } from '../utils';
import type { CommentTargetType } from '../schemas';

// ============================================
// Envelope
// ============================================

export interface ApiEnvelope<T> {
  code: number;
  message: string;
  data: T;
}

export type FieldErrors = Record<string, string[]>;

export interface Paginated<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

export interface SearchPage<T> {
  keyword: string;
  count: number;
  results: T[];
}

// ============================================
// Users
// ============================================

export interface UserSummary {
  id: string;
  username: string;
  nickname: string;
}

export interface AccountInfo {
  id: string;
  username: string;
  email: string | null;
  dateJoined: string;
}

export interface UserProfile {
  id: string;
  user: AccountInfo;
  nickname: string | null;
  avatar: string | null;
  gender: Gender | null;
  age: number | null;
  phone: string | null;
  dietaryPreference: string[];
  allergies: string[];
  healthGoal: HealthGoal | null;
  dailyCaloriesTarget: number | null;
  ageGroup: AgeGroup;
  createdAt: string;
  updatedAt: string;
}

export interface HealthProfile {
  gender: Gender | null;
  age: number | null;
  dietaryPreference: string[];
  allergies: string[];
  healthGoal: HealthGoal | null;
  dailyCaloriesTarget: number | null;
  ageGroup: AgeGroup;
}

export interface LoginResult {
  access: string;
  refresh: string;
  user: { id: string; username: string; email: string | null };
  profile: UserProfile;
}

export interface PublicUserProfile {
  id: string;
  username: string;
  nickname: string;
  avatar: string | null;
  dateJoined: string;
  recipeCount: number;
  followerCount: number;
  followingCount: number;
  isFollowing: boolean;
}

export interface FollowingEntry {
  id: string;
  username: string;
  nickname: string;
  avatar: string | null;
  followedAt: string;
}

// ============================================
// Ingredients
// ============================================

export interface IngredientListItem {
  id: string;
  name: string;
  category: IngredientCategoryId;
  categoryDisplay: string;
  imageUrl: string | null;
  calories: number;
  isSeasonalNow: boolean;
}

export interface IngredientDetail extends IngredientListItem {
  protein: number;
  fat: number;
  carbohydrate: number;
  fiber: number;
  vitamin: Record<string, number>;
  description: string | null;
  season: number[];
  nutritionSummary: NutritionFacts & { vitamin: Record<string, number> };
  createdAt: string;
}

export interface RecognizedIngredient {
  name: string;
  confidence: number;
  ingredientId: string | null;
}

export interface RecognitionResult {
  ingredients: RecognizedIngredient[];
  totalItems: number;
  processingTime: number;
}

export interface RecognitionRecord {
  id: string;
  user: { id: string; username: string };
  imageUrl: string;
  recognitionResult: RecognitionResult;
  recognizedIngredients: string[];
  topIngredient: RecognizedIngredient | null;
  createdAt: string;
}

// ============================================
// Recipes
// ============================================

export interface RecipeListItem {
  id: string;
  name: string;
  coverImage: string | null;
  author: UserSummary;
  difficulty: RecipeDifficulty;
  difficultyDisplay: string;
  cookingTime: number;
  servings: number;
  category: RecipeCategory;
  categoryDisplay: string;
  cuisineType: CuisineType;
  cuisineTypeDisplay: string;
  tags: string[];
  totalCalories: number;
  views: number;
  likes: number;
  favorites: number;
  createdAt: string;
}

export interface RecipeIngredientDetail {
  id: string;
  ingredient: IngredientListItem;
  quantity: number;
  unit: string;
  isMain: boolean;
}

export interface CookingStep {
  id: string;
  stepNumber: number;
  description: string;
  imageUrl: string | null;
  duration: number;
  tips: string | null;
}

export interface RecipeDetail extends RecipeListItem {
  description: string | null;
  isPublished: boolean;
  ingredients: RecipeIngredientDetail[];
  steps: CookingStep[];
  updatedAt: string;
  isLiked: boolean;
  isFavorited: boolean;
}

// ============================================
// Shopping
// ============================================

export interface ShoppingItem {
  id: string;
  ingredient: IngredientListItem;
  quantity: number;
  unit: string;
  isPurchased: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface GenerateShoppingListResult {
  addedCount: number;
  mergedCount: number;
  totalIngredients: number;
}

// ============================================
// Community
// ============================================

export interface FoodPost {
  id: string;
  user: UserSummary;
  recipe: RecipeListItem | null;
  content: string;
  images: string[];
  likes: number;
  commentsCount: number;
  isLiked: boolean;
  createdAt: string;
}

export interface Comment {
  id: string;
  user: { id: string; username: string };
  targetId: string;
  targetType: CommentTargetType;
  content: string;
  parentId: string | null;
  replies: Comment[];
  createdAt: string;
}

// ============================================
// Nutrition
// ============================================

export interface DietaryLog extends Macros {
  id: string;
  recipeId: string | null;
  customName: string;
  foodName: string;
  mealType: MealType;
  mealTypeDisplay: string;
  date: string;
  createdAt: string;
}

export interface DiaryDay {
  date: string;
  logs: DietaryLog[];
  mealGroups: Partial<Record<MealType, DietaryLog[]>>;
  summary: Macros;
  dailyTarget: number | null;
}

export interface DailyNutrition extends Macros {
  date: string;
}

export interface NutritionReport {
  period: 'week' | 'month';
  startDate: string;
  endDate: string;
  daily: DailyNutrition[];
  average: Macros;
}

export interface NutritionAdvice {
  daysLogged: number;
  avgCalories: number;
  targetCalories: number | null;
  healthGoal: HealthGoal | null;
  advice: string[];
}

export interface RecipeNutrition {
  recipeId: string;
  recipeName: string;
  servings: number;
  totalCalories: number;
  perServingCalories: number;
  ingredients: (Macros & { name: string; quantity: number; unit: string })[];
}
