/**
 * Recipe Store Types
 *
 * Entities, inputs and results shared by the recipe stores
 */

import type { Role } from '../validation/validator.js';

export type { Role } from '../validation/validator.js';

// =============================================================================
// Entities
// =============================================================================

export type RecipeStatus = 'active' | 'deleted';

export type RecipeEventType = 'view' | 'edit' | 'delete' | 'create';

/** User account without its password digest */
export interface User {
  id: number;
  username: string;
  role: Role;
  createdAt: number;
  lastLogin: number | null;
  /** Number of the user's active recipes */
  recipeCount: number;
}

export interface Category {
  id: number;
  name: string;
  /** Number of active recipes linked to this category */
  recipeCount: number;
}

export interface CategoryRef {
  id: number;
  name: string;
}

export interface Recipe {
  id: number;
  title: string;
  instructions: string;
  /** Minutes */
  prepTime: number;
  views: number;
  createdBy: string;
  createdAt: number;
  updatedAt: number | null;
  status: RecipeStatus;
}

export interface Ingredient {
  id: number;
  recipeId: number;
  name: string;
  quantity: string;
}

export interface RecipeDetail {
  recipe: Recipe;
  categories: CategoryRef[];
  /** In insertion order */
  ingredients: Ingredient[];
}

export interface RecipeEvent {
  id: number;
  recipeId: number | null;
  username: string;
  type: RecipeEventType;
  time: number;
}

export interface UserRecipeView {
  username: string;
  recipeId: number;
  viewCount: number;
  lastViewed: number;
}

// =============================================================================
// Inputs
// =============================================================================

export interface IngredientInput {
  name: string;
  quantity?: string | null;
}

/** Category ids arrive from form widgets as numbers or text */
export type CategoryIdInput = number | string;

export interface RecipeCreateInput {
  title: string;
  instructions: string;
  prepTime: number | string;
  /** Username of the author */
  author: string;
  categoryIds?: CategoryIdInput[];
  ingredients?: IngredientInput[];
}

export interface RecipeUpdateInput {
  title: string;
  instructions: string;
  prepTime: number | string;
  /** When given (even empty) replaces all category links */
  categoryIds?: CategoryIdInput[];
  /** When given replaces all ingredients */
  ingredients?: IngredientInput[];
}

export interface EventQueryOptions {
  recipeId?: number;
  username?: string;
  type?: RecipeEventType;
  limit?: number;
}

// =============================================================================
// Results
// =============================================================================

export type SkippedCategoryReason = 'invalid' | 'not_found' | 'duplicate' | 'storage_error';

export interface SkippedCategory {
  categoryId: CategoryIdInput;
  reason: SkippedCategoryReason;
}

export interface SkippedIngredient {
  name: string;
  quantity: string;
  reason: string;
}

/** Items dropped by the continue-on-error loops of create and update */
export interface SkippedItems {
  skippedCategories: SkippedCategory[];
  skippedIngredients: SkippedIngredient[];
}

export interface RecipeCreateResult extends SkippedItems {
  id: number;
}

export type RecipeUpdateResult =
  | ({ updated: true } & SkippedItems)
  | { updated: false };

export interface TopUser {
  username: string;
  recipeCount: number;
  totalViews: number;
}

export interface SystemStats {
  totalUsers: number;
  totalRecipes: number;
  totalCategories: number;
  totalViews: number;
  /** Events in the trailing activity window */
  recentActivity: number;
  /** Active recipes created in the trailing activity window */
  recentRecipes: number;
  topUsers: TopUser[];
}

export interface UserRecipes {
  username: string;
  recipes: Recipe[];
  totalViews: number;
}

/** Milliseconds since the Unix epoch */
export type Clock = () => number;
