/**
 * Recipe Store
 *
 * Create, update, soft-delete and read recipes. Each write runs in one
 * transaction covering the recipe row, its category links and ingredients,
 * the denormalized counters and the event log. Bad category ids and bad
 * ingredient rows are skipped one by one and reported back to the caller;
 * anything else rolls the whole operation back.
 */

import type { Logger } from 'pino';
import {
  insertedId,
  isStorageError,
  readOrDefault,
  type DatabaseAdapter,
  type Queryable,
} from '../../persistence/database.js';
import {
  ValidationError,
  isValidationError,
  validateIngredient,
  validateInstructions,
  validatePrepTime,
  validateRecipeTitle,
  validateUsername,
} from '../../validation/validator.js';
import { getLogger } from '../../observability/logger.js';
import type { CategoryStore } from './category-store.js';
import type { ActivityStore } from './activity-store.js';
import type {
  CategoryIdInput,
  CategoryRef,
  Clock,
  Ingredient,
  IngredientInput,
  Recipe,
  RecipeCreateInput,
  RecipeCreateResult,
  RecipeDetail,
  RecipeStatus,
  RecipeUpdateInput,
  RecipeUpdateResult,
  SkippedCategory,
  SkippedIngredient,
} from '../types.js';

// =============================================================================
// Database Row Types
// =============================================================================

export interface RecipeRow {
  id: number;
  title: string;
  instructions: string;
  prep_time: number;
  views: number;
  created_by: string;
  created_at: number;
  updated_at: number | null;
  status: RecipeStatus;
}

interface IngredientRow {
  id: number;
  recipe_id: number;
  ingredient: string;
  quantity: string;
}

export const RECIPE_COLUMNS =
  'id, title, instructions, prep_time, views, created_by, created_at, updated_at, status';

export function rowToRecipe(row: RecipeRow): Recipe {
  return {
    id: row.id,
    title: row.title,
    instructions: row.instructions,
    prepTime: row.prep_time,
    views: row.views,
    createdBy: row.created_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    status: row.status,
  };
}

function parseCategoryId(raw: CategoryIdInput): number | null {
  if (typeof raw === 'number') {
    return Number.isInteger(raw) && raw > 0 ? raw : null;
  }
  const text = raw.trim();
  return /^\d+$/.test(text) && Number.parseInt(text, 10) > 0 ? Number.parseInt(text, 10) : null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface RecipeStoreOptions {
  clock?: Clock;
  listLimit?: number;
  recentLimit?: number;
  mostViewedLimit?: number;
}

// =============================================================================
// Recipe Store
// =============================================================================

export class RecipeStore {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly listLimit: number;
  private readonly recentLimit: number;
  private readonly mostViewedLimit: number;

  constructor(
    private readonly db: DatabaseAdapter,
    private readonly categories: CategoryStore,
    private readonly activity: ActivityStore,
    options: RecipeStoreOptions = {}
  ) {
    this.clock = options.clock ?? Date.now;
    this.listLimit = options.listLimit ?? 1000;
    this.recentLimit = options.recentLimit ?? 10;
    this.mostViewedLimit = options.mostViewedLimit ?? 10;
    this.logger = getLogger().child({ module: 'RecipeStore' });
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  async create(input: RecipeCreateInput): Promise<RecipeCreateResult> {
    const title = validateRecipeTitle(input.title);
    const instructions = validateInstructions(input.instructions);
    const prepTime = validatePrepTime(input.prepTime);
    const author = validateUsername(input.author);

    const result = await this.db.transaction(async tx => {
      const now = this.clock();
      const inserted = await tx.query(
        `INSERT INTO recipes (title, instructions, prep_time, views, created_by, created_at, status)
         VALUES (?, ?, ?, 0, ?, ?, 'active')`,
        [title, instructions, prepTime, author, now]
      );
      const id = insertedId(inserted);

      const counted = await tx.query(
        'UPDATE users SET recipe_count = recipe_count + 1 WHERE username = ?',
        [author]
      );
      if (counted.rowCount === 0) {
        this.logger.warn({ recipeId: id, author }, 'Recipe author has no user account');
      }

      await this.activity.appendEvent(tx, id, author, 'create');

      const skippedCategories = await this.attachCategories(tx, id, input.categoryIds ?? []);
      const { stored, skipped: skippedIngredients } = await this.insertIngredients(tx, id, input.ingredients ?? []);
      if (stored === 0) {
        throw new ValidationError('INGREDIENTS_REQUIRED', 'At least one ingredient is required', 'ingredients');
      }

      return { id, skippedCategories, skippedIngredients };
    });

    this.logger.info({
      recipeId: result.id,
      author,
      skippedCategories: result.skippedCategories.length,
      skippedIngredients: result.skippedIngredients.length,
    }, 'Recipe created');
    return result;
  }

  /**
   * Rewrite a recipe's fields. Category links and ingredients are replaced
   * wholesale when given and left alone when omitted. The edit event is
   * attributed to actingUsername, or to the author when not given.
   */
  async update(id: number, input: RecipeUpdateInput, actingUsername?: string): Promise<RecipeUpdateResult> {
    const title = validateRecipeTitle(input.title);
    const instructions = validateInstructions(input.instructions);
    const prepTime = validatePrepTime(input.prepTime);
    const actor = actingUsername !== undefined ? validateUsername(actingUsername) : undefined;

    const result = await this.db.transaction<RecipeUpdateResult>(async tx => {
      const current = await this.findActive(tx, id);
      if (!current) {
        return { updated: false };
      }

      await tx.query(
        'UPDATE recipes SET title = ?, instructions = ?, prep_time = ?, updated_at = ? WHERE id = ?',
        [title, instructions, prepTime, this.clock(), id]
      );

      let skippedCategories: SkippedCategory[] = [];
      if (input.categoryIds !== undefined) {
        const previous = await this.linkedCategoryIds(tx, id);
        await tx.query('DELETE FROM recipe_categories WHERE recipe_id = ?', [id]);
        await this.categories.adjustRecipeCounts(tx, previous, -1);
        skippedCategories = await this.attachCategories(tx, id, input.categoryIds);
      }

      let skippedIngredients: SkippedIngredient[] = [];
      if (input.ingredients !== undefined) {
        await tx.query('DELETE FROM recipe_ingredients WHERE recipe_id = ?', [id]);
        const outcome = await this.insertIngredients(tx, id, input.ingredients);
        if (outcome.stored === 0) {
          throw new ValidationError('INGREDIENTS_REQUIRED', 'At least one ingredient is required', 'ingredients');
        }
        skippedIngredients = outcome.skipped;
      }

      await this.activity.appendEvent(tx, id, actor ?? current.created_by, 'edit');
      return { updated: true, skippedCategories, skippedIngredients };
    });

    if (result.updated) {
      this.logger.info({ recipeId: id, actor }, 'Recipe updated');
    } else {
      this.logger.warn({ recipeId: id }, 'Update ignored for missing or deleted recipe');
    }
    return result;
  }

  /**
   * Mark a recipe deleted. Returns false if it is missing or already deleted.
   */
  async softDelete(id: number, actingUsername: string): Promise<boolean> {
    const actor = validateUsername(actingUsername);
    const deleted = await this.db.transaction(tx => this.softDeleteIn(tx, id, actor));

    if (deleted) {
      this.logger.info({ recipeId: id, actor }, 'Recipe deleted');
    } else {
      this.logger.warn({ recipeId: id, actor }, 'Delete ignored for missing or already deleted recipe');
    }
    return deleted;
  }

  /**
   * Soft delete inside the caller's transaction. The author's count and the
   * linked categories' counts drop by one; ingredients and links stay.
   */
  async softDeleteIn(tx: Queryable, id: number, actor: string): Promise<boolean> {
    const current = await this.findActive(tx, id);
    if (!current) {
      return false;
    }

    const flipped = await tx.query(
      "UPDATE recipes SET status = 'deleted' WHERE id = ? AND status = 'active'",
      [id]
    );
    if (flipped.rowCount === 0) {
      return false;
    }

    await tx.query(
      'UPDATE users SET recipe_count = MAX(recipe_count - 1, 0) WHERE username = ?',
      [current.created_by]
    );
    await this.categories.adjustRecipeCounts(tx, await this.linkedCategoryIds(tx, id), -1);
    await this.activity.clearViews(tx, id);
    await this.activity.appendEvent(tx, id, actor, 'delete');
    return true;
  }

  /**
   * Ids of an author's active recipes, read inside the caller's transaction
   */
  async activeIdsByAuthor(q: Queryable, author: string): Promise<number[]> {
    const result = await q.query<{ id: number }>(
      "SELECT id FROM recipes WHERE created_by = ? AND status = 'active' ORDER BY id",
      [author]
    );
    return result.rows.map(row => row.id);
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  async get(id: number): Promise<RecipeDetail | null> {
    return readOrDefault(this.logger, 'getRecipe', null, async () => {
      const recipe = await this.findActive(this.db, id);
      if (!recipe) {
        return null;
      }

      const categories = await this.db.query<CategoryRef>(
        `SELECT c.id, c.name FROM categories c
         JOIN recipe_categories rc ON c.id = rc.category_id
         WHERE rc.recipe_id = ?
         ORDER BY c.name ASC`,
        [id]
      );
      const ingredients = await this.db.query<IngredientRow>(
        'SELECT id, recipe_id, ingredient, quantity FROM recipe_ingredients WHERE recipe_id = ? ORDER BY id ASC',
        [id]
      );

      return {
        recipe: rowToRecipe(recipe),
        categories: categories.rows.map(row => ({ id: row.id, name: row.name })),
        ingredients: ingredients.rows.map((row): Ingredient => ({
          id: row.id,
          recipeId: row.recipe_id,
          name: row.ingredient,
          quantity: row.quantity,
        })),
      };
    }, { recipeId: id });
  }

  /** Active recipes, newest first */
  async listActive(limit: number = this.listLimit): Promise<Recipe[]> {
    return this.listWhere('listActiveRecipes', 'created_at DESC, id DESC', limit);
  }

  /** Active recipes, newest first, for dashboards */
  async recent(limit: number = this.recentLimit): Promise<Recipe[]> {
    return this.listWhere('recentRecipes', 'created_at DESC, id DESC', limit);
  }

  async mostViewed(limit: number = this.mostViewedLimit): Promise<Recipe[]> {
    return this.listWhere('mostViewedRecipes', 'views DESC, id DESC', limit);
  }

  /**
   * Active recipes linked to a category, newest first; all active recipes
   * when no category is given.
   */
  async byCategory(categoryId?: number | null): Promise<Recipe[]> {
    if (categoryId === undefined || categoryId === null) {
      return this.listActive();
    }

    return readOrDefault(this.logger, 'recipesByCategory', [], async () => {
      const result = await this.db.query<RecipeRow>(
        `SELECT r.id, r.title, r.instructions, r.prep_time, r.views, r.created_by,
                r.created_at, r.updated_at, r.status
         FROM recipes r
         JOIN recipe_categories rc ON r.id = rc.recipe_id
         WHERE rc.category_id = ? AND r.status = 'active'
         ORDER BY r.created_at DESC, r.id DESC
         LIMIT ?`,
        [categoryId, this.listLimit]
      );
      return result.rows.map(rowToRecipe);
    }, { categoryId });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async listWhere(operation: string, orderBy: string, limit: number): Promise<Recipe[]> {
    const bounded = Number.isInteger(limit) && limit > 0 ? limit : this.listLimit;
    return readOrDefault(this.logger, operation, [], async () => {
      const result = await this.db.query<RecipeRow>(
        `SELECT ${RECIPE_COLUMNS} FROM recipes WHERE status = 'active' ORDER BY ${orderBy} LIMIT ?`,
        [bounded]
      );
      return result.rows.map(rowToRecipe);
    });
  }

  private async findActive(q: Queryable, id: number): Promise<RecipeRow | null> {
    const result = await q.query<RecipeRow>(
      `SELECT ${RECIPE_COLUMNS} FROM recipes WHERE id = ? AND status = 'active'`,
      [id]
    );
    return result.rows.length > 0 ? result.rows[0] : null;
  }

  private async linkedCategoryIds(q: Queryable, recipeId: number): Promise<number[]> {
    const result = await q.query<{ category_id: number }>(
      'SELECT category_id FROM recipe_categories WHERE recipe_id = ?',
      [recipeId]
    );
    return result.rows.map(row => row.category_id);
  }

  /**
   * Link each existing category and bump its count. Each link runs under its
   * own savepoint so a failed link leaves no half-applied count.
   */
  private async attachCategories(
    tx: Queryable,
    recipeId: number,
    categoryIds: CategoryIdInput[]
  ): Promise<SkippedCategory[]> {
    const skipped: SkippedCategory[] = [];
    const attached = new Set<number>();

    for (const raw of categoryIds) {
      const categoryId = parseCategoryId(raw);
      if (categoryId === null) {
        skipped.push({ categoryId: raw, reason: 'invalid' });
        this.logger.warn({ recipeId, categoryId: raw }, 'Skipping invalid category id');
        continue;
      }
      if (attached.has(categoryId)) {
        skipped.push({ categoryId: raw, reason: 'duplicate' });
        continue;
      }

      await tx.query('SAVEPOINT attach_category');
      try {
        if (!(await this.categories.exists(categoryId, tx))) {
          skipped.push({ categoryId: raw, reason: 'not_found' });
          this.logger.warn({ recipeId, categoryId }, 'Skipping unknown category');
        } else {
          await tx.query(
            'INSERT INTO recipe_categories (recipe_id, category_id) VALUES (?, ?)',
            [recipeId, categoryId]
          );
          await this.categories.adjustRecipeCounts(tx, [categoryId], 1);
          attached.add(categoryId);
        }
        await tx.query('RELEASE SAVEPOINT attach_category');
      } catch (error) {
        if (!isStorageError(error)) {
          throw error;
        }
        await tx.query('ROLLBACK TO SAVEPOINT attach_category');
        await tx.query('RELEASE SAVEPOINT attach_category');
        skipped.push({ categoryId: raw, reason: 'storage_error' });
        this.logger.warn({ recipeId, categoryId, error: error.message }, 'Skipping category after storage error');
      }
    }

    return skipped;
  }

  private async insertIngredients(
    tx: Queryable,
    recipeId: number,
    ingredients: IngredientInput[]
  ): Promise<{ stored: number; skipped: SkippedIngredient[] }> {
    const skipped: SkippedIngredient[] = [];
    let stored = 0;

    for (const item of ingredients) {
      try {
        const { name, quantity } = validateIngredient(item.name, item.quantity);
        await tx.query(
          'INSERT INTO recipe_ingredients (recipe_id, ingredient, quantity) VALUES (?, ?, ?)',
          [recipeId, name, quantity]
        );
        stored++;
      } catch (error) {
        if (!isValidationError(error) && !isStorageError(error)) {
          throw error;
        }
        skipped.push({
          name: (item.name ?? '').trim(),
          quantity: (item.quantity ?? '').trim(),
          reason: errorMessage(error),
        });
        this.logger.warn({ recipeId, ingredient: item.name, error: errorMessage(error) }, 'Skipping ingredient');
      }
    }

    return { stored, skipped };
  }
}
