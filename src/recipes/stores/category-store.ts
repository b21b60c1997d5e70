/**
 * Category Store
 *
 * Idempotent category creation and the denormalized per-category recipe
 * counts. Counts change only as a side effect of the Recipe Store linking
 * or unlinking recipes, inside the Recipe Store's transaction.
 */

import type { Logger } from 'pino';
import { readOrDefault, type DatabaseAdapter, type Queryable } from '../../persistence/database.js';
import { validateCategoryName } from '../../validation/validator.js';
import { getLogger } from '../../observability/logger.js';
import type { Category } from '../types.js';

// =============================================================================
// Database Row Types
// =============================================================================

interface CategoryRow {
  id: number;
  name: string;
  recipe_count: number;
}

function rowToCategory(row: CategoryRow): Category {
  return {
    id: row.id,
    name: row.name,
    recipeCount: row.recipe_count,
  };
}

// =============================================================================
// Category Store
// =============================================================================

export class CategoryStore {
  private readonly logger: Logger;

  constructor(private readonly db: DatabaseAdapter) {
    this.logger = getLogger().child({ module: 'CategoryStore' });
  }

  /**
   * Add a category, or return the id of the existing one with the same name.
   */
  async addCategory(name: string): Promise<number> {
    const value = validateCategoryName(name);

    return this.db.transaction(async tx => {
      const inserted = await tx.query(
        'INSERT INTO categories (name, recipe_count) VALUES (?, 0) ON CONFLICT(name) DO NOTHING',
        [value]
      );
      const existing = await tx.query<{ id: number }>(
        'SELECT id FROM categories WHERE name = ?',
        [value]
      );
      const id = existing.rows[0].id;

      if (inserted.rowCount > 0) {
        this.logger.info({ categoryId: id, name: value }, 'Category added');
      } else {
        this.logger.debug({ categoryId: id, name: value }, 'Category already exists');
      }
      return id;
    });
  }

  /**
   * All categories, by name ascending
   */
  async listCategories(): Promise<Category[]> {
    return readOrDefault(this.logger, 'listCategories', [], async () => {
      const result = await this.db.query<CategoryRow>(
        'SELECT id, name, recipe_count FROM categories ORDER BY name ASC'
      );
      return result.rows.map(rowToCategory);
    });
  }

  async getCategory(id: number): Promise<Category | null> {
    return readOrDefault(this.logger, 'getCategory', null, async () => {
      const result = await this.db.query<CategoryRow>(
        'SELECT id, name, recipe_count FROM categories WHERE id = ?',
        [id]
      );
      return result.rows.length > 0 ? rowToCategory(result.rows[0]) : null;
    }, { categoryId: id });
  }

  async exists(id: number, q: Queryable = this.db): Promise<boolean> {
    const result = await q.query('SELECT 1 AS found FROM categories WHERE id = ?', [id]);
    return result.rows.length > 0;
  }

  /**
   * Shift the recipe count of each category by delta. Counts never go below zero.
   */
  async adjustRecipeCounts(q: Queryable, categoryIds: number[], delta: 1 | -1): Promise<void> {
    for (const id of categoryIds) {
      await q.query(
        'UPDATE categories SET recipe_count = MAX(recipe_count + ?, 0) WHERE id = ?',
        [delta, id]
      );
    }
  }
}
