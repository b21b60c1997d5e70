/**
 * Activity Store
 *
 * Global and per-user view counters, and the append-only recipe event log.
 */

import type { Logger } from 'pino';
import { readOrDefault, type DatabaseAdapter, type Queryable } from '../../persistence/database.js';
import { validateUsername } from '../../validation/validator.js';
import { getLogger } from '../../observability/logger.js';
import type {
  Clock,
  EventQueryOptions,
  RecipeEvent,
  RecipeEventType,
  UserRecipeView,
} from '../types.js';

// =============================================================================
// Database Row Types
// =============================================================================

interface EventRow {
  id: number;
  recipe_id: number | null;
  username: string;
  event_type: RecipeEventType;
  event_time: number;
}

interface ViewRow {
  username: string;
  recipe_id: number;
  view_count: number;
  last_viewed: number;
}

function rowToEvent(row: EventRow): RecipeEvent {
  return {
    id: row.id,
    recipeId: row.recipe_id,
    username: row.username,
    type: row.event_type,
    time: row.event_time,
  };
}

const DEFAULT_EVENT_LIMIT = 100;

// =============================================================================
// Activity Store
// =============================================================================

export class ActivityStore {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly db: DatabaseAdapter,
    options: { clock?: Clock } = {}
  ) {
    this.clock = options.clock ?? Date.now;
    this.logger = getLogger().child({ module: 'ActivityStore' });
  }

  /**
   * Count a view of an active recipe. Returns false if the recipe is missing
   * or deleted.
   */
  async recordView(recipeId: number, username: string): Promise<boolean> {
    const viewer = validateUsername(username);
    const now = this.clock();

    const recorded = await this.db.transaction(async tx => {
      const bumped = await tx.query(
        "UPDATE recipes SET views = views + 1 WHERE id = ? AND status = 'active'",
        [recipeId]
      );
      if (bumped.rowCount === 0) {
        return false;
      }

      await tx.query(
        `INSERT INTO user_recipe_views (username, recipe_id, view_count, last_viewed)
         VALUES (?, ?, 1, ?)
         ON CONFLICT(username, recipe_id)
         DO UPDATE SET view_count = view_count + 1, last_viewed = excluded.last_viewed`,
        [viewer, recipeId, now]
      );
      await this.appendEvent(tx, recipeId, viewer, 'view');
      return true;
    });

    if (!recorded) {
      this.logger.warn({ recipeId, username: viewer }, 'View ignored for missing or deleted recipe');
    }
    return recorded;
  }

  async getUserView(username: string, recipeId: number): Promise<UserRecipeView | null> {
    return readOrDefault(this.logger, 'getUserView', null, async () => {
      const result = await this.db.query<ViewRow>(
        `SELECT username, recipe_id, view_count, last_viewed
         FROM user_recipe_views WHERE username = ? AND recipe_id = ?`,
        [username.trim(), recipeId]
      );
      if (result.rows.length === 0) {
        return null;
      }
      const row = result.rows[0];
      return {
        username: row.username,
        recipeId: row.recipe_id,
        viewCount: row.view_count,
        lastViewed: row.last_viewed,
      };
    }, { recipeId });
  }

  /**
   * Events, newest first
   */
  async listEvents(options: EventQueryOptions = {}): Promise<RecipeEvent[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (options.recipeId !== undefined) {
      conditions.push('recipe_id = ?');
      params.push(options.recipeId);
    }
    if (options.username !== undefined) {
      conditions.push('username = ?');
      params.push(options.username);
    }
    if (options.type !== undefined) {
      conditions.push('event_type = ?');
      params.push(options.type);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(options.limit ?? DEFAULT_EVENT_LIMIT);

    return readOrDefault(this.logger, 'listEvents', [], async () => {
      const result = await this.db.query<EventRow>(
        `SELECT id, recipe_id, username, event_type, event_time
         FROM recipe_events ${where}
         ORDER BY event_time DESC, id DESC
         LIMIT ?`,
        params
      );
      return result.rows.map(rowToEvent);
    });
  }

  /**
   * Append an event inside the caller's transaction
   */
  async appendEvent(
    q: Queryable,
    recipeId: number | null,
    username: string,
    type: RecipeEventType
  ): Promise<void> {
    await q.query(
      'INSERT INTO recipe_events (recipe_id, username, event_type, event_time) VALUES (?, ?, ?, ?)',
      [recipeId, username, type, this.clock()]
    );
  }

  /**
   * Drop the per-user view rows of a recipe inside the caller's transaction
   */
  async clearViews(q: Queryable, recipeId: number): Promise<number> {
    const result = await q.query('DELETE FROM user_recipe_views WHERE recipe_id = ?', [recipeId]);
    return result.rowCount;
  }
}
