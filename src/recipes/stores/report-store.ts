/**
 * Report Store
 *
 * Read-only aggregations over users, recipes, categories and events. Every
 * method degrades to an empty result when storage fails.
 */

import type { Logger } from 'pino';
import { readOrDefault, type DatabaseAdapter } from '../../persistence/database.js';
import { getLogger } from '../../observability/logger.js';
import { USER_COLUMNS, rowToUser, type UserRow } from './credential-store.js';
import { RECIPE_COLUMNS, rowToRecipe, type RecipeRow } from './recipe-store.js';
import type { Clock, SystemStats, TopUser, User, UserRecipes } from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ReportStoreOptions {
  clock?: Clock;
  /** Authors listed in the top-users ranking */
  topUsersLimit?: number;
  /** Trailing window, in days, for recent activity counts */
  activityWindowDays?: number;
}

function emptyStats(): SystemStats {
  return {
    totalUsers: 0,
    totalRecipes: 0,
    totalCategories: 0,
    totalViews: 0,
    recentActivity: 0,
    recentRecipes: 0,
    topUsers: [],
  };
}

/** Escape LIKE wildcards so a prefix matches literally */
function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, match => `\\${match}`);
}

export class ReportStore {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly topUsersLimit: number;
  private readonly activityWindowDays: number;

  constructor(
    private readonly db: DatabaseAdapter,
    options: ReportStoreOptions = {}
  ) {
    this.clock = options.clock ?? Date.now;
    this.topUsersLimit = options.topUsersLimit ?? 5;
    this.activityWindowDays = options.activityWindowDays ?? 7;
    this.logger = getLogger().child({ module: 'ReportStore' });
  }

  async systemStats(): Promise<SystemStats> {
    return readOrDefault(this.logger, 'systemStats', emptyStats(), async () => {
      const since = this.clock() - this.activityWindowDays * DAY_MS;

      const totals = await this.db.query<{
        total_users: number;
        total_recipes: number;
        total_categories: number;
        total_views: number;
        recent_activity: number;
        recent_recipes: number;
      }>(
        `SELECT
           (SELECT COUNT(*) FROM users) AS total_users,
           (SELECT COUNT(*) FROM recipes WHERE status = 'active') AS total_recipes,
           (SELECT COUNT(*) FROM categories) AS total_categories,
           (SELECT COALESCE(SUM(views), 0) FROM recipes WHERE status = 'active') AS total_views,
           (SELECT COUNT(*) FROM recipe_events WHERE event_time >= ?) AS recent_activity,
           (SELECT COUNT(*) FROM recipes WHERE status = 'active' AND created_at >= ?) AS recent_recipes`,
        [since, since]
      );

      const top = await this.db.query<{ username: string; recipe_count: number; total_views: number }>(
        `SELECT created_by AS username, COUNT(*) AS recipe_count, COALESCE(SUM(views), 0) AS total_views
         FROM recipes
         WHERE status = 'active'
         GROUP BY created_by
         ORDER BY recipe_count DESC, created_by ASC
         LIMIT ?`,
        [this.topUsersLimit]
      );

      const row = totals.rows[0];
      return {
        totalUsers: row.total_users,
        totalRecipes: row.total_recipes,
        totalCategories: row.total_categories,
        totalViews: row.total_views,
        recentActivity: row.recent_activity,
        recentRecipes: row.recent_recipes,
        topUsers: top.rows.map((r): TopUser => ({
          username: r.username,
          recipeCount: r.recipe_count,
          totalViews: r.total_views,
        })),
      };
    });
  }

  /** All users, newest account first */
  async listAllUsers(): Promise<User[]> {
    return readOrDefault(this.logger, 'listAllUsers', [], async () => {
      const result = await this.db.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users ORDER BY created_at DESC, id DESC`
      );
      return result.rows.map(rowToUser);
    });
  }

  /**
   * Case-insensitive username prefix search, by username ascending.
   * A blank query lists every user, newest account first.
   */
  async searchUsers(query: string): Promise<User[]> {
    const prefix = query.trim();
    if (!prefix) {
      return this.listAllUsers();
    }

    return readOrDefault(this.logger, 'searchUsers', [], async () => {
      const result = await this.db.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users
         WHERE LOWER(username) LIKE ? ESCAPE '\\'
         ORDER BY username ASC`,
        [`${escapeLike(prefix.toLowerCase())}%`]
      );
      return result.rows.map(rowToUser);
    }, { query: prefix });
  }

  /** A user's active recipes, newest first, with their summed views */
  async userRecipes(username: string): Promise<UserRecipes> {
    const author = username.trim();
    return readOrDefault(this.logger, 'userRecipes', { username: author, recipes: [], totalViews: 0 }, async () => {
      const result = await this.db.query<RecipeRow>(
        `SELECT ${RECIPE_COLUMNS} FROM recipes
         WHERE created_by = ? AND status = 'active'
         ORDER BY created_at DESC, id DESC`,
        [author]
      );
      const recipes = result.rows.map(rowToRecipe);
      return {
        username: author,
        recipes,
        totalViews: recipes.reduce((sum, recipe) => sum + recipe.views, 0),
      };
    }, { username: author });
  }
}
