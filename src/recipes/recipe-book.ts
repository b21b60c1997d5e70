/**
 * Recipe Book
 *
 * The operation surface of the application. Owns the database connection and
 * wires the stores together; every operation delegates to one store, except
 * deleteUser which spans recipes and credentials in one transaction.
 */

import type { Logger } from 'pino';
import type { DatabaseAdapter } from '../persistence/database.js';
import { SQLiteDatabaseAdapter } from '../persistence/sqlite-adapter.js';
import { SchemaManager } from '../persistence/schema.js';
import { ValidationError, validateUsername, type Role } from '../validation/validator.js';
import { createPasswordHasher, type PasswordHasher } from '../security/password-hasher.js';
import { AdminGate } from '../security/admin-gate.js';
import { getLogger, initLogger } from '../observability/logger.js';
import type { Config, QueriesConfig } from '../config/schema.js';
import { CategoryStore } from './stores/category-store.js';
import { ActivityStore } from './stores/activity-store.js';
import { RecipeStore } from './stores/recipe-store.js';
import { CredentialStore } from './stores/credential-store.js';
import { ReportStore } from './stores/report-store.js';
import type {
  Category,
  Clock,
  Recipe,
  RecipeCreateInput,
  RecipeCreateResult,
  RecipeDetail,
  RecipeUpdateInput,
  RecipeUpdateResult,
  SystemStats,
  User,
  UserRecipes,
} from './types.js';

export interface RecipeBookOptions {
  /** A connected adapter with the schema provisioned */
  db: DatabaseAdapter;
  hasher?: PasswordHasher;
  adminGate?: AdminGate;
  clock?: Clock;
  queries?: Partial<QueriesConfig>;
}

export class RecipeBook {
  readonly categories: CategoryStore;
  readonly activity: ActivityStore;
  readonly recipes: RecipeStore;
  readonly credentials: CredentialStore;
  readonly reports: ReportStore;

  private readonly db: DatabaseAdapter;
  private readonly adminGate: AdminGate;
  private readonly logger: Logger;

  constructor(options: RecipeBookOptions) {
    const queries = options.queries ?? {};
    const clock = options.clock;

    this.db = options.db;
    this.adminGate = options.adminGate ?? new AdminGate();
    this.logger = getLogger().child({ module: 'RecipeBook' });

    this.categories = new CategoryStore(this.db);
    this.activity = new ActivityStore(this.db, { clock });
    this.recipes = new RecipeStore(this.db, this.categories, this.activity, {
      clock,
      listLimit: queries.listLimit,
      recentLimit: queries.recentLimit,
      mostViewedLimit: queries.mostViewedLimit,
    });
    this.credentials = new CredentialStore(this.db, options.hasher ?? createPasswordHasher(), { clock });
    this.reports = new ReportStore(this.db, {
      clock,
      topUsersLimit: queries.topUsersLimit,
      activityWindowDays: queries.activityWindowDays,
    });
  }

  /**
   * Connect to the configured database, provision the schema and wire the
   * stores. Throws when the database cannot be opened or provisioned.
   */
  static async open(config: Config, options: { clock?: Clock } = {}): Promise<RecipeBook> {
    initLogger(config.logging);

    const db = new SQLiteDatabaseAdapter({
      filename: config.database.filename,
      busyTimeout: config.database.busyTimeout,
      journalMode: config.database.journalMode,
      synchronous: config.database.synchronous,
      foreignKeys: config.database.foreignKeys,
    });

    await db.connect();
    try {
      await new SchemaManager(db).provision();
    } catch (error) {
      await db.disconnect();
      throw error;
    }

    return new RecipeBook({
      db,
      hasher: createPasswordHasher(config.auth.passwordHashing),
      adminGate: new AdminGate(config.auth.adminPassphrase),
      clock: options.clock,
      queries: config.queries,
    });
  }

  async close(): Promise<void> {
    await this.db.disconnect();
  }

  // ===========================================================================
  // Accounts
  // ===========================================================================

  async register(username: string, password: string): Promise<number> {
    return this.credentials.register(username, password, 'user');
  }

  /**
   * Register an admin account. Requires the configured admin passphrase.
   */
  async registerAdmin(username: string, password: string, passphrase: string): Promise<number> {
    if (!this.adminGate.verify(passphrase)) {
      this.logger.warn({ username, enabled: this.adminGate.isEnabled() }, 'Admin registration refused');
      throw new ValidationError('ADMIN_PASSPHRASE_INVALID', 'Invalid admin passphrase', 'passphrase');
    }
    return this.credentials.register(username, password, 'admin');
  }

  async login(username: string, password: string): Promise<Role | null> {
    return this.credentials.login(username, password);
  }

  /**
   * Remove a user and soft-delete all of their active recipes. Returns false
   * when the user does not exist. A user cannot delete themselves.
   */
  async deleteUser(username: string, actingUsername: string): Promise<boolean> {
    const target = validateUsername(username);
    const actor = validateUsername(actingUsername);
    if (target === actor) {
      throw new ValidationError('SELF_DELETE', 'You cannot delete your own account', 'username');
    }

    const outcome = await this.db.transaction(async tx => {
      const existing = await tx.query('SELECT id FROM users WHERE username = ?', [target]);
      if (existing.rows.length === 0) {
        return null;
      }

      let recipesDeleted = 0;
      for (const id of await this.recipes.activeIdsByAuthor(tx, target)) {
        if (await this.recipes.softDeleteIn(tx, id, actor)) {
          recipesDeleted++;
        }
      }
      await this.credentials.removeIn(tx, target);
      return { recipesDeleted };
    });

    if (!outcome) {
      this.logger.warn({ username: target, actor }, 'Delete ignored for unknown user');
      return false;
    }
    this.logger.info({ username: target, actor, recipesDeleted: outcome.recipesDeleted }, 'User deleted');
    return true;
  }

  async listAllUsers(): Promise<User[]> {
    return this.reports.listAllUsers();
  }

  async searchUsers(query: string): Promise<User[]> {
    return this.reports.searchUsers(query);
  }

  // ===========================================================================
  // Categories
  // ===========================================================================

  async addCategory(name: string): Promise<number> {
    return this.categories.addCategory(name);
  }

  async listCategories(): Promise<Category[]> {
    return this.categories.listCategories();
  }

  // ===========================================================================
  // Recipes
  // ===========================================================================

  async createRecipe(input: RecipeCreateInput): Promise<RecipeCreateResult> {
    return this.recipes.create(input);
  }

  async updateRecipe(id: number, input: RecipeUpdateInput, actingUsername?: string): Promise<RecipeUpdateResult> {
    return this.recipes.update(id, input, actingUsername);
  }

  async softDeleteRecipe(id: number, actingUsername: string): Promise<boolean> {
    return this.recipes.softDelete(id, actingUsername);
  }

  async getRecipe(id: number): Promise<RecipeDetail | null> {
    return this.recipes.get(id);
  }

  async listActiveRecipes(limit?: number): Promise<Recipe[]> {
    return this.recipes.listActive(limit);
  }

  async recentRecipes(limit?: number): Promise<Recipe[]> {
    return this.recipes.recent(limit);
  }

  async mostViewedRecipes(limit?: number): Promise<Recipe[]> {
    return this.recipes.mostViewed(limit);
  }

  async recipesByCategory(categoryId?: number | null): Promise<Recipe[]> {
    return this.recipes.byCategory(categoryId);
  }

  // ===========================================================================
  // Activity & reporting
  // ===========================================================================

  async recordView(recipeId: number, username: string): Promise<boolean> {
    return this.activity.recordView(recipeId, username);
  }

  async userRecipes(username: string): Promise<UserRecipes> {
    return this.reports.userRecipes(username);
  }

  async systemStats(): Promise<SystemStats> {
    return this.reports.systemStats();
  }
}
