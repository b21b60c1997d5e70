import type { Logger } from 'pino';
import { StorageError, isStorageError, type DatabaseAdapter } from './database.js';
import { getLogger } from '../observability/logger.js';

// ============================================================================
// Schema Definition
// ============================================================================

export const SCHEMA_VERSION = 1;

export const TABLES = [
  'users',
  'recipes',
  'categories',
  'recipe_categories',
  'recipe_ingredients',
  'recipe_events',
  'user_recipe_views',
] as const;

export type TableName = (typeof TABLES)[number];

const TABLE_DEFINITIONS: Record<TableName, string> = {
  users: `
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT NOT NULL UNIQUE,
      password_hash TEXT NOT NULL,
      role TEXT NOT NULL DEFAULT 'user' CHECK (role IN ('user', 'admin')),
      created_at INTEGER NOT NULL,
      last_login INTEGER,
      recipe_count INTEGER NOT NULL DEFAULT 0 CHECK (recipe_count >= 0)
    )
  `,
  recipes: `
    CREATE TABLE IF NOT EXISTS recipes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      title TEXT NOT NULL,
      instructions TEXT NOT NULL,
      views INTEGER NOT NULL DEFAULT 0 CHECK (views >= 0),
      prep_time INTEGER NOT NULL CHECK (prep_time > 0 AND prep_time <= 1440),
      created_by TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER,
      status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'deleted'))
    )
  `,
  categories: `
    CREATE TABLE IF NOT EXISTS categories (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      recipe_count INTEGER NOT NULL DEFAULT 0 CHECK (recipe_count >= 0)
    )
  `,
  recipe_categories: `
    CREATE TABLE IF NOT EXISTS recipe_categories (
      recipe_id INTEGER NOT NULL REFERENCES recipes(id) ON DELETE CASCADE,
      category_id INTEGER NOT NULL REFERENCES categories(id) ON DELETE CASCADE,
      PRIMARY KEY (recipe_id, category_id)
    )
  `,
  recipe_ingredients: `
    CREATE TABLE IF NOT EXISTS recipe_ingredients (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      recipe_id INTEGER NOT NULL REFERENCES recipes(id) ON DELETE CASCADE,
      ingredient TEXT NOT NULL,
      quantity TEXT NOT NULL DEFAULT ''
    )
  `,
  recipe_events: `
    CREATE TABLE IF NOT EXISTS recipe_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      recipe_id INTEGER REFERENCES recipes(id) ON DELETE SET NULL,
      username TEXT NOT NULL,
      event_type TEXT NOT NULL CHECK (event_type IN ('view', 'edit', 'delete', 'create')),
      event_time INTEGER NOT NULL
    )
  `,
  user_recipe_views: `
    CREATE TABLE IF NOT EXISTS user_recipe_views (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT NOT NULL,
      recipe_id INTEGER NOT NULL REFERENCES recipes(id) ON DELETE CASCADE,
      view_count INTEGER NOT NULL DEFAULT 0 CHECK (view_count >= 0),
      last_viewed INTEGER NOT NULL,
      UNIQUE (username, recipe_id)
    )
  `,
};

const INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_recipes_created_by ON recipes(created_by, status)',
  'CREATE INDEX IF NOT EXISTS idx_recipes_created_at ON recipes(created_at)',
  'CREATE INDEX IF NOT EXISTS idx_recipes_views ON recipes(views)',
  'CREATE INDEX IF NOT EXISTS idx_recipes_status ON recipes(status)',
  'CREATE INDEX IF NOT EXISTS idx_recipe_categories_category ON recipe_categories(category_id)',
  'CREATE INDEX IF NOT EXISTS idx_recipe_ingredients_recipe ON recipe_ingredients(recipe_id)',
  'CREATE INDEX IF NOT EXISTS idx_recipe_events_time ON recipe_events(event_time)',
  'CREATE INDEX IF NOT EXISTS idx_recipe_events_recipe ON recipe_events(recipe_id)',
  'CREATE INDEX IF NOT EXISTS idx_user_recipe_views_recipe ON user_recipe_views(recipe_id)',
  'CREATE INDEX IF NOT EXISTS idx_users_created_at ON users(created_at)',
];

// ============================================================================
// Schema Manager
// ============================================================================

/**
 * Provisions the relational schema. Safe to run on every startup.
 */
export class SchemaManager {
  private readonly logger: Logger;

  constructor(private readonly db: DatabaseAdapter) {
    this.logger = getLogger().child({ module: 'SchemaManager' });
  }

  async provision(): Promise<void> {
    try {
      for (const table of TABLES) {
        await this.db.execute(TABLE_DEFINITIONS[table]);
      }
      for (const sql of INDEXES) {
        await this.db.execute(sql);
      }
      await this.db.execute(`PRAGMA user_version = ${SCHEMA_VERSION}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.fatal({ error: message }, 'Schema provisioning failed');
      throw new StorageError('SCHEMA_FAILED', `Schema provisioning failed: ${message}`, {
        driverCode: isStorageError(error) ? error.driverCode : undefined,
        cause: error,
      });
    }

    this.logger.info({ version: SCHEMA_VERSION, tables: TABLES.length }, 'Schema provisioned');
  }

  /**
   * Tables present in the database, in alphabetical order
   */
  async listTables(): Promise<string[]> {
    const result = await this.db.query<{ name: string }>(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`
    );
    return result.rows.map(row => row.name);
  }

  async version(): Promise<number> {
    const result = await this.db.query<{ user_version: number }>('PRAGMA user_version');
    return result.rows[0]?.user_version ?? 0;
  }
}
