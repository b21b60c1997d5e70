import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// Storage configuration
const DatabaseConfigSchema = z.object({
  filename: z.string().min(1).default('recipes.db'),
  busyTimeout: z.number().int().min(0).max(60_000).default(5000),
  journalMode: z.enum(['wal', 'delete', 'truncate', 'memory', 'off']).default('wal'),
  synchronous: z.enum(['off', 'normal', 'full', 'extra']).default('normal'),
  foreignKeys: z.boolean().default(true),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  prettyPrint: z.boolean().default(false),
  redactPaths: z.array(z.string()).default([]),
});

const PasswordHashingConfigSchema = z.object({
  algorithm: z.enum(['bcrypt', 'sha256']).default('bcrypt'),
  // bcrypt cost factor (log2 of the iteration count)
  rounds: z.number().int().min(4).max(15).default(12),
});

const AuthConfigSchema = z.object({
  // Admin self-registration is disabled without a passphrase
  adminPassphrase: z.string().min(8, 'Admin passphrase must be at least 8 characters').optional(),
  passwordHashing: PasswordHashingConfigSchema.default({}),
});

const QueriesConfigSchema = z.object({
  listLimit: z.number().int().positive().default(1000),
  recentLimit: z.number().int().positive().default(10),
  mostViewedLimit: z.number().int().positive().default(10),
  topUsersLimit: z.number().int().positive().default(5),
  activityWindowDays: z.number().int().positive().default(7),
});

export const ConfigSchema = z.object({
  env: NodeEnvSchema,
  database: DatabaseConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  auth: AuthConfigSchema.default({}),
  queries: QueriesConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type DatabaseSettings = z.infer<typeof DatabaseConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type AuthConfig = z.infer<typeof AuthConfigSchema>;
export type PasswordHashingConfig = z.infer<typeof PasswordHashingConfigSchema>;
export type QueriesConfig = z.infer<typeof QueriesConfigSchema>;

/**
 * Configuration loader with validation
 */
export class ConfigLoader {
  static load(raw: unknown): Config {
    const result = ConfigSchema.safeParse(raw ?? {});

    if (!result.success) {
      const errors = result.error.errors.map(e => ({
        path: e.path.join('.'),
        message: e.message,
      }));
      throw new ConfigValidationError(errors);
    }

    this.validateProduction(result.data);

    return result.data;
  }

  /**
   * Build configuration from environment variables
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): Config {
    const raw: Record<string, unknown> = {};

    if (env.RECIPES_ENV) {
      raw.env = env.RECIPES_ENV;
    }
    if (env.RECIPES_DB_PATH) {
      raw.database = { filename: env.RECIPES_DB_PATH };
    }

    const logging: Record<string, unknown> = {};
    if (env.RECIPES_LOG_LEVEL) {
      logging.level = env.RECIPES_LOG_LEVEL;
    }
    if (env.RECIPES_LOG_PRETTY) {
      logging.prettyPrint = env.RECIPES_LOG_PRETTY === 'true' || env.RECIPES_LOG_PRETTY === '1';
    }
    if (Object.keys(logging).length > 0) {
      raw.logging = logging;
    }

    if (env.RECIPES_ADMIN_PASSPHRASE) {
      raw.auth = { adminPassphrase: env.RECIPES_ADMIN_PASSPHRASE };
    }

    return this.load(raw);
  }

  private static validateProduction(config: Config): void {
    if (config.env !== 'production') {
      return;
    }

    const errors: string[] = [];
    if (config.auth.passwordHashing.algorithm === 'sha256') {
      errors.push('Unsalted sha256 password hashing is not allowed in production');
    }
    if (config.database.filename === ':memory:') {
      errors.push('An in-memory database is not allowed in production');
    }
    if (errors.length > 0) {
      throw new ConfigValidationError(errors);
    }
  }
}

/**
 * Configuration validation error
 * Supports both string[] and {path, message}[] formats
 */
export class ConfigValidationError extends Error {
  public readonly errors: Array<{ path: string; message: string }>;

  constructor(errors: string[] | Array<{ path: string; message: string }>) {
    const normalizedErrors = errors.map(e => {
      if (typeof e === 'string') {
        return { path: '', message: e };
      }
      return e;
    });

    const message = normalizedErrors.map(e =>
      e.path ? `${e.path}: ${e.message}` : e.message
    ).join(', ');

    super(`Configuration validation failed: ${message}`);
    this.name = 'ConfigValidationError';
    this.errors = normalizedErrors;
  }
}
