/**
 * Credential Store
 *
 * User accounts, password verification and login bookkeeping
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
  validatePassword,
  validateRole,
  validateUsername,
  type Role,
} from '../../validation/validator.js';
import type { PasswordHasher } from '../../security/password-hasher.js';
import { getLogger } from '../../observability/logger.js';
import type { Clock, User } from '../types.js';

// =============================================================================
// Database Row Types
// =============================================================================

export interface UserRow {
  id: number;
  username: string;
  role: string;
  created_at: number;
  last_login: number | null;
  recipe_count: number;
}

interface CredentialRow {
  id: number;
  password_hash: string;
  role: string;
}

export const USER_COLUMNS = 'id, username, role, created_at, last_login, recipe_count';

function parseRole(value: string): Role {
  return value === 'admin' ? 'admin' : 'user';
}

export function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    role: parseRole(row.role),
    createdAt: row.created_at,
    lastLogin: row.last_login,
    recipeCount: row.recipe_count,
  };
}

// =============================================================================
// Credential Store
// =============================================================================

export class CredentialStore {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly db: DatabaseAdapter,
    private readonly hasher: PasswordHasher,
    options: { clock?: Clock } = {}
  ) {
    this.clock = options.clock ?? Date.now;
    this.logger = getLogger().child({ module: 'CredentialStore' });
  }

  /**
   * Create an account and return its id
   */
  async register(username: string, password: string, role: string = 'user'): Promise<number> {
    const name = validateUsername(username);
    validatePassword(password);
    const accountRole = validateRole(role);

    // Hash outside the transaction so other writers are not held up
    const digest = await this.hasher.hash(password);

    try {
      const id = await this.db.transaction(async tx => {
        const existing = await tx.query('SELECT id FROM users WHERE username = ?', [name]);
        if (existing.rows.length > 0) {
          throw duplicateUsername();
        }

        const inserted = await tx.query(
          'INSERT INTO users (username, password_hash, role, created_at, recipe_count) VALUES (?, ?, ?, ?, 0)',
          [name, digest, accountRole, this.clock()]
        );
        return insertedId(inserted);
      });

      this.logger.info({ userId: id, username: name, role: accountRole }, 'User registered');
      return id;
    } catch (error) {
      if (isStorageError(error) && error.isUniqueViolation()) {
        throw duplicateUsername();
      }
      if (isValidationError(error)) {
        this.logger.warn({ username: name, code: error.code }, 'Registration rejected');
      }
      throw error;
    }
  }

  /**
   * Verify credentials. Returns the account's role, or null when there is no
   * match. Input that could never match is treated as no match.
   */
  async login(username: string, password: string): Promise<Role | null> {
    const name = this.loginName(username, password);
    if (name === null) {
      return null;
    }

    const result = await this.db.query<CredentialRow>(
      'SELECT id, password_hash, role FROM users WHERE username = ?',
      [name]
    );
    if (result.rows.length === 0) {
      this.logger.warn({ username: name }, 'Failed login attempt for unknown user');
      return null;
    }

    const account = result.rows[0];
    if (!(await this.hasher.verify(password, account.password_hash))) {
      this.logger.warn({ username: name }, 'Failed login attempt');
      return null;
    }

    const upgraded = this.hasher.needsRehash(account.password_hash)
      ? await this.hasher.hash(password)
      : null;

    await this.db.transaction(async tx => {
      await tx.query('UPDATE users SET last_login = ? WHERE id = ?', [this.clock(), account.id]);
      if (upgraded) {
        await tx.query('UPDATE users SET password_hash = ? WHERE id = ?', [upgraded, account.id]);
      }
    });

    if (upgraded) {
      this.logger.info({ username: name }, 'Password digest upgraded');
    }
    this.logger.info({ username: name }, 'Successful login');
    return parseRole(account.role);
  }

  private loginName(username: string, password: string): string | null {
    try {
      const name = validateUsername(username);
      validatePassword(password);
      return name;
    } catch (error) {
      if (!isValidationError(error)) {
        throw error;
      }
      this.logger.warn({ code: error.code }, 'Login rejected by validation');
      return null;
    }
  }

  async getUser(username: string): Promise<User | null> {
    return readOrDefault(this.logger, 'getUser', null, async () => {
      const result = await this.db.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users WHERE username = ?`,
        [username.trim()]
      );
      return result.rows.length > 0 ? rowToUser(result.rows[0]) : null;
    });
  }

  /**
   * Remove the account row inside the caller's transaction. Recipes are
   * handled by the caller.
   */
  async removeIn(tx: Queryable, username: string): Promise<boolean> {
    const result = await tx.query('DELETE FROM users WHERE username = ?', [username]);
    return result.rowCount > 0;
  }
}

function duplicateUsername(): ValidationError {
  return new ValidationError('DUPLICATE_USERNAME', 'Username already exists', 'username');
}
