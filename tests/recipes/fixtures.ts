import { SQLiteDatabaseAdapter } from '../../src/persistence/sqlite-adapter.js';
import { SchemaManager } from '../../src/persistence/schema.js';
import { BcryptPasswordHasher } from '../../src/security/password-hasher.js';
import { AdminGate } from '../../src/security/admin-gate.js';
import { RecipeBook } from '../../src/recipes/recipe-book.js';
import type { QueriesConfig } from '../../src/config/schema.js';

export const START = Date.UTC(2024, 0, 1);
export const DAY = 24 * 60 * 60 * 1000;

export interface TestClock {
  now: () => number;
  advance: (ms: number) => void;
}

/** Manually advanced clock, starting at 2024-01-01T00:00:00Z */
export function createClock(start: number = START): TestClock {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

export async function openTestDatabase(): Promise<SQLiteDatabaseAdapter> {
  const db = new SQLiteDatabaseAdapter({ filename: ':memory:' });
  await db.connect();
  await new SchemaManager(db).provision();
  return db;
}

export const testHasher = new BcryptPasswordHasher({ rounds: 4 });

export interface TestBookOptions {
  queries?: Partial<QueriesConfig>;
  /** Share a database with the test for direct row checks */
  db?: SQLiteDatabaseAdapter;
}

export async function openTestBook(clock: TestClock, options: TestBookOptions = {}): Promise<RecipeBook> {
  return new RecipeBook({
    db: options.db ?? await openTestDatabase(),
    hasher: testHasher,
    adminGate: new AdminGate('test-passphrase'),
    clock: clock.now,
    queries: options.queries,
  });
}

export const flourAndSugar = [
  { name: 'flour', quantity: '2 cups' },
  { name: 'sugar', quantity: '1 cup' },
];
