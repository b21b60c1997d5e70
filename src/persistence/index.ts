// Database
export {
  StorageError,
  isStorageError,
  insertedId,
  readOrDefault,
  type DatabaseConfig,
  type DatabaseAdapter,
  type Queryable,
  type QueryResult,
  type StorageErrorCode,
  type Transaction,
} from './database.js';

// SQLite Adapter
export {
  SQLiteDatabaseAdapter,
  type SQLiteConfig,
} from './sqlite-adapter.js';

// Schema
export {
  SchemaManager,
  SCHEMA_VERSION,
  TABLES,
  type TableName,
} from './schema.js';
