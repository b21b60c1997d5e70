// Configuration
export {
  ConfigSchema,
  ConfigLoader,
  ConfigValidationError,
  type Config,
  type DatabaseSettings,
  type LoggingConfig,
  type AuthConfig,
  type PasswordHashingConfig,
  type QueriesConfig,
} from './config/index.js';

// Observability
export {
  createLogger,
  getLogger,
  initLogger,
  type LoggerConfig,
  type LogLevel,
} from './observability/index.js';

// Persistence
export {
  StorageError,
  isStorageError,
  SQLiteDatabaseAdapter,
  SchemaManager,
  SCHEMA_VERSION,
  TABLES,
  type DatabaseAdapter,
  type Queryable,
  type QueryResult,
  type StorageErrorCode,
  type Transaction,
  type SQLiteConfig,
  type TableName,
} from './persistence/index.js';

// Validation
export {
  ValidationError,
  isValidationError,
  LIMITS,
  ROLES,
  validateUsername,
  validatePassword,
  validateRole,
  validateRecipeTitle,
  validateInstructions,
  validatePrepTime,
  validateIngredient,
  validateCategoryName,
  type Role,
  type ValidationErrorCode,
} from './validation/index.js';

// Security
export {
  BcryptPasswordHasher,
  Sha256PasswordHasher,
  createPasswordHasher,
  AdminGate,
  type PasswordHasher,
} from './security/index.js';

// Recipes
export {
  RecipeBook,
  CategoryStore,
  ActivityStore,
  RecipeStore,
  CredentialStore,
  ReportStore,
  type RecipeBookOptions,
  type RecipeStoreOptions,
  type ReportStoreOptions,
} from './recipes/index.js';

export type {
  User,
  Category,
  CategoryRef,
  Recipe,
  RecipeStatus,
  Ingredient,
  RecipeDetail,
  RecipeEvent,
  RecipeEventType,
  UserRecipeView,
  IngredientInput,
  CategoryIdInput,
  RecipeCreateInput,
  RecipeUpdateInput,
  EventQueryOptions,
  SkippedCategory,
  SkippedCategoryReason,
  SkippedIngredient,
  SkippedItems,
  RecipeCreateResult,
  RecipeUpdateResult,
  TopUser,
  SystemStats,
  UserRecipes,
  Clock,
} from './recipes/types.js';
