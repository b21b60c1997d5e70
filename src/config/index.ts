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
} from './schema.js';
