export {
  createLogger,
  getLogger,
  initLogger,
  type LoggerConfig,
  type LogLevel,
} from './logger.js';
