export {
  createLogger,
  getLogger,
  getModuleLogger,
  initLogger,
  redactSensitiveStrings,
  type LoggerConfig,
  type LogLevel,
} from './logger.js';
