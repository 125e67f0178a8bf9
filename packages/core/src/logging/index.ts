export {
  Logger,
  silentLogger,
  type LogLevel,
  type LogFormat,
  type LogFields,
  type LoggerOptions,
} from './logger.js';
