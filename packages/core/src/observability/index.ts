export {
  RxBindLogger,
  createLogger,
  describeError,
  isDebugMode,
  setDebugMode,
  type LogEntry,
  type LogLevel,
  type RxBindLoggerConfig,
} from './logger.js';
