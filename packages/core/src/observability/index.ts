export {
  ClipLogger,
  createLogger,
  isDebugMode,
  noopLogger,
  setDebugMode,
  type ClipLoggerConfig,
  type LogEntry,
  type LogLevel,
  type Logger,
} from './logger.js';
