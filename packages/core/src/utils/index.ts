/**
 * Utility exports
 */
export {
  logger,
  createLogger,
  silentLogger,
  setLogLevel,
  getLogLevel,
  parseLogLevel,
  formatLogEntry,
  getLogAggregator,
  LogLevel,
  type Logger,
  type LogEntry,
  type LogAggregator,
} from './logger.js'
