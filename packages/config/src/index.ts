// Shared runtime configuration and structured logging.

export {
  loadConfig,
  DEFAULT_CONFIG,
  LOG_LEVELS,
  type LensmapConfig,
  type LogLevel,
} from './env.js'

export {
  createLogger,
  type Logger,
  type LoggerOptions,
  type LogSink,
  type LogFields,
} from './logger.js'
