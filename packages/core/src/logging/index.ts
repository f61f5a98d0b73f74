export {
  SinkLogger,
  createLogger,
  silentLogger,
  LOG_LEVEL_PRIORITY,
  type Logger,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from './logger.js';
