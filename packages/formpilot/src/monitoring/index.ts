export {
  Logger,
  ConsoleLogSink,
  FileLogSink,
  MemoryLogSink,
  createBatchLogger,
  redactObject,
} from './logger.js';
export type { LogLevel, LogEntry, LogSink, LoggerOptions } from './logger.js';
