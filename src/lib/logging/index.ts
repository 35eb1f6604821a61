/**
 * Logging Module
 *
 * Provides:
 * - Tagged console logger with a debug switch
 * - Injectable sinks (console, silent, in-memory)
 * - Per-phase timing for debug output
 */

export {
  createLogger,
  createMemorySink,
  consoleSink,
  silentSink,
  PhaseTimer,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogSink,
} from './logger.js';
