/**
 * Discovery Logging Module Index
 */

export {
  type DiscoveryLogLevel,
  type DiscoveryLogEntry,
  type LogFormatter,
  type LogTransport,
  type DiscoveryLogger,
  type LogContext,
  LOG_LEVELS,
  shouldLog,
  isLogLevel,
  createDefaultFormatter,
  ConsoleTransport,
  DiscoveryLoggerImpl,
  createDiscoveryLogger,
  silentLogger,
} from "./logger.js";
