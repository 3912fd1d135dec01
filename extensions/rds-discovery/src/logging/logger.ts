/**
 * Discovery Logging Subsystem
 *
 * Structured, levelled logging for discovery runs. Output goes to stderr
 * so that machine-readable results on stdout stay clean.
 */

// =============================================================================
// Logger Types
// =============================================================================

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type DiscoveryLogLevel = (typeof LOG_LEVELS)[number];

export type DiscoveryLogEntry = {
  timestamp: Date;
  level: DiscoveryLogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  runId?: string;
  resourceId?: string;
  region?: string;
};

export type LogFormatter = (entry: DiscoveryLogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: DiscoveryLogEntry): void;
}

export interface DiscoveryLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): DiscoveryLogger;
  withContext(context: LogContext): DiscoveryLogger;
  setLevel(level: DiscoveryLogLevel): void;
  getLevel(): DiscoveryLogLevel;
  isLevelEnabled(level: DiscoveryLogLevel): boolean;
}

export type LogContext = {
  runId?: string;
  resourceId?: string;
  region?: string;
};

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<DiscoveryLogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function shouldLog(level: DiscoveryLogLevel, minLevel: DiscoveryLogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

export function isLogLevel(value: string): value is DiscoveryLogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<DiscoveryLogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stderr.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: DiscoveryLogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    }

    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.runId) contextParts.push(`run=${entry.runId}`);
    if (entry.resourceId) contextParts.push(`resource=${entry.resourceId}`);
    if (entry.region) contextParts.push(`region=${entry.region}`);
    if (contextParts.length > 0) {
      parts.push(paint(COLORS.dim, `(${contextParts.join(" ")})`));
    }

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Console Transport
// =============================================================================

/**
 * Writes formatted entries to stderr
 */
export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;

  constructor(options?: { formatter?: LogFormatter }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
  }

  write(entry: DiscoveryLogEntry): void {
    process.stderr.write(`${this.formatter(entry)}\n`);
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class DiscoveryLoggerImpl implements DiscoveryLogger {
  readonly subsystem: string;
  private level: DiscoveryLogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: DiscoveryLogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactPatterns?: string[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "warn";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
    this.redactPatterns = (options.redactPatterns ?? []).map((p) => new RegExp(p, "gi"));
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): DiscoveryLogger {
    return new DiscoveryLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  withContext(context: LogContext): DiscoveryLogger {
    return new DiscoveryLoggerImpl({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  setLevel(level: DiscoveryLogLevel): void {
    this.level = level;
  }

  getLevel(): DiscoveryLogLevel {
    return this.level;
  }

  isLevelEnabled(level: DiscoveryLogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private log(level: DiscoveryLogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: DiscoveryLogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata: meta ? this.redactObject(meta) : undefined,
      runId: this.context.runId,
      resourceId: this.context.resourceId,
      region: this.context.region,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]");
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (typeof value === "object" && value !== null && !Array.isArray(value)) {
        result[key] = this.redactObject({ ...value });
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

/**
 * Access key ids and secrets that can leak through SDK error messages
 */
const DEFAULT_REDACT_PATTERNS = ["AKIA[0-9A-Z]{16}", "ASIA[0-9A-Z]{16}"];

export function createDiscoveryLogger(
  subsystem: string,
  options: { level?: DiscoveryLogLevel; transports?: LogTransport[] } = {},
): DiscoveryLogger {
  return new DiscoveryLoggerImpl({
    subsystem: `rds-discovery/${subsystem}`,
    level: options.level ?? "warn",
    transports: options.transports,
    redactPatterns: DEFAULT_REDACT_PATTERNS,
  });
}

/**
 * Logger that drops everything, for library callers that pass none
 */
export const silentLogger: DiscoveryLogger = new DiscoveryLoggerImpl({
  subsystem: "silent",
  level: "fatal",
  transports: [],
});
