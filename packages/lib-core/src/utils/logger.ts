/**
 * Structured Logger
 *
 * Provides JSON-structured logging with request correlation.
 * Every entry carries the service name so logs from several endpoints can be
 * told apart once aggregated.
 *
 * Output format:
 * {"timestamp":"2024-01-01T00:00:00.000Z","level":"info","service":"endsession","message":"..."}
 */

/**
 * Log levels in order of severity (lowest to highest).
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Log output format.
 */
export const LOG_FORMATS = ['json', 'pretty'] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

/**
 * Logger configuration for level filtering and output format.
 */
export interface LoggerConfig {
  /** Minimum log level to output (default: 'info') */
  level: LogLevel;
  /** Output format: 'json' for structured logs, 'pretty' for human-readable (default: 'json') */
  format: LogFormat;
  /** Per-module level overrides (optional) */
  moduleOverrides?: Record<string, { level?: LogLevel }>;
}

/**
 * Default logger configuration.
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  format: 'json',
};

export const DEFAULT_SERVICE_NAME = 'endsession';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalLoggerConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

/**
 * Set global logger configuration.
 * @param config - Partial configuration to merge with defaults
 */
export function setLoggerConfig(config: Partial<LoggerConfig>): void {
  globalLoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };
}

/**
 * Get current global logger configuration.
 */
export function getLoggerConfig(): LoggerConfig {
  return { ...globalLoggerConfig };
}

/**
 * Log context that is included with every log entry.
 */
export interface LogContext {
  /** Service name */
  service: string;
  /** Unique request identifier for correlation */
  requestId?: string;
  /** Matched application identifier */
  applicationId?: string;
  /** Module/component name for log categorization */
  module?: string;
  /** Pipeline stage being processed */
  stage?: string;
  /** Handler being invoked */
  handler?: string;
  /** Operation duration in milliseconds */
  durationMs?: number;
  /** Additional context fields */
  [key: string]: unknown;
}

/**
 * Logger interface for structured logging.
 */
export interface Logger {
  info(message: string, context?: Partial<LogContext>): void;
  warn(message: string, context?: Partial<LogContext>, error?: Error): void;
  error(message: string, context?: Partial<LogContext>, error?: Error): void;
  debug(message: string, context?: Partial<LogContext>): void;
  /** Create a child logger with additional context merged in */
  child(additionalContext: Partial<LogContext>): Logger;
  /** Create a child logger with module name set */
  module(moduleName: string): Logger;
  /** Start a timer and return a function to log the duration */
  startTimer(label: string): () => void;
}

interface LogEntry {
  timestamp: string;
  level: string;
  service: string;
  message: string;
  requestId?: string;
  module?: string;
  durationMs?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  [key: string]: unknown;
}

function shouldLog(level: LogLevel, moduleName: string | undefined, config: LoggerConfig): boolean {
  const override = moduleName ? config.moduleOverrides?.[moduleName] : undefined;
  const effectiveLevel = override?.level ?? config.level;
  return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[effectiveLevel];
}

/**
 * Format a log entry for output.
 */
function formatLogEntry(entry: LogEntry, format: LogFormat): string {
  if (format === 'pretty') {
    const levelColor: Record<string, string> = {
      debug: '\x1b[90m', // gray
      info: '\x1b[36m', // cyan
      warn: '\x1b[33m', // yellow
      error: '\x1b[31m', // red
    };
    const reset = '\x1b[0m';
    const color = levelColor[entry.level] ?? '';
    const timestamp = entry.timestamp.substring(11, 23); // HH:mm:ss.SSS
    const module = entry.module ? `[${entry.module}] ` : '';
    const duration = entry.durationMs !== undefined ? ` (${entry.durationMs}ms)` : '';
    return `${color}${timestamp} ${entry.level.toUpperCase().padEnd(5)}${reset} ${module}${entry.message}${duration}`;
  }
  return JSON.stringify(entry);
}

/**
 * Create a logger instance with base context.
 *
 * @param baseContext - Default context to include in all log entries
 * @param config - Optional logger configuration override
 *
 * @example
 * const logger = createLogger({ requestId: 'abc123' });
 * logger.info('Logout request rejected', { stage: 'validate' });
 * // Output: {"timestamp":"...","level":"info","service":"endsession","message":"Logout request rejected","requestId":"abc123","stage":"validate"}
 */
export function createLogger(
  baseContext: Partial<LogContext> = {},
  config?: Partial<LoggerConfig>
): Logger {
  const ctx: LogContext = {
    service: DEFAULT_SERVICE_NAME,
    ...baseContext,
  };

  const log = (
    level: LogLevel,
    message: string,
    extra?: Partial<LogContext>,
    error?: Error
  ): void => {
    // Resolved per call: setLoggerConfig must reach loggers created earlier
    const effectiveConfig = config ? { ...globalLoggerConfig, ...config } : globalLoggerConfig;
    if (!shouldLog(level, ctx.module, effectiveConfig)) {
      return;
    }

    const { service, ...rest } = ctx;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service,
      message,
      ...rest,
      ...extra,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
        },
      }),
    };

    const output = formatLogEntry(entry, effectiveConfig.format);

    switch (level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'debug':
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  };

  const logger: Logger = {
    info: (msg, extra) => log('info', msg, extra),
    warn: (msg, extra, err) => log('warn', msg, extra, err),
    error: (msg, extra, err) => log('error', msg, extra, err),
    debug: (msg, extra) => log('debug', msg, extra),

    child: (additionalContext: Partial<LogContext>): Logger => {
      return createLogger({ ...ctx, ...additionalContext }, config);
    },

    module: (moduleName: string): Logger => {
      return createLogger({ ...ctx, module: moduleName }, config);
    },

    startTimer: (label: string): (() => void) => {
      const startTime = Date.now();
      return () => {
        const durationMs = Date.now() - startTime;
        log('info', `${label} completed`, { durationMs });
      };
    },
  };

  return logger;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string | undefined): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

/**
 * Initialize logger configuration from environment variables.
 * Should be called once at application startup.
 *
 * Environment variables:
 * - LOG_LEVEL: "debug" | "info" | "warn" | "error" (default: "info")
 * - LOG_FORMAT: "json" | "pretty" (default: "json")
 */
export function initLoggerFromEnv(env: { LOG_LEVEL?: string; LOG_FORMAT?: string }): void {
  const level = isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : DEFAULT_LOGGER_CONFIG.level;
  const format = isLogFormat(env.LOG_FORMAT) ? env.LOG_FORMAT : DEFAULT_LOGGER_CONFIG.format;

  setLoggerConfig({ level, format });
}
