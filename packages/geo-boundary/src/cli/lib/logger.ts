/**
 * CLI Structured Logging
 *
 * Human-readable or JSON log lines with timestamp, level, service name and
 * metadata. Everything goes to the diagnostic stream (stderr by default):
 * stdout carries the filter's data and nothing else.
 *
 * @module cli/lib/logger
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Structured log entry for JSON output
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly command?: string;
  readonly [key: string]: unknown;
}

/**
 * Where log lines are written
 */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON */
  readonly json: boolean;
  /** Command name for context */
  readonly command?: string;
  readonly service?: string;
  /** Colour human-readable output */
  readonly color?: boolean;
  readonly sink?: LogSink;
  /** Clock override, for tests */
  readonly now?: () => Date;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

export const DEFAULT_SERVICE = 'h3-to-geo-boundary';

// ============================================================================
// CLI Logger Class
// ============================================================================

export class CLILogger {
  private readonly config: CLILoggerConfig;
  private readonly sink: LogSink;
  private readonly now: () => Date;
  private readonly startTime: number;
  private readonly commandContext: string | null;

  constructor(config: CLILoggerConfig) {
    this.config = {
      service: DEFAULT_SERVICE,
      ...config,
    };
    this.sink = config.sink ?? process.stderr;
    this.now = config.now ?? (() => new Date());
    this.startTime = this.now().getTime();
    this.commandContext = config.command ?? null;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private paint(color: string, text: string): string {
    return this.config.color ? `${color}${text}${COLORS.reset}` : text;
  }

  private formatJson(
    level: LogLevel,
    timestamp: string,
    message: string,
    metadata?: LogMetadata
  ): string {
    const entry: StructuredLogEntry = {
      timestamp,
      level,
      message,
      ...(this.config.service ? { service: this.config.service } : {}),
      ...(this.commandContext ? { command: this.commandContext } : {}),
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    };
    return JSON.stringify(entry);
  }

  private formatHuman(
    level: LogLevel,
    timestamp: string,
    message: string,
    metadata?: LogMetadata
  ): string {
    let line = `${this.paint(COLORS.dim, timestamp)} `;
    line += `${this.paint(LEVEL_COLORS[level], LEVEL_LABELS[level])} `;
    line += message;

    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr =
            typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${this.paint(COLORS.cyan, key)}=${valueStr}`;
        })
        .join(' ');
      line += ` ${this.paint(COLORS.dim, `(${metaStr})`)}`;
    }

    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const timestamp = this.now().toISOString();
    const formatted = this.config.json
      ? this.formatJson(level, timestamp, message, metadata)
      : this.formatHuman(level, timestamp, message, metadata);

    this.sink.write(`${formatted}\n`);
  }

  /** Milliseconds since the logger was created */
  elapsedMs(): number {
    return this.now().getTime() - this.startTime;
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a CLI logger with the given configuration
 */
export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'warn',
    json: config.json ?? false,
    command: config.command,
    service: config.service ?? DEFAULT_SERVICE,
    color: config.color ?? false,
    sink: config.sink,
    now: config.now,
  });
}

/**
 * Format a duration in milliseconds for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}
