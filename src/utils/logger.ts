/**
 * Code Knowledge Graph - Centralized Logging
 * @module utils/logger
 *
 * Single logging interface for the engine. Modules log through a child of
 * the default logger tagged with their component name. Log lines go to
 * stderr so that the CLI's stdout carries only results.
 */

import { inspect } from 'node:util';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'pretty' | 'json';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  /** Set by `child({ component })` */
  component?: string;
  context?: LogContext;
}

export interface LoggerOptions {
  /** Minimum level to output */
  level?: LogLevel;
  format?: LogFormat;
  /** Colored pretty output; defaults to whether stderr is a TTY */
  colors?: boolean;
  /** Receives entries instead of stderr (tests) */
  output?: (entry: LogEntry) => void;
}

/**
 * Logging surface handed to components; `Logger` and its children both
 * satisfy it
 */
export interface ComponentLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): ComponentLogger;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

// =============================================================================
// Formatting
// =============================================================================

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
} as const;

type AnsiColor = Exclude<keyof typeof ANSI, 'reset'>;

const INDICATORS: Record<LogLevel, { symbol: string; color: AnsiColor }> = {
  debug: { symbol: '●', color: 'gray' },
  info: { symbol: '●', color: 'blue' },
  warn: { symbol: '▲', color: 'yellow' },
  error: { symbol: '✗', color: 'red' },
};

/**
 * Errors become their message; everything else keeps its JSON form
 */
function plainValue(value: unknown): unknown {
  if (value instanceof Error) return value.message;
  return value;
}

function plainContext(context: LogContext): LogContext {
  const plain: LogContext = {};
  for (const [key, value] of Object.entries(context)) plain[key] = plainValue(value);
  return plain;
}

/**
 * `key=value` pairs; strings unquoted, the rest as JSON
 */
export function formatContext(context: LogContext): string {
  return Object.entries(context)
    .map(([key, value]) => {
      const plain = plainValue(value);
      if (typeof plain === 'string') return `${key}=${plain}`;
      const json = JSON.stringify(plain);
      return `${key}=${json === undefined ? inspect(plain) : json}`;
    })
    .join(' ');
}

/**
 * One pretty line: indicator, time, `[component]`, message, context
 */
export function formatPretty(entry: LogEntry, colors: boolean): string {
  const paint = (text: string, color: AnsiColor): string => (colors ? `${ANSI[color]}${text}${ANSI.reset}` : text);
  const { symbol, color } = INDICATORS[entry.level];
  const time = new Date(entry.timestamp).toLocaleTimeString();

  const parts = [paint(symbol, color), paint(time, 'dim')];
  if (entry.component) parts.push(`[${entry.component}]`);
  parts.push(entry.message);
  if (entry.context) parts.push(paint(formatContext(entry.context), 'gray'));
  return parts.join(' ');
}

// =============================================================================
// Logger
// =============================================================================

export class Logger implements ComponentLogger {
  private level: LogLevel;
  private format: LogFormat;
  private colors: boolean;
  private sink?: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? defaultLevel();
    this.format = options.format ?? defaultFormat();
    this.colors = options.colors ?? process.stderr.isTTY ?? false;
    this.sink = options.output;
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  /**
   * Logger whose entries carry `context` under every call's own context.
   * A `component` key is lifted onto the entry.
   */
  child(context: LogContext): ComponentLogger {
    return new ChildLogger(this, context);
  }

  /**
   * Change settings of a live logger; children follow since they write
   * through it
   */
  configure(options: LoggerOptions): void {
    if (options.level) this.level = options.level;
    if (options.format) this.format = options.format;
    if (options.colors !== undefined) this.colors = options.colors;
    if (options.output) this.sink = options.output;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  /** @internal */
  write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) return;

    const { component, ...rest } = context ?? {};
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...(typeof component === 'string' ? { component } : {}),
      ...(Object.keys(rest).length > 0 ? { context: plainContext(rest) } : {}),
    };

    if (this.sink) {
      this.sink(entry);
      return;
    }

    const line = this.format === 'json' ? JSON.stringify(entry) : formatPretty(entry, this.colors);
    process.stderr.write(`${line}\n`);
  }
}

class ChildLogger implements ComponentLogger {
  constructor(
    private readonly parent: Logger,
    private readonly base: LogContext
  ) {}

  debug(message: string, context?: LogContext): void {
    this.parent.write('debug', message, { ...this.base, ...context });
  }

  info(message: string, context?: LogContext): void {
    this.parent.write('info', message, { ...this.base, ...context });
  }

  warn(message: string, context?: LogContext): void {
    this.parent.write('warn', message, { ...this.base, ...context });
  }

  error(message: string, context?: LogContext): void {
    this.parent.write('error', message, { ...this.base, ...context });
  }

  child(context: LogContext): ComponentLogger {
    return new ChildLogger(this.parent, { ...this.base, ...context });
  }
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === 'production' ? 'info' : 'warn';
}

function defaultFormat(): LogFormat {
  const fromEnv = process.env.LOG_FORMAT;
  if (fromEnv === 'json' || fromEnv === 'pretty') return fromEnv;
  return process.stderr.isTTY ? 'pretty' : 'json';
}

// =============================================================================
// Default Instance
// =============================================================================

/**
 * Default logger. Holds output settings only, no build state.
 *
 * @example
 * ```ts
 * const log = logger.child({ component: 'graph-builder' });
 * log.warn('Relationship batch failed', { projectId, type: 'CALLS', size: 500 });
 * ```
 */
export const logger = new Logger();

export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}
