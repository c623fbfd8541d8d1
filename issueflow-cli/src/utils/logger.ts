import chalk from 'chalk';
import { StructuredError, type ErrorContext } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'pretty' | 'json';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const LOG_FORMATS: readonly LogFormat[] = ['pretty', 'json'];

interface LoggerOptions {
  level: LogLevel;
  format?: LogFormat;
  includeTimestamp?: boolean;
}

interface ErrorLogOptions {
  context?: ErrorContext;
  includeStack?: boolean;
  includeRecovery?: boolean;
}

/**
 * Structured JSON log entry schema
 */
export interface StructuredLogEntry {
  timestamp?: string;
  level: LogLevel;
  message: string;
  component?: string;
  meta?: Record<string, unknown>;
  error?: {
    code?: string;
    message: string;
    severity?: string;
    stack?: string;
    cause?: string;
    context?: Record<string, unknown>;
    recoveryActions?: Array<{ description: string; automatic: boolean }>;
  };
}

/**
 * Settings shared by a root logger and every child created from it, so that
 * `--json` or `--verbose` applied at startup reaches module-level children.
 */
interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
  includeTimestamp: boolean;
  sink: LogSink;
}

/**
 * Where formatted lines go. Swapped out in tests.
 */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const levelColors: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

const levelIcons: Record<LogLevel, string> = {
  debug: '🔍',
  info: '📋',
  warn: '⚠️',
  error: '❌',
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

export class Logger {
  private readonly settings: LoggerSettings;
  private readonly prefix: string;

  constructor(options: LoggerOptions = { level: 'info' }, prefix = '', settings?: LoggerSettings) {
    this.prefix = prefix;
    this.settings = settings ?? {
      level: options.level,
      format: options.format ?? 'pretty',
      includeTimestamp: options.includeTimestamp ?? false,
      sink: consoleSink,
    };
  }

  setLevel(level: LogLevel): void {
    this.settings.level = level;
  }

  getLevel(): LogLevel {
    return this.settings.level;
  }

  setFormat(format: LogFormat): void {
    this.settings.format = format;
  }

  getFormat(): LogFormat {
    return this.settings.format;
  }

  isJson(): boolean {
    return this.settings.format === 'json';
  }

  setIncludeTimestamp(include: boolean): void {
    this.settings.includeTimestamp = include;
  }

  setSink(sink: LogSink): void {
    this.settings.sink = sink;
  }

  resetSink(): void {
    this.settings.sink = consoleSink;
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.settings.level];
  }

  private createLogEntry(level: LogLevel, message: string, meta?: Record<string, unknown>): StructuredLogEntry {
    const entry: StructuredLogEntry = { level, message };

    if (this.settings.includeTimestamp) {
      entry.timestamp = new Date().toISOString();
    }

    if (this.prefix) {
      entry.component = this.prefix;
    }

    if (meta && Object.keys(meta).length > 0) {
      entry.meta = meta;
    }

    return entry;
  }

  /**
   * Format a log entry as pretty output for terminal
   */
  private formatPretty(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
    const timestampStr = this.settings.includeTimestamp ? `${chalk.gray(new Date().toISOString())} ` : '';
    const prefix = this.prefix ? `[${this.prefix}] ` : '';
    let formatted = `${timestampStr}${levelIcons[level]} ${levelColors[level](level.toUpperCase().padEnd(5))} ${prefix}${message}`;

    if (meta && Object.keys(meta).length > 0) {
      formatted += ` ${chalk.gray(JSON.stringify(meta))}`;
    }

    return formatted;
  }

  private writeJson(entry: StructuredLogEntry): void {
    const line = JSON.stringify(entry);
    if (entry.level === 'error') {
      this.settings.sink.err(line);
    } else {
      this.settings.sink.out(line);
    }
  }

  private writeLog(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (this.settings.format === 'json') {
      this.writeJson(this.createLogEntry(level, message, meta));
      return;
    }

    const line = this.formatPretty(level, message, meta);
    if (level === 'error' || level === 'warn') {
      this.settings.sink.err(line);
    } else {
      this.settings.sink.out(line);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      this.writeLog('debug', message, meta);
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      this.writeLog('info', message, meta);
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      this.writeLog('warn', message, meta);
    }
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      this.writeLog('error', message, meta);
    }
  }

  /**
   * Log a structured error with context and recovery suggestions
   */
  structuredError(error: StructuredError, options: ErrorLogOptions = {}): void {
    if (!this.shouldLog('error')) return;

    const { context, includeStack = false, includeRecovery = true } = options;
    const mergedContext: Record<string, unknown> = context ? { ...error.context, ...context } : { ...error.context };
    delete mergedContext.timestamp;

    if (this.settings.format === 'json') {
      const entry = this.createLogEntry('error', error.message);
      entry.error = {
        code: error.code,
        message: error.message,
        severity: error.severity,
        context: mergedContext,
      };

      if (includeStack && error.stack) {
        entry.error.stack = error.stack;
      }

      if (includeRecovery && error.recoveryActions.length > 0) {
        entry.error.recoveryActions = error.recoveryActions;
      }

      if (error.cause) {
        entry.error.cause = error.cause.message;
      }

      this.writeJson(entry);
      return;
    }

    const err = this.settings.sink.err;
    const prefix = this.prefix ? `[${this.prefix}] ` : '';

    err(`${levelIcons.error} ${levelColors.error('ERROR')} ${prefix}${chalk.bold(`[${error.code}]`)} ${error.message}`);

    const contextEntries = Object.entries(mergedContext).filter(([, value]) => value !== undefined);
    if (contextEntries.length > 0) {
      err(chalk.gray('  Context:'));
      for (const [key, value] of contextEntries) {
        const displayValue = typeof value === 'object' ? JSON.stringify(value) : String(value);
        err(`${chalk.gray(`    ${key}:`)} ${displayValue}`);
      }
    }

    if (includeRecovery && error.recoveryActions.length > 0) {
      err(chalk.yellow('  Recovery suggestions:'));
      for (const action of error.recoveryActions) {
        const actionType = action.automatic ? chalk.cyan('(auto)') : chalk.magenta('(manual)');
        err(`    ${actionType} ${action.description}`);
      }
    }

    if (includeStack && error.stack) {
      err(chalk.gray('  Stack trace:'));
      for (const line of error.stack.split('\n').slice(1, 6)) {
        err(chalk.gray(`  ${line}`));
      }
    }

    if (error.cause) {
      err(`${chalk.gray('  Caused by:')} ${error.cause.message}`);
    }
  }

  // Special formatted outputs
  success(message: string): void {
    if (this.settings.format === 'json') {
      const entry = this.createLogEntry('info', message);
      entry.meta = { status: 'success' };
      this.writeJson(entry);
    } else {
      this.settings.sink.out(`${chalk.green('✓')} ${message}`);
    }
  }

  failure(message: string): void {
    if (this.settings.format === 'json') {
      const entry = this.createLogEntry('error', message);
      entry.meta = { status: 'failure' };
      this.writeJson(entry);
    } else {
      this.settings.sink.err(`${chalk.red('✗')} ${message}`);
    }
  }

  step(step: number, total: number, message: string): void {
    if (this.settings.format === 'json') {
      const entry = this.createLogEntry('info', message);
      entry.meta = { step, total };
      this.writeJson(entry);
    } else {
      this.settings.sink.out(`${chalk.cyan(`[${step}/${total}]`)} ${message}`);
    }
  }

  divider(): void {
    if (this.settings.format !== 'json') {
      this.settings.sink.out(chalk.gray('─'.repeat(60)));
    }
  }

  header(title: string): void {
    if (this.settings.format === 'json') {
      const entry = this.createLogEntry('info', title);
      entry.meta = { type: 'header' };
      this.writeJson(entry);
    } else {
      this.settings.sink.out('');
      this.settings.sink.out(chalk.bold.cyan(`═══ ${title} ${'═'.repeat(Math.max(0, 50 - title.length))}`));
      this.settings.sink.out('');
    }
  }

  /**
   * Human-readable report lines. Suppressed in json mode, where the command
   * emits its result object instead.
   */
  print(line = ''): void {
    if (this.settings.format !== 'json') {
      this.settings.sink.out(line);
    }
  }

  /**
   * Emit the final machine-readable result of a command (json mode only).
   */
  result(action: string, data: unknown): void {
    if (this.settings.format === 'json') {
      this.settings.sink.out(JSON.stringify({ success: true, action, data }));
    }
  }

  /**
   * Terminal bell, used by the status monitor.
   */
  bell(): void {
    if (this.settings.format !== 'json') {
      this.settings.sink.out('\u0007');
    }
  }

  /**
   * Create a child logger with a component prefix, sharing this logger's settings
   */
  child(prefix: string): Logger {
    return new Logger({ level: this.settings.level }, prefix, this.settings);
  }

  /**
   * Get a log entry as a structured object (for testing/inspection)
   */
  getLogEntry(level: LogLevel, message: string, meta?: Record<string, unknown>): StructuredLogEntry {
    return this.createLogEntry(level, message, meta);
  }
}

export const logger = new Logger({ level: 'info' });

/**
 * Apply LOG_LEVEL, LOG_FORMAT and DEBUG from the environment to the root logger.
 */
export function configureLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const level = env.LOG_LEVEL;
  if (level && isLogLevel(level)) {
    logger.setLevel(level);
  }

  const format = env.LOG_FORMAT;
  if (format && isLogFormat(format)) {
    logger.setFormat(format);
  }

  if (env.DEBUG && env.DEBUG !== '0' && env.DEBUG !== 'false') {
    logger.setLevel('debug');
  }
}
