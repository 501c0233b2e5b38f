// src/logger.ts

import { getCommandName } from './constants/constants.js';
import type {
  LogContext,
  LogField,
  LoggerInstance,
  LogLevel,
  LogRecord,
} from './types/cobot-types.js';

type Formatter = (value: unknown) => string;

const VALID_FIELDS: readonly LogField[] = [
  'timestamp',
  'level',
  'logger',
  'genre',
  'port',
  'responseTime',
];

function isLogContext(value: unknown): value is LogContext {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Error) &&
    !(value instanceof Uint8Array)
  );
}

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'genre', 'responseTime'];
  private customFormatters: Partial<Record<LogField, Formatter>> = {};
  private watchCallback: ((record: LogRecord) => void) | null = null;
  private logRateLimit: number = 100;
  private lastLogTime: number = 0;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  /**
   * Formats a log message according to the specified level and context.
   * @param level - Log level (trace, debug, info, warn, error)
   * @param args - Arguments to be logged
   * @param context - Context object with additional information
   * @returns Header followed by the formatted arguments
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);

    if (this.logFormat.includes('logger') && merged.logger) {
      const formatter: Formatter = this.customFormatters.logger ?? (v => `[${String(v)}]`);
      headerParts.push(formatter(merged.logger));
    }

    if (this.logFormat.includes('genre') && merged.genre != null) {
      const hex = `0x${merged.genre.toString(16).padStart(2, '0')}`;
      const name = getCommandName(merged.genre) ?? 'Unknown';
      const formatter: Formatter = this.customFormatters.genre ?? (v => `[G:${String(v)}/${name}]`);
      headerParts.push(formatter(hex));
    }

    if (this.logFormat.includes('port') && merged.port != null) {
      const formatter: Formatter = this.customFormatters.port ?? (v => `[P:${String(v)}]`);
      headerParts.push(formatter(merged.port));
    }

    if (this.logFormat.includes('responseTime') && merged.responseTime != null) {
      const formatter: Formatter =
        this.customFormatters.responseTime ?? (v => `[RT:${String(v)}ms]`);
      headerParts.push(formatter(merged.responseTime));
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    // Остальные поля контекста печатаем как JSON
    const rest: LogContext = { ...context };
    for (const field of VALID_FIELDS) delete rest[field];
    if (Object.keys(rest).length > 0) {
      formattedArgs.push(JSON.stringify(rest));
    }

    return [`${color}${headerParts.join('')}`, ...formattedArgs, reset];
  }

  /**
   * Determines whether a message passes the global or category level.
   */
  private shouldLog(level: LogLevel, context: LogContext): boolean {
    if (!this.enabled) return false;
    const category = context.logger;
    if (category !== undefined) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none') return false;
      if (categoryLevel !== undefined) {
        return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
      }
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext, immediate: boolean): void {
    if (!this.shouldLog(level, context)) return;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const now: number = Date.now();
    if (!immediate && now - this.lastLogTime < this.logRateLimit) return;
    this.lastLogTime = now;

    const formatted: string[] = this.format(level, args, context);
    // console.trace печатает стек, поэтому trace идет в debug
    console[level === 'trace' ? 'debug' : level](...formatted);
  }

  /**
   * Splits off a trailing context object from the arguments.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  private log(level: LogLevel, args: unknown[], category?: string): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    const fullContext: LogContext = category ? { ...context, logger: category } : context;
    this.output(level, newArgs, fullContext, level === 'warn' || level === 'error');
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${String(level)}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${String(level)}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setRateLimit(ms: number): void {
    if (ms < 0) throw new Error('Rate limit must be a non-negative number');
    this.logRateLimit = ms;
  }

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => VALID_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${VALID_FIELDS.join(', ')}`);
    }
    this.logFormat = fields;
  }

  setCustomFormatter(field: LogField, formatter: Formatter): void {
    this.customFormatters[field] = formatter;
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  /**
   * Creates a logger instance with category.
   * @param name - Logger name
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, name),
      debug: (...args: unknown[]) => this.log('debug', args, name),
      info: (...args: unknown[]) => this.log('info', args, name),
      warn: (...args: unknown[]) => this.log('warn', args, name),
      error: (...args: unknown[]) => this.log('error', args, name),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

export default Logger;
