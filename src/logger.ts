// src/logger.ts

import type { LogContext, LoggerInstance, LogLevel, LogRecord } from './types/etherlink-types.js';

type LogField = 'timestamp' | 'level' | 'logger' | 'msgId' | 'length' | 'transport';

const CONSOLE_METHODS: Record<LogLevel, 'debug' | 'info' | 'warn' | 'error'> = {
  trace: 'debug',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  error: 'error',
};

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
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'transport', 'msgId', 'length'];
  private customFormatters: Partial<Record<LogField, (value: unknown) => string>> = {};
  private watchCallback: ((record: LogRecord) => void) | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Builds the header and body of one log line.
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    for (const field of this.logFormat) {
      const formatter = this.customFormatters[field];
      switch (field) {
        case 'timestamp':
          headerParts.push(`[${this.getTimestamp()}]`);
          break;
        case 'level':
          headerParts.push(`[${level.toUpperCase()}]`);
          break;
        case 'logger':
          if (merged.logger) headerParts.push(formatter ? formatter(merged.logger) : `[${merged.logger}]`);
          break;
        case 'transport':
          if (merged.transport) {
            headerParts.push(formatter ? formatter(merged.transport) : `[T:${merged.transport}]`);
          }
          break;
        case 'msgId':
          if (merged.msgId != null) {
            const hex = `0x${merged.msgId.toString(16).padStart(2, '0')}`;
            headerParts.push(formatter ? formatter(merged.msgId) : `[ID:${hex}]`);
          }
          break;
        case 'length':
          if (merged.length != null) {
            headerParts.push(formatter ? formatter(merged.length) : `[L:${merged.length}]`);
          }
          break;
      }
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    // Anything not already printed in the header goes after the message
    const extra: LogContext = { ...context };
    for (const field of this.logFormat) delete extra[field];
    if (Object.keys(extra).length > 0) {
      formattedArgs.push(JSON.stringify(extra));
    }

    return [`${color}${headerParts.join('')}${reset}`, ...formattedArgs];
  }

  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    const category = context.logger;
    if (category !== undefined && category in this.categoryLevels) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none') return false;
      return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level]++;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    console[CONSOLE_METHODS[level]](...this.format(level, args, context));
  }

  /**
   * Treats a trailing plain object as the log context.
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
    this.output(level, newArgs, category ? { ...context, logger: category } : context);
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
    if (!this.LEVELS.includes(level)) {
      throw new Error(`Unknown log level: ${level}`);
    }
    this.currentLevel = level;
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
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

  enableColors(): void {
    this.useColors = true;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setLogFormat(fields: LogField[]): void {
    const validFields: LogField[] = ['timestamp', 'level', 'logger', 'msgId', 'length', 'transport'];
    if (!fields.every(f => validFields.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${validFields.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  setCustomFormatter(field: LogField, formatter: (value: unknown) => string): void {
    this.customFormatters[field] = formatter;
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Readonly<Record<LogLevel, number>> {
    return { ...this.logCounts };
  }

  /**
   * Creates a logger instance bound to a category.
   * @param name - category shown in the header and used for per-category levels
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, name),
      debug: (...args: unknown[]) => this.log('debug', args, name),
      info: (...args: unknown[]) => this.log('info', args, name),
      warn: (...args: unknown[]) => this.log('warn', args, name),
      error: (...args: unknown[]) => this.log('error', args, name),
      setLevel: (lvl: LogLevel | 'none') => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (value instanceof Error || value instanceof Uint8Array) return false;
  return Object.values(value).every(
    v => v === undefined || ['string', 'number', 'boolean'].includes(typeof v)
  );
}

/** Shared logger used by every module of the library */
export const rootLogger = new Logger();

export default Logger;
