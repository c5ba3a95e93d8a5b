// src/logger.ts

import type {
  LogContext,
  LogField,
  LogLevel,
  LogRecord,
  LoggerInstance,
} from './types/stepper-types.js';

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const VALID_FIELDS: readonly LogField[] = [
  'timestamp',
  'level',
  'logger',
  'deviceId',
  'opcode',
  'responseTime',
];

type FormattedField = 'logger' | 'deviceId' | 'opcode' | 'responseTime';

export class Logger {
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

  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'deviceId', 'opcode', 'responseTime'];
  private customFormatters: Partial<Record<FormattedField, (value: string) => string>> = {};
  private filters: { deviceId: Set<number>; opcode: Set<number> } = {
    deviceId: new Set(),
    opcode: new Set(),
  };
  private watchCallback: ((record: LogRecord) => void) | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  private formatField(field: FormattedField, value: string, fallback: (v: string) => string): string {
    const formatter = this.customFormatters[field] ?? fallback;
    return formatter(value);
  }

  /**
   * Builds the console arguments for one record: a coloured header of tagged context
   * fields, then the message arguments, then any remaining context as JSON.
   */
  format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);

    if (this.logFormat.includes('logger') && context.logger) {
      headerParts.push(this.formatField('logger', context.logger, v => `[${v}]`));
    }
    if (this.logFormat.includes('deviceId') && context.deviceId != null) {
      headerParts.push(this.formatField('deviceId', String(context.deviceId), v => `[D:${v}]`));
    }
    if (this.logFormat.includes('opcode') && context.opcode != null) {
      const hex = `0x${context.opcode.toString(16).padStart(2, '0')}`;
      const name = context.command ?? 'Unknown';
      headerParts.push(this.formatField('opcode', hex, v => `[OP:${v}/${name}]`));
    }
    if (this.logFormat.includes('responseTime') && context.responseTime != null) {
      headerParts.push(
        this.formatField('responseTime', String(context.responseTime), v => `[RT:${v}ms]`)
      );
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
      }
      return String(arg);
    });

    const extra: LogContext = { ...context };
    delete extra.logger;
    delete extra.deviceId;
    delete extra.opcode;
    delete extra.command;
    delete extra.responseTime;
    if (Object.keys(extra).length > 0) {
      formattedArgs.push(JSON.stringify(extra));
    }

    return [`${color}${headerParts.join('')}${reset}`, ...formattedArgs];
  }

  private shouldLog(level: LogLevel, context: LogContext): boolean {
    if (!this.enabled) return false;
    if (context.deviceId != null && this.filters.deviceId.has(context.deviceId)) return false;
    if (context.opcode != null && this.filters.opcode.has(context.opcode)) return false;

    const category = context.logger ? this.categoryLevels[context.logger] : undefined;
    if (category === 'none') return false;
    const threshold = category ?? this.currentLevel;
    return LEVELS.indexOf(level) >= LEVELS.indexOf(threshold);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level]++;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const formatted = this.format(level, args, context);
    // console.trace would print a stack
    const sink = level === 'trace' ? 'debug' : level;
    console[sink](...formatted);
  }

  /**
   * Splits a trailing plain object off the arguments and treats it as context.
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
    const { args: message, context } = this.splitArgsAndContext(args);
    this.output(level, message, category ? { ...context, logger: category } : context);
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
    if (!LEVELS.includes(level)) {
      throw new Error(`Unknown log level: ${level}`);
    }
    this.currentLevel = level;
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !LEVELS.includes(level)) {
      throw new Error(`Unknown log level: ${level}`);
    }
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

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => VALID_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${VALID_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  setCustomFormatter(field: FormattedField, formatter: (value: string) => string): void {
    this.customFormatters[field] = formatter;
  }

  mute({ deviceId, opcode }: Pick<LogContext, 'deviceId' | 'opcode'> = {}): void {
    if (deviceId != null) this.filters.deviceId.add(deviceId);
    if (opcode != null) this.filters.opcode.add(opcode);
  }

  unmute({ deviceId, opcode }: Pick<LogContext, 'deviceId' | 'opcode'> = {}): void {
    if (deviceId != null) this.filters.deviceId.delete(deviceId);
    if (opcode != null) this.filters.opcode.delete(opcode);
  }

  /**
   * Registers a callback that receives every record that passes the level and mute filters.
   */
  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  getCounts(): Readonly<Record<LogLevel, number>> {
    return { ...this.logCounts };
  }

  /**
   * Creates a logger bound to a category. Its level can be set independently of the root level.
   * @param name - Category name shown in the header
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
    v =>
      v === undefined || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean'
  );
}

/** Shared logger all library categories report to */
export const rootLogger = new Logger();
rootLogger.setLevel('warn');
