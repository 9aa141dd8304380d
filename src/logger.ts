// src/logger.ts

import type {
  LogContext,
  LogField,
  LoggerInstance,
  LogLevel,
  LogRecord,
} from './types/signal-types.js';

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

const CONSOLE_METHODS: Record<LogLevel, ConsoleMethod> = {
  trace: 'debug',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  error: 'error',
};

const VALID_FIELDS: readonly LogField[] = [
  'timestamp',
  'level',
  'logger',
  'frameId',
  'signal',
  'destination',
];

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'highlight' | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    highlight: '\x1b[1;41m',
    reset: '\x1b[0m',
  };

  private groupLevel: number = 0;
  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private countsByFrameId: Record<number, number> = {};
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'frameId', 'signal'];
  private customFormatters: Partial<Record<LogField, (value: unknown) => string>> = {};
  private mutedFrameIds: Set<number> = new Set();
  private highlightedFrameIds: Set<number> = new Set();
  private watchCallback: ((record: LogRecord) => void) | null = null;

  private getIndent(): string {
    return '  '.repeat(this.groupLevel);
  }

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  private formatField(field: LogField, value: unknown, fallback: (value: unknown) => string): string {
    const formatter = this.customFormatters[field] ?? fallback;
    return formatter(value);
  }

  /**
   * Formats a log message according to the level and context.
   * @returns header (with colour) followed by the message parts
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const frameId = context.frameId ?? this.globalContext.frameId;
    const isHighlighted = frameId !== undefined && this.highlightedFrameIds.has(frameId);

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && context.logger) {
      headerParts.push(this.formatField('logger', context.logger, v => `[${String(v)}]`));
    }
    if (this.logFormat.includes('frameId') && frameId !== undefined) {
      const part = this.formatField(
        'frameId',
        frameId,
        v => `[ID:0x${Number(v).toString(16).toUpperCase().padStart(3, '0')}]`
      );
      headerParts.push(
        this.useColors && isHighlighted ? `${this.COLORS.highlight}${part}${reset}${color}` : part
      );
    }
    if (this.logFormat.includes('signal') && context.signal !== undefined) {
      headerParts.push(this.formatField('signal', context.signal, v => `[SIG:${String(v)}]`));
    }
    if (this.logFormat.includes('destination') && context.destination !== undefined) {
      headerParts.push(
        this.formatField('destination', context.destination, v => `[DST:${String(v)}]`)
      );
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    // остальной контекст выводим как JSON
    const rest: LogContext = { ...context };
    delete rest.logger;
    for (const field of VALID_FIELDS) {
      if (this.logFormat.includes(field)) delete rest[field];
    }
    if (Object.keys(rest).length > 0) {
      formattedArgs.push(JSON.stringify(rest));
    }

    return [`${color}${headerParts.join('')}`, this.getIndent(), ...formattedArgs, reset];
  }

  /**
   * Decides whether a record passes the global level, the category level and the frame filters.
   */
  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    if (context.frameId !== undefined && this.mutedFrameIds.has(context.frameId)) return false;

    const category = context.logger ? this.categoryLevels[context.logger] : undefined;
    if (category === 'none') return false;
    const threshold: LogLevel = category ?? this.currentLevel;
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(threshold);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;
    if (context.frameId !== undefined) {
      this.countsByFrameId[context.frameId] = (this.countsByFrameId[context.frameId] ?? 0) + 1;
    }

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const formatted: string[] = this.format(level, args, context);
    const method = CONSOLE_METHODS[level];
    if (this.useColors) {
      const [head = '', indent = '', ...rest] = formatted;
      console[method](head + indent, ...rest);
    } else {
      console[method](...formatted.filter(part => part !== ''));
    }
  }

  /**
   * Splits off a trailing context object.
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

  private log(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, { ...context, ...extra });
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

  group(): void {
    this.groupLevel++;
  }

  groupEnd(): void {
    if (this.groupLevel > 0) this.groupLevel--;
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

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => VALID_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${VALID_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  setCustomFormatter(field: LogField, formatter: (value: unknown) => string): void {
    if (!VALID_FIELDS.includes(field) || field === 'timestamp' || field === 'level') {
      throw new Error(`Invalid formatter field: ${field}`);
    }
    this.customFormatters[field] = formatter;
  }

  /** Drops every record carrying this frame id */
  mute(frameId: number): void {
    this.mutedFrameIds.add(frameId);
  }

  unmute(frameId: number): void {
    this.mutedFrameIds.delete(frameId);
  }

  highlight(frameId: number): void {
    this.highlightedFrameIds.add(frameId);
  }

  clearHighlights(): void {
    this.highlightedFrameIds.clear();
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Record<LogLevel, number> {
    return { ...this.logCounts };
  }

  summary(): void {
    const total = Object.values(this.logCounts).reduce((sum, count) => sum + count, 0);
    console.log('\x1b[1;36m=== Logger Summary ===\x1b[0m');
    console.log(`Trace Messages: ${this.logCounts.trace}`);
    console.log(`Debug Messages: ${this.logCounts.debug}`);
    console.log(`Info Messages: ${this.logCounts.info}`);
    console.log(`Warn Messages: ${this.logCounts.warn}`);
    console.log(`Error Messages: ${this.logCounts.error}`);
    console.log(`Total Messages: ${total}`);
    console.log(
      `By Frame ID: ${JSON.stringify(
        Object.entries(this.countsByFrameId).reduce<Record<string, number>>((acc, [id, count]) => {
          acc[`0x${Number(id).toString(16)}`] = count;
          return acc;
        }, {}),
        null,
        2
      )}`
    );
    console.log(`Current Level: ${this.currentLevel}`);
    console.log(
      `Categories: ${Object.keys(this.categoryLevels).length ? JSON.stringify(this.categoryLevels, null, 2) : 'None'}`
    );
    console.log(`Muted Frame IDs: ${JSON.stringify([...this.mutedFrameIds])}`);
    console.log('\x1b[1;36m=====================\x1b[0m');
  }

  /**
   * Creates a logger bound to a category.
   * @param name - category name, shown in the `logger` header field
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.log('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.log('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.log('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.log('error', args, { logger: name }),
      group: () => this.group(),
      groupEnd: () => this.groupEnd(),
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

export default Logger;
