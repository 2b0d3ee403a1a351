// src/logger.ts

import { FUNCTION_NAMES } from './constants/constants.js';
import type {
  LogContext,
  LogFormatField,
  LoggerInstance,
  LogLevel,
  LogRecord,
} from './types/nbe-types.js';

const LOG_FORMAT_FIELDS: readonly LogFormatField[] = [
  'timestamp',
  'level',
  'logger',
  'serial',
  'category',
  'function',
  'seqNo',
  'responseTime',
];

/** Context keys rendered in the header rather than in the trailing JSON */
const HEADER_KEYS = new Set<string>([
  'logger',
  'serial',
  'category',
  'function',
  'seqNo',
  'responseTime',
]);

export function isLogLevel(value: string): value is LogLevel {
  return Logger.LEVELS.some(level => level === value);
}

class Logger {
  static readonly LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private categoryLevels: Record<string, LogLevel> = {};
  private watchCallback: ((record: LogRecord) => void) | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Builds the printable parts of one log line: coloured header, then arguments.
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';

    const headerParts: string[] = [];
    for (const name of LOG_FORMAT_FIELDS) {
      switch (name) {
        case 'timestamp':
          headerParts.push(`[${this.getTimestamp()}]`);
          break;
        case 'level':
          headerParts.push(`[${level.toUpperCase()}]`);
          break;
        case 'function': {
          const code = context.function;
          if (code == null) break;
          headerParts.push(`[F:${code}/${FUNCTION_NAMES.get(code) ?? 'UNKNOWN'}]`);
          break;
        }
        case 'seqNo':
          if (context.seqNo != null) headerParts.push(`[#${context.seqNo}]`);
          break;
        case 'responseTime':
          if (context.responseTime != null) headerParts.push(`[RT:${context.responseTime}ms]`);
          break;
        default: {
          const value = context[name];
          if (value != null && value !== '') headerParts.push(`[${value}]`);
        }
      }
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(context)) {
      if (!HEADER_KEYS.has(key) && value !== undefined) extra[key] = value;
    }
    if (Object.keys(extra).length > 0) {
      formattedArgs.push(JSON.stringify(extra));
    }

    return [`${color}${headerParts.join('')}${reset}`, ...formattedArgs];
  }

  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    const category = context.logger ? this.categoryLevels[context.logger] : undefined;
    const threshold: LogLevel = category ?? this.currentLevel;
    return Logger.LEVELS.indexOf(level) >= Logger.LEVELS.indexOf(threshold);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.watchCallback?.({ level, args, context });

    const [head = '', ...rest] = this.format(level, args, context);
    // console.trace would print a stack for every line
    const method = level === 'trace' ? 'debug' : level;
    console[method](head, ...rest);
  }

  /**
   * A trailing plain object is taken as the log context.
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

  setLevel(level: LogLevel): void {
    if (!isLogLevel(level)) throw new Error(`Unknown log level: ${level}`);
    this.currentLevel = level;
  }

  setLevelFor(category: string, level: LogLevel): void {
    if (!isLogLevel(level)) throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  disableColors(): void {
    this.useColors = false;
  }

  /** Receives every record that passes the level check, before it is printed */
  watch(callback: ((record: LogRecord) => void) | null): void {
    this.watchCallback = callback;
  }

  /**
   * Creates a named logger whose level can be set apart from the global one.
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.log('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.log('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.log('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.log('error', args, { logger: name }),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
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

/** Process-wide logger shared by every module */
export const rootLogger = new Logger();

export default Logger;
