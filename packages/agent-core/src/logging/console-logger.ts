/**
 * Console logger for agents running outside a host that injects its own
 * ILogger. Level-filtered, component-prefixed, with meta redaction.
 */

import type { ILogger, LogLevel, LogMeta } from '@tabletalk/agent-contracts';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
};

export const DEFAULT_REDACT_PATTERNS: readonly RegExp[] = [
  /api[_-]?key/i,
  /token/i,
  /secret/i,
  /password/i,
  /authorization/i,
];

export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string) => void;

export interface ConsoleLoggerOptions {
  /** Minimum level written (default: info) */
  minLevel?: LogLevel;
  /** Prefix for every line (default: tabletalk) */
  component?: string;
  /** Meta keys whose values are replaced with [REDACTED] */
  redactPatterns?: readonly RegExp[];
  /** Where lines go (default: console.debug / info / warn / error) */
  sink?: LogSink;
  /** Prepend ISO timestamps (default: true) */
  timestamps?: boolean;
}

function isPlainObject(value: unknown): value is LogMeta {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const consoleSink: LogSink = (level, line) => {
  console[level](line);
};

export class ConsoleLogger implements ILogger {
  private readonly minLevel: LogLevel;
  private readonly component: string;
  private readonly redactPatterns: readonly RegExp[];
  private readonly sink: LogSink;
  private readonly timestamps: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'info';
    this.component = options.component ?? 'tabletalk';
    this.redactPatterns = options.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.sink = options.sink ?? consoleSink;
    this.timestamps = options.timestamps ?? true;
  }

  debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write('error', message, meta);
  }

  /**
   * Logger for a sub-component; shares level, sink and redaction.
   */
  child(component: string): ConsoleLogger {
    return new ConsoleLogger({
      minLevel: this.minLevel,
      component: `${this.component}.${component}`,
      redactPatterns: this.redactPatterns,
      sink: this.sink,
      timestamps: this.timestamps,
    });
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.minLevel]) {return;}

    let line = `${LEVEL_LABELS[level]} [${this.component}] ${message}`;
    if (this.timestamps) {
      line = `${new Date().toISOString()} ${line}`;
    }
    if (meta && Object.keys(meta).length > 0) {
      line += ` ${JSON.stringify(this.redact(meta))}`;
    }
    this.sink(level, line);
  }

  private redact(meta: LogMeta): LogMeta {
    const result: LogMeta = {};
    for (const [key, value] of Object.entries(meta)) {
      if (this.redactPatterns.some((pattern) => pattern.test(key))) {
        result[key] = '[REDACTED]';
      } else if (value instanceof Error) {
        result[key] = { name: value.name, message: value.message };
      } else if (isPlainObject(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

