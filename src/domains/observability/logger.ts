import type { Logger, LogEntry, LogLevel } from './types';

// Simple color map for development console output
const COLORS = {
  debug: '\x1b[34m', // Blue
  info: '\x1b[32m',  // Green
  warn: '\x1b[33m',  // Yellow
  error: '\x1b[31m', // Red
  reset: '\x1b[0m',
  dim: '\x1b[2m',
};

export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  component?: string;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_VALUES, value);
}

export class IsocamLogger implements Logger {
  private context: Record<string, unknown>;
  private level: LogLevel;
  private format: LogFormat;
  private static listeners: ((entry: LogEntry) => void)[] = [];

  public static addListener(listener: (entry: LogEntry) => void) {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  constructor(options: LoggerOptions = {}, context: Record<string, unknown> = {}) {
    this.context = {
      component: options.component || 'App',
      ...context
    };
    this.level = options.level || 'info';
    this.format = options.format || (process.env.NODE_ENV === 'production' ? 'json' : 'pretty');
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_VALUES[level] >= LEVEL_VALUES[this.level];
  }

  private output(level: LogLevel, msg: string, meta: object = {}, error?: unknown) {
    if (!this.shouldLog(level)) return;

    const component = typeof this.context.component === 'string' ? this.context.component : 'App';
    const entry: LogEntry = {
      ts: Date.now(),
      level,
      msg,
      ...this.context,
      ...meta,
      component,
    };

    if (error !== undefined) {
      entry.error = error instanceof Error ? {
        message: error.message,
        stack: error.stack,
        name: error.name,
      } : { message: String(error) };
    }

    if (this.format === 'json') {
      console.log(JSON.stringify(entry));
    } else {
      this.prettyPrint(entry);
    }

    IsocamLogger.listeners.forEach(l => {
      try {
        l(entry);
      } catch (e) {
        console.error('Error in log listener:', e);
      }
    });
  }

  private prettyPrint(entry: LogEntry) {
    const { ts, level, msg, component, error, ...rest } = entry;

    const isoString = new Date(ts).toISOString();
    const timePart = isoString.split('T')[1];
    const time = timePart ? timePart.slice(0, -1) : isoString;

    const levelColor = COLORS[level];
    const { reset, dim } = COLORS;

    console.log(
      `${dim}${time}${reset} ${levelColor}${level.toUpperCase().padEnd(5)}${reset} [${component}] ${msg}`
    );

    if (Object.keys(rest).length > 0) {
      console.log(`${dim}${JSON.stringify(rest)}${reset}`);
    }

    if (error) {
      console.log(error);
    }
  }

  debug(msg: string, meta?: object) {
    this.output('debug', msg, meta);
  }

  info(msg: string, meta?: object) {
    this.output('info', msg, meta);
  }

  warn(msg: string, meta?: object) {
    this.output('warn', msg, meta);
  }

  error(msg: string, error?: unknown, meta?: object) {
    this.output('error', msg, meta, error);
  }

  child(meta: object): IsocamLogger {
    return new IsocamLogger(
      { level: this.level, format: this.format },
      { ...this.context, ...meta }
    );
  }
}

// Global default logger
export const rootLogger = new IsocamLogger({
  level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info',
  component: 'Root'
});
