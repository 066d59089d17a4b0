/**
 * Structured Logger: levelled, component-tagged log lines
 *
 * JSON lines in production so a collector can parse them, short
 * human-readable lines everywhere else. The threshold comes from
 * NFT_LOG_LEVEL unless a caller passes one.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.SILENT]: 'silent',
};

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  [key: string]: unknown;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  const levelMap: Record<string, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    silent: LogLevel.SILENT,
  };
  return levelMap[(value || '').trim().toLowerCase()] ?? fallback;
}

export class StructuredLogger {
  private minLevel: LogLevel;
  private defaultContext: LogContext;
  private useJson: boolean;

  constructor(opts?: {
    minLevel?: LogLevel;
    context?: LogContext;
    json?: boolean;
  }) {
    this.minLevel = opts?.minLevel ?? parseLogLevel(process.env.NFT_LOG_LEVEL);
    this.defaultContext = opts?.context ?? {};
    this.useJson = opts?.json ?? (process.env.NODE_ENV === 'production');
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  debug(component: string, message: string, data?: LogContext): void {
    this.log(LogLevel.DEBUG, component, message, data);
  }

  info(component: string, message: string, data?: LogContext): void {
    this.log(LogLevel.INFO, component, message, data);
  }

  warn(component: string, message: string, data?: LogContext): void {
    this.log(LogLevel.WARN, component, message, data);
  }

  error(component: string, message: string, data?: LogContext): void {
    this.log(LogLevel.ERROR, component, message, data);
  }

  private log(level: LogLevel, component: string, message: string, data?: LogContext): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      component,
      message,
      ...this.defaultContext,
      ...data,
    };

    if (this.useJson) {
      const output = JSON.stringify(entry);
      if (level >= LogLevel.ERROR) {
        process.stderr.write(output + '\n');
      } else {
        process.stdout.write(output + '\n');
      }
      return;
    }

    const ts = entry.timestamp.substring(11, 23); // HH:MM:SS.mmm
    const lvl = LEVEL_NAMES[level].toUpperCase().padEnd(5);
    const context = { ...this.defaultContext, ...data };
    const extra = Object.keys(context).length > 0 ? ' ' + JSON.stringify(context) : '';
    const line = `${ts} ${lvl} [${component}] ${message}${extra}`;
    if (level >= LogLevel.ERROR) {
      console.error(line);
    } else if (level >= LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export const logger = new StructuredLogger();
