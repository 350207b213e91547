export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  component?: string;
  error?: Error;
}

const MAX_ENTRIES = 500;

function defaultLevel(): LogLevel {
  return process.env.NODE_ENV === 'development' ? 'debug' : 'warn';
}

export class Logger {
  private minLevel: LogLevel;
  private logs: LogEntry[] = [];

  constructor(minLevel: LogLevel = defaultLevel()) {
    this.minLevel = minLevel;
  }

  setLevel(level: LogLevel) {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  private log(level: LogLevel, message: string, component?: string, error?: Error) {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      component,
      error
    };

    this.logs.push(entry);
    if (this.logs.length > MAX_ENTRIES) {
      this.logs.shift();
    }

    const prefix = component ? `[${component}]` : '';
    const logMessage = `${prefix} ${message}`;
    const extra = error ? [error] : [];

    switch (level) {
      case 'debug':
        console.debug(logMessage, ...extra);
        break;
      case 'info':
        console.info(logMessage, ...extra);
        break;
      case 'warn':
        console.warn(logMessage, ...extra);
        break;
      case 'error':
        console.error(logMessage, ...extra);
        break;
    }
  }

  debug(message: string, component?: string) {
    this.log('debug', message, component);
  }

  info(message: string, component?: string) {
    this.log('info', message, component);
  }

  warn(message: string, component?: string, error?: Error) {
    this.log('warn', message, component, error);
  }

  error(message: string, component?: string, error?: Error) {
    this.log('error', message, component, error);
  }

  // Most recent entries, oldest first
  getLogs(level?: LogLevel, limit = 50): LogEntry[] {
    const filtered = level ? this.logs.filter(log => log.level === level) : this.logs;
    return filtered.slice(-limit);
  }

  clearLogs() {
    this.logs = [];
  }
}

export const logger = new Logger();
