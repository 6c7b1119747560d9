/**
 * Leveled console logger shared by the library and the CLI.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export interface LogEntry {
  level: LogLevel;
  message: string;
  module: string;
  timestamp: Date;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  /** Entries below this level are dropped. Unset on a child means "ask the parent". */
  minLevel?: LogLevel;
  moduleName?: string;
  /** Clock used for timestamps; tests pin it. */
  now?: () => Date;
  parent?: Logger;
}

export class Logger {
  private minLevel?: LogLevel;
  private readonly moduleName: string;
  private readonly now: () => Date;
  private readonly parent?: Logger;

  constructor(options: LoggerOptions = {}) {
    this.parent = options.parent;
    this.minLevel = options.minLevel ?? (options.parent ? undefined : LogLevel.INFO);
    this.moduleName = options.moduleName ?? 'devjournal';
    this.now = options.now ?? options.parent?.now ?? (() => new Date());
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, data, error);
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  get level(): LogLevel {
    return this.minLevel ?? this.parent?.level ?? LogLevel.INFO;
  }

  child(moduleName: string): Logger {
    return new Logger({ moduleName: `${this.moduleName}.${moduleName}`, parent: this });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>, error?: Error): void {
    if (!this.isEnabled(level)) return;
    const line = formatEntry({ level, message, module: this.moduleName, timestamp: this.now(), data, error });
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(line);
        break;
      case LogLevel.INFO:
        console.info(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      case LogLevel.ERROR:
        console.error(line);
        break;
    }
  }
}

export function formatEntry(entry: LogEntry): string {
  let line = `${entry.timestamp.toISOString()} ${entry.level.toUpperCase().padEnd(5)} [${entry.module}] ${entry.message}`;
  if (entry.data && Object.keys(entry.data).length > 0) {
    line += ` ${JSON.stringify(entry.data)}`;
  }
  if (entry.error) {
    line += `\n  ${entry.error.name}: ${entry.error.message}`;
  }
  return line;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

export const logger = new Logger();
