import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  SUCCESS = 'SUCCESS'
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.SUCCESS];

export interface Log {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, error?: unknown, ...args: unknown[]): void;
  success(message: string, ...args: unknown[]): void;
}

class Logger implements Log {
  private static instance: Logger;
  private logLevel: LogLevel = LogLevel.INFO;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLogLevel(level: LogLevel) {
    this.logLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }

  isEnabled(level: LogLevel): boolean {
    // SUCCESS lines are always shown
    return level === LogLevel.SUCCESS || LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.logLevel);
  }

  debug(message: string, ...args: unknown[]) {
    this.write(LogLevel.DEBUG, undefined, message, args);
  }

  info(message: string, ...args: unknown[]) {
    this.write(LogLevel.INFO, undefined, message, args);
  }

  warn(message: string, ...args: unknown[]) {
    this.write(LogLevel.WARN, undefined, message, args);
  }

  error(message: string, error?: unknown, ...args: unknown[]) {
    this.write(LogLevel.ERROR, undefined, message, args, error);
  }

  success(message: string, ...args: unknown[]) {
    this.write(LogLevel.SUCCESS, undefined, message, args);
  }

  /**
   * Logger whose lines carry a component tag, e.g. `[registry]`
   */
  scope(component: string): Log {
    return {
      debug: (message, ...args) => this.write(LogLevel.DEBUG, component, message, args),
      info: (message, ...args) => this.write(LogLevel.INFO, component, message, args),
      warn: (message, ...args) => this.write(LogLevel.WARN, component, message, args),
      error: (message, error, ...args) => this.write(LogLevel.ERROR, component, message, args, error),
      success: (message, ...args) => this.write(LogLevel.SUCCESS, component, message, args),
    };
  }

  private write(level: LogLevel, component: string | undefined, message: string, args: unknown[], error?: unknown) {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const tag = component ? ` ${chalk.magenta(`[${component}]`)}` : '';
    const formattedMessage = `${chalk.gray(timestamp)} ${this.getPrefix(level)}${tag} ${message}`;

    // Warnings and errors go to stderr
    if (level === LogLevel.ERROR || level === LogLevel.WARN) {
      console.error(formattedMessage, ...args);
    } else {
      console.log(formattedMessage, ...args);
    }

    if (error instanceof Error) {
      console.error(chalk.red(error.stack || error.message));
    } else if (error) {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  private getPrefix(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return chalk.gray('[DEBUG]');
      case LogLevel.INFO:
        return chalk.blue('[INFO]');
      case LogLevel.WARN:
        return chalk.yellow('[WARN]');
      case LogLevel.ERROR:
        return chalk.red('[ERROR]');
      case LogLevel.SUCCESS:
        return chalk.green('[SUCCESS]');
    }
  }
}

export const logger = Logger.getInstance();

export function createLogger(component: string): Log {
  return logger.scope(component);
}
