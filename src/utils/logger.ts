import { config } from "../config";

interface LogLevel {
  ERROR: "error";
  WARN: "warn";
  INFO: "info";
  DEBUG: "debug";
}

const LOG_LEVELS: LogLevel = {
  ERROR: "error",
  WARN: "warn",
  INFO: "info",
  DEBUG: "debug",
};

const LEVEL_ORDER = ["error", "warn", "info", "debug"];

export class Logger {
  private logLevel: string;

  // "silent" or any unknown level disables output
  constructor(logLevel: string = config.logLevel) {
    this.logLevel = logLevel;
  }

  setLevel(logLevel: string): void {
    this.logLevel = logLevel;
  }

  private shouldLog(level: string): boolean {
    const currentLevelIndex = LEVEL_ORDER.indexOf(this.logLevel);
    const messageLevelIndex = LEVEL_ORDER.indexOf(level);

    return messageLevelIndex <= currentLevelIndex;
  }

  formatMessage(level: string, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const baseMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`;

    if (data !== undefined) {
      return `${baseMessage}\n${JSON.stringify(data, null, 2)}`;
    }

    return baseMessage;
  }

  error(message: string, data?: unknown): void {
    if (this.shouldLog(LOG_LEVELS.ERROR)) {
      console.error(this.formatMessage(LOG_LEVELS.ERROR, message, data));
    }
  }

  warn(message: string, data?: unknown): void {
    if (this.shouldLog(LOG_LEVELS.WARN)) {
      console.warn(this.formatMessage(LOG_LEVELS.WARN, message, data));
    }
  }

  info(message: string, data?: unknown): void {
    if (this.shouldLog(LOG_LEVELS.INFO)) {
      console.info(this.formatMessage(LOG_LEVELS.INFO, message, data));
    }
  }

  debug(message: string, data?: unknown): void {
    if (this.shouldLog(LOG_LEVELS.DEBUG)) {
      console.debug(this.formatMessage(LOG_LEVELS.DEBUG, message, data));
    }
  }
}

export const logger = new Logger();
