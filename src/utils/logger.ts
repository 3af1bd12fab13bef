// src/utils/logger.ts
import * as winston from 'winston';
import { createLogger, isSilenced, parseLoggingConfig } from './configurable-logger';
import { LoggingConfig, LogLevel } from '../types/config.types';
import { describeError } from './errors';

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find(level => level === value);
}

let loggingConfig: LoggingConfig | undefined;

// Inline config from the environment wins over the console default
if (process.env.LOGGING_CONFIG) {
  try {
    loggingConfig = parseLoggingConfig(JSON.parse(process.env.LOGGING_CONFIG));
  } catch (e) {
    console.warn(`Failed to parse LOGGING_CONFIG from environment: ${describeError(e)}`);
  }
}

const logger: winston.Logger = createLogger(
  loggingConfig ?? { logLevel: parseLogLevel(process.env.LOG_LEVEL) ?? 'info' }
);

// Wrapper class for consistent logging interface
export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  /**
   * Initialize logger with configuration
   * Call this at application startup with your config
   */
  static initialize(config: LoggingConfig): void {
    const newLogger = createLogger(config);

    // Swap transports in place so module-level references keep working
    logger.clear();
    newLogger.transports.forEach(transport => {
      logger.add(transport);
    });

    logger.level = newLogger.level;
    logger.format = newLogger.format;
    logger.silent = isSilenced();
  }

  static setLevel(level: LogLevel): void {
    logger.level = level;
  }

  info(message: string): void {
    logger.info(`[${this.context}] ${message}`);
  }

  warn(message: string): void {
    logger.warn(`[${this.context}] ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      logger.error(`[${this.context}] ${message}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`);
    } else if (error !== undefined) {
      logger.error(`[${this.context}] ${message}: ${String(error)}`);
    } else {
      logger.error(`[${this.context}] ${message}`);
    }
  }

  debug(message: string): void {
    logger.debug(`[${this.context}] ${message}`);
  }
}
