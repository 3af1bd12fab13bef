// src/utils/configurable-logger.ts
import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { LoggingConfig, LoggingProfile, LogLevel } from '../types/config.types';
import { describeError } from './errors';

// Default logging profiles
const DEFAULT_PROFILES: { [key: string]: LoggingProfile } = {
  Default: {
    appendTimestamp: false,
    timestampFormat: '',
    logLevel: 'info',
    enableFileLog: false,
    enableWarningLog: false,
    logDirectory: 'logs'
  },
  Files: {
    appendTimestamp: false,
    timestampFormat: '',
    logLevel: 'info',
    enableFileLog: true,
    enableWarningLog: true,
    logDirectory: 'logs'
  },
  AppendDatetime: {
    appendTimestamp: true,
    timestampFormat: 'YYYY-MM-DD-HHmmss',
    logLevel: 'info',
    enableFileLog: true,
    enableWarningLog: true,
    logDirectory: 'logs'
  }
};

const consoleLine = winston.format.printf(({ level, message, timestamp }) => {
  return `${timestamp} [${level}]: ${message}`;
});

const LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

function pickBoolean(source: Record<string, unknown>, key: string): boolean | undefined {
  const value = source[key];
  return typeof value === 'boolean' ? value : undefined;
}

function pickLevel(source: Record<string, unknown>): LogLevel | undefined {
  return LEVELS.find(level => level === source.logLevel);
}

/**
 * Narrow parsed JSON to a LoggingConfig. Fields of the wrong type are
 * dropped; custom profiles are completed from the Default profile.
 */
export function parseLoggingConfig(raw: unknown): LoggingConfig {
  if (!isRecord(raw)) {
    throw new TypeError('Logging config must be a JSON object');
  }

  const config: LoggingConfig = {
    profile: pickString(raw, 'profile'),
    appendTimestamp: pickBoolean(raw, 'appendTimestamp'),
    timestampFormat: pickString(raw, 'timestampFormat'),
    logLevel: pickLevel(raw),
    enableFileLog: pickBoolean(raw, 'enableFileLog'),
    enableWarningLog: pickBoolean(raw, 'enableWarningLog'),
    logDirectory: pickString(raw, 'logDirectory')
  };

  if (isRecord(raw.profiles)) {
    const profiles: { [key: string]: LoggingProfile } = {};
    for (const [name, value] of Object.entries(raw.profiles)) {
      if (!isRecord(value)) continue;
      const base = DEFAULT_PROFILES.Default;
      profiles[name] = {
        appendTimestamp: pickBoolean(value, 'appendTimestamp') ?? base.appendTimestamp,
        timestampFormat: pickString(value, 'timestampFormat') ?? base.timestampFormat,
        logLevel: pickLevel(value) ?? base.logLevel,
        enableFileLog: pickBoolean(value, 'enableFileLog') ?? base.enableFileLog,
        enableWarningLog: pickBoolean(value, 'enableWarningLog') ?? base.enableWarningLog,
        logDirectory: pickString(value, 'logDirectory') ?? base.logDirectory
      };
    }
    config.profiles = profiles;
  }

  return config;
}

export function isSilenced(): boolean {
  return process.env.LOG_SILENT === 'true';
}

export class ConfigurableLogger {
  private static config: LoggingProfile | null = null;
  private static startedAt: Date = new Date();

  /**
   * Initialize the logger with configuration
   */
  static initialize(config?: LoggingConfig): winston.Logger {
    const effectiveConfig = this.resolveConfig(config);
    this.config = effectiveConfig;
    this.startedAt = new Date();

    const logger = winston.createLogger({
      level: effectiveConfig.logLevel,
      silent: isSilenced(),
      format: winston.format.combine(
        winston.format.timestamp({
          format: 'YYYY-MM-DD HH:mm:ss'
        }),
        winston.format.errors({ stack: true })
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(winston.format.colorize(), consoleLine)
        })
      ]
    });

    if (effectiveConfig.enableFileLog) {
      const logsDir = path.join(process.cwd(), effectiveConfig.logDirectory);
      try {
        if (!fs.existsSync(logsDir)) {
          fs.mkdirSync(logsDir, { recursive: true });
        }
      } catch (error) {
        logger.warn(`Could not create logs directory ${logsDir} (${describeError(error)}), using console only`);
        return logger;
      }

      const files = this.getLogFiles();

      // Combined log (all levels)
      logger.add(new winston.transports.File({
        filename: path.join(logsDir, files.combined),
        format: consoleLine
      }));

      logger.add(new winston.transports.File({
        filename: path.join(logsDir, files.error),
        level: 'error',
        format: winston.format.printf(({ level, message, timestamp, stack }) => {
          return `${timestamp} [${level}]: ${message}${stack ? `\n${stack}` : ''}`;
        })
      }));

      if (files.warning) {
        logger.add(new winston.transports.File({
          filename: path.join(logsDir, files.warning),
          level: 'warn',
          format: consoleLine
        }));
      }
    }

    return logger;
  }

  /**
   * Resolve the effective logging configuration
   */
  static resolveConfig(config?: LoggingConfig): LoggingProfile {
    if (!config) {
      return DEFAULT_PROFILES.Default;
    }

    if (config.profile) {
      // Custom profiles shadow the built-in ones
      const custom = config.profiles?.[config.profile];
      if (custom) {
        return custom;
      }
      const builtIn = DEFAULT_PROFILES[config.profile];
      if (builtIn) {
        return builtIn;
      }
      console.warn(`Logging profile '${config.profile}' not found, using Default`);
      return DEFAULT_PROFILES.Default;
    }

    return {
      appendTimestamp: config.appendTimestamp ?? false,
      timestampFormat: config.timestampFormat || 'YYYY-MM-DD-HHmmss',
      logLevel: config.logLevel || 'info',
      enableFileLog: config.enableFileLog ?? false,
      enableWarningLog: config.enableWarningLog !== false,
      logDirectory: config.logDirectory || 'logs'
    };
  }

  /**
   * Generate log filename based on configuration
   */
  static generateLogFilename(baseName: string, config: LoggingProfile, now: Date = this.startedAt): string {
    if (!config.appendTimestamp) {
      return baseName;
    }

    let timestamp: string;

    if (config.timestampFormat === 'YYYY-MM-DD-HHmmss') {
      const year = now.getFullYear();
      const month = String(now.getMonth() + 1).padStart(2, '0');
      const day = String(now.getDate()).padStart(2, '0');
      const hours = String(now.getHours()).padStart(2, '0');
      const minutes = String(now.getMinutes()).padStart(2, '0');
      const seconds = String(now.getSeconds()).padStart(2, '0');
      timestamp = `${year}-${month}-${day}-${hours}${minutes}${seconds}`;
    } else {
      timestamp = now.toISOString().replace(/[:.]/g, '-').slice(0, -5);
    }

    const ext = path.extname(baseName);
    const name = path.basename(baseName, ext);

    return `${name}-${timestamp}${ext}`;
  }

  /**
   * Get current log files being used
   */
  static getLogFiles(): { combined: string; error: string; warning?: string } {
    const config = this.config ?? this.resolveConfig();

    const result: { combined: string; error: string; warning?: string } = {
      combined: this.generateLogFilename('combined.log', config),
      error: this.generateLogFilename('error.log', config)
    };

    if (config.enableWarningLog) {
      result.warning = this.generateLogFilename('warning.log', config);
    }

    return result;
  }

  /**
   * Full paths to the log files, or null when only the console is used
   */
  static getLogFilePaths(): { combined: string; error: string; warning?: string } | null {
    const config = this.config ?? this.resolveConfig();
    if (!config.enableFileLog) {
      return null;
    }

    const files = this.getLogFiles();
    const logsDir = path.join(process.cwd(), config.logDirectory);

    const result: { combined: string; error: string; warning?: string } = {
      combined: path.join(logsDir, files.combined),
      error: path.join(logsDir, files.error)
    };

    if (files.warning) {
      result.warning = path.join(logsDir, files.warning);
    }

    return result;
  }
}

export function createLogger(config?: LoggingConfig): winston.Logger {
  return ConfigurableLogger.initialize(config);
}
