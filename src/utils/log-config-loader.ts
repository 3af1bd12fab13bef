// src/utils/log-config-loader.ts
import * as fs from 'fs';
import * as path from 'path';
import { LoggingConfig } from '../types/config.types';
import { parseLoggingConfig } from './configurable-logger';
import { describeError } from './errors';
import { Logger } from './logger';

/**
 * Load logging configuration from config/log-config.json
 * Falls back to the passed configuration if the file is missing or broken
 */
export function loadLoggingConfig(fallbackConfig?: LoggingConfig, baseDir: string = process.cwd()): LoggingConfig | undefined {
  const logConfigPath = path.join(baseDir, 'config', 'log-config.json');

  try {
    if (fs.existsSync(logConfigPath)) {
      const configContent = fs.readFileSync(logConfigPath, 'utf-8');
      return parseLoggingConfig(JSON.parse(configContent));
    }
  } catch (error) {
    console.warn(`Failed to load log-config.json: ${describeError(error)}`);
  }

  return fallbackConfig;
}

/**
 * Initialize logger with centralized config or fallback
 * This should be called at the start of any CLI command
 */
export function initializeLogger(fallbackConfig?: LoggingConfig): void {
  const loggingConfig = loadLoggingConfig(fallbackConfig);

  if (loggingConfig) {
    Logger.initialize(loggingConfig);

    const logger = new Logger('LogConfigLoader');
    logger.debug(`Initialized logger with profile: ${loggingConfig.profile || 'custom'}`);
  }
}
