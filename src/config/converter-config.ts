// src/config/converter-config.ts
import * as fs from 'fs';
import * as path from 'path';
import { ConverterConfig, ConverterConfigOverrides, GridLayout } from '../types/config.types';
import { ConfigError, describeError } from '../utils/errors';
import { Logger } from '../utils/logger';

const logger = new Logger('ConverterConfig');

export const DEFAULT_CONFIG_PATH = path.join('config', 'converter-config.json');

// Reference layout: mainline grid has even columns C-2..C-26, aux grid odd C-1..C-27
export const DEFAULT_CONVERTER_CONFIG: ConverterConfig = {
  horizontal: {
    orientation: 'horizontal',
    rowIdIndex: 14,
    minRowWidth: 14,
    firstDataCell: 1,
    lastDataCell: 13,
    columnStart: 2,
    columnStep: 2,
    kickboardRow: 'K1',
    kickboardDefault: [180, 0]
  },
  vertical: {
    orientation: 'vertical',
    rowIdIndex: 15,
    minRowWidth: 15,
    firstDataCell: 1,
    lastDataCell: 14,
    columnStart: 1,
    columnStep: 2,
    kickboardRow: 'K2',
    kickboardDefault: [0, 90]
  },
  firstColumn: 1,
  lastColumn: 27,
  title: 'Hold angle data',
  includeTrace: true
};

const NUMERIC_LAYOUT_FIELDS = [
  'rowIdIndex',
  'minRowWidth',
  'firstDataCell',
  'lastDataCell',
  'columnStart',
  'columnStep'
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAnglePair(value: unknown): value is [number, number] {
  return Array.isArray(value) && value.length === 2 && value.every(v => Number.isInteger(v));
}

function readLayoutOverrides(raw: unknown, key: string, configPath: string): Partial<GridLayout> | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`"${key}" must be an object`, configPath);
  }

  const layout: Partial<GridLayout> = {};
  for (const field of NUMERIC_LAYOUT_FIELDS) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new ConfigError(`"${key}.${field}" must be an integer`, configPath);
    }
    layout[field] = value;
  }

  if (raw.kickboardRow !== undefined) {
    if (typeof raw.kickboardRow !== 'string' || raw.kickboardRow === '') {
      throw new ConfigError(`"${key}.kickboardRow" must be a non-empty string`, configPath);
    }
    layout.kickboardRow = raw.kickboardRow;
  }

  if (raw.kickboardDefault !== undefined) {
    if (!isAnglePair(raw.kickboardDefault)) {
      throw new ConfigError(`"${key}.kickboardDefault" must be a pair of integer angles`, configPath);
    }
    layout.kickboardDefault = raw.kickboardDefault;
  }

  return layout;
}

/**
 * Validate a parsed config document. Unknown keys are ignored; orientation
 * is fixed per grid and cannot be overridden.
 */
export function parseConverterConfig(raw: unknown, configPath: string): ConverterConfigOverrides {
  if (!isRecord(raw)) {
    throw new ConfigError('Converter config must be a JSON object', configPath);
  }

  const overrides: ConverterConfigOverrides = {
    horizontal: readLayoutOverrides(raw.horizontal, 'horizontal', configPath),
    vertical: readLayoutOverrides(raw.vertical, 'vertical', configPath)
  };

  for (const field of ['firstColumn', 'lastColumn'] as const) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      throw new ConfigError(`"${field}" must be a positive integer`, configPath);
    }
    overrides[field] = value;
  }

  if (raw.title !== undefined) {
    if (typeof raw.title !== 'string') {
      throw new ConfigError('"title" must be a string', configPath);
    }
    overrides.title = raw.title;
  }

  if (raw.includeTrace !== undefined) {
    if (typeof raw.includeTrace !== 'boolean') {
      throw new ConfigError('"includeTrace" must be a boolean', configPath);
    }
    overrides.includeTrace = raw.includeTrace;
  }

  return overrides;
}

export function mergeConverterConfig(
  overrides: ConverterConfigOverrides = {},
  base: ConverterConfig = DEFAULT_CONVERTER_CONFIG
): ConverterConfig {
  return {
    horizontal: { ...base.horizontal, ...overrides.horizontal, orientation: 'horizontal' },
    vertical: { ...base.vertical, ...overrides.vertical, orientation: 'vertical' },
    firstColumn: overrides.firstColumn ?? base.firstColumn,
    lastColumn: overrides.lastColumn ?? base.lastColumn,
    title: overrides.title ?? base.title,
    includeTrace: overrides.includeTrace ?? base.includeTrace
  };
}

/**
 * Load converter config from a JSON file. An explicit path must exist;
 * the default path is optional and falls back to the built-in layout.
 */
export function loadConverterConfig(configPath?: string): ConverterConfig {
  const pathToUse = configPath || DEFAULT_CONFIG_PATH;

  if (!fs.existsSync(pathToUse)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    logger.debug('No converter config found, using built-in layout');
    return mergeConverterConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(pathToUse, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to read config ${pathToUse}: ${describeError(error)}`, pathToUse, error);
  }

  logger.debug(`Loaded converter config from: ${pathToUse}`);
  return mergeConverterConfig(parseConverterConfig(raw, pathToUse));
}
