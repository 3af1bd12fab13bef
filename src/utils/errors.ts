// src/utils/errors.ts

/**
 * Raised when a source grid cannot be read or the output cannot be written.
 */
export class ConversionError extends Error {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConversionError';
    this.filePath = filePath;
  }
}

export class ConfigError extends Error {
  readonly configPath: string;

  constructor(message: string, configPath: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
    this.configPath = configPath;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
