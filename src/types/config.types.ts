// src/types/config.types.ts
import { Orientation } from './hold.types';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingProfile {
  appendTimestamp: boolean;
  timestampFormat: string;
  logLevel: LogLevel;
  enableFileLog: boolean;
  enableWarningLog: boolean;
  logDirectory: string;
}

export interface LoggingConfig {
  profile?: string;
  profiles?: { [key: string]: LoggingProfile };
  appendTimestamp?: boolean;
  timestampFormat?: string;
  logLevel?: LogLevel;
  enableFileLog?: boolean;
  enableWarningLog?: boolean;
  logDirectory?: string;
}

/**
 * Where the pieces of one source grid sit, and how data cells map to
 * wall columns when no "C-<n>" label is close enough to use.
 */
export interface GridLayout {
  orientation: Orientation;
  rowIdIndex: number;
  minRowWidth: number;
  firstDataCell: number;
  lastDataCell: number;
  columnStart: number;
  columnStep: number;
  kickboardRow: string;
  kickboardDefault: [number, number];
}

export interface ConverterConfig {
  horizontal: GridLayout;
  vertical: GridLayout;
  firstColumn: number;
  lastColumn: number;
  title: string;
  includeTrace: boolean;
}

export type ConverterConfigOverrides = Partial<Omit<ConverterConfig, 'horizontal' | 'vertical'>> & {
  horizontal?: Partial<GridLayout>;
  vertical?: Partial<GridLayout>;
};
