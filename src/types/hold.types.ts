// src/types/hold.types.ts

export type Orientation = 'horizontal' | 'vertical';

/**
 * Numbered rows come from "R-<n>" labels; kickboard rows keep their
 * token ("K1", "K2"). A numbered label with a non-digit suffix keeps the
 * suffix as text.
 */
export type RowId = number | string;

export interface HoldKey {
  column: number;
  row: RowId;
}

export interface HoldEntry {
  angleH: number;
  angleV: number;
  holdNumber: string;
}

export interface HeaderPair {
  rowIndex: number;
  rowId: RowId;
  labelRow: string[];
  angleRow: string[];
  kickboard: boolean;
}

export interface HoldFact extends HoldKey {
  angle: number;
  label: string;
  defaultLabel: string;
  orientation: Orientation;
}

export interface HoldMapSummary {
  totalHolds: number;
  horizontalHolds: number;
  verticalHolds: number;
  horizontalKickboardHolds: number;
  verticalKickboardHolds: number;
}
