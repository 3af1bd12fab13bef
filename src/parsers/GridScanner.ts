// src/parsers/GridScanner.ts
import { GRID_MARKERS, KICKBOARD_LOOKAHEAD_ROWS, NUMBERED_ROW_PATTERN, ROW_LABEL_PREFIX } from '../config/patterns';
import { GridLayout } from '../types/config.types';
import { HeaderPair, RowId } from '../types/hold.types';

export interface ScannerState {
  currentRowId: RowId | null;
  kickboardActive: boolean;
}

export const INITIAL_SCANNER_STATE: ScannerState = {
  currentRowId: null,
  kickboardActive: false
};

interface ScanStep {
  state: ScannerState;
  pair?: HeaderPair;
}

/**
 * Parse a row identifier cell: "R-12" -> 12, "K-1" -> "K1".
 * Returns null for anything that is not a row label.
 */
export function parseRowLabel(text: string): RowId | null {
  const label = text.trim();

  if (label.startsWith(ROW_LABEL_PREFIX.numbered)) {
    const suffix = label.split('-')[1];
    if (suffix === '') {
      return null;
    }
    return NUMBERED_ROW_PATTERN.test(suffix) ? Number(suffix) : suffix;
  }

  if (label.startsWith(ROW_LABEL_PREFIX.kickboard)) {
    return label.replace(ROW_LABEL_PREFIX.kickboard, 'K');
  }

  return null;
}

export function isKickboardRowId(rowId: RowId | null, layout: GridLayout): rowId is string {
  return rowId === layout.kickboardRow;
}

function cellText(row: string[] | undefined, index: number): string {
  return row?.[index]?.trim() ?? '';
}

function startsHeaderPair(rows: string[][], index: number): boolean {
  const next = rows[index + 1];
  return cellText(rows[index], 0) === GRID_MARKERS.holdNumberRow
    && next !== undefined
    && next.length > 0
    && cellText(next, 0) === GRID_MARKERS.angleRow;
}

function findKickboardLabel(rows: string[][], index: number, layout: GridLayout): RowId | null {
  for (let k = index; k < index + KICKBOARD_LOOKAHEAD_ROWS && k < rows.length; k++) {
    const label = cellText(rows[k], layout.rowIdIndex);
    if (label.startsWith(ROW_LABEL_PREFIX.kickboard)) {
      return parseRowLabel(label);
    }
  }
  return null;
}

/**
 * Advance the scanner over one row. Returns the next state and, when the
 * row opens a usable "Hold #"/"Angle" pair, the pair itself.
 */
export function scanRow(state: ScannerState, rows: string[][], index: number, layout: GridLayout): ScanStep {
  const row = rows[index];
  const leading = cellText(row, 0);

  if (row.length < layout.minRowWidth || leading === '') {
    return { state };
  }

  let { currentRowId, kickboardActive } = state;

  if (leading === GRID_MARKERS.kickboardSection) {
    kickboardActive = true;
  }

  const label = parseRowLabel(cellText(row, layout.rowIdIndex));
  if (label !== null) {
    currentRowId = label;
  }

  if (!startsHeaderPair(rows, index)) {
    return { state: { currentRowId, kickboardActive } };
  }

  if (kickboardActive) {
    currentRowId = findKickboardLabel(rows, index, layout) ?? currentRowId;
    if (!isKickboardRowId(currentRowId, layout)) {
      return { state: { currentRowId, kickboardActive } };
    }
  } else if (currentRowId === null) {
    return { state: { currentRowId, kickboardActive } };
  }

  return {
    state: { currentRowId, kickboardActive },
    pair: {
      rowIndex: index,
      rowId: currentRowId,
      labelRow: row,
      angleRow: rows[index + 1],
      kickboard: kickboardActive
    }
  };
}

/**
 * Walk one source grid and collect every header pair with the row it
 * belongs to.
 */
export function scanGrid(rows: string[][], layout: GridLayout): HeaderPair[] {
  const pairs: HeaderPair[] = [];

  rows.reduce<ScannerState>((state, _row, index) => {
    const step = scanRow(state, rows, index, layout);
    if (step.pair) {
      pairs.push(step.pair);
    }
    return step.state;
  }, INITIAL_SCANNER_STATE);

  return pairs;
}
