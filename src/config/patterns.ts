// src/config/patterns.ts

// Leading-cell markers in the hold map grids
export const GRID_MARKERS = {
  kickboardSection: 'Kickboard Below',
  holdNumberRow: 'Hold #',
  angleRow: 'Angle'
} as const;

export const ROW_LABEL_PREFIX = {
  numbered: 'R-',
  kickboard: 'K-'
} as const;

// e.g. "C-14" above a data cell
export const COLUMN_LABEL_PATTERN = /C-(\d+)/;

// e.g. "180˚" -> 180
export const ANGLE_DIGITS_PATTERN = /\d+/;

export const NUMBERED_ROW_PATTERN = /^\d+$/;

// Rows above a header pair searched for a column label
export const COLUMN_LOOKBACK_ROWS = 4;

// Rows, starting at the header pair, searched for a kickboard label
export const KICKBOARD_LOOKAHEAD_ROWS = 3;
