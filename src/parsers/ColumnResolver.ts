// src/parsers/ColumnResolver.ts
import { COLUMN_LABEL_PATTERN, COLUMN_LOOKBACK_ROWS } from '../config/patterns';

export interface ColumnStride {
  start: number;
  step: number;
}

/**
 * Column implied by a data cell's position alone.
 */
export function positionalColumn(cellIndex: number, stride: ColumnStride): number {
  return stride.start + (cellIndex - 1) * stride.step;
}

/**
 * Resolve the wall column for cell `cellIndex` of the header pair at
 * `rowIndex`. A "C-<n>" label in the same cell position of the rows just
 * above wins; otherwise the column is inferred from position.
 *
 * The lookback never reaches row 0. A label of C-0 leaves the cell
 * unresolved.
 */
export function resolveColumn(
  rows: string[][],
  rowIndex: number,
  cellIndex: number,
  stride: ColumnStride
): number | null {
  const stop = Math.max(0, rowIndex - COLUMN_LOOKBACK_ROWS - 1);

  for (let k = rowIndex - 1; k > stop; k--) {
    const cell = rows[k]?.[cellIndex]?.trim();
    if (!cell) continue;

    const match = COLUMN_LABEL_PATTERN.exec(cell);
    if (match) {
      const column = parseInt(match[1], 10);
      return column > 0 ? column : null;
    }
  }

  return positionalColumn(cellIndex, stride);
}
