// src/parsers/HoldCellExtractor.ts
import { ANGLE_DIGITS_PATTERN } from '../config/patterns';
import { GridLayout } from '../types/config.types';
import { HeaderPair, HoldFact, RowId } from '../types/hold.types';
import { ColumnStride, positionalColumn, resolveColumn } from './ColumnResolver';

/**
 * First run of digits in an angle cell ("180˚" -> 180), or null.
 */
export function parseAngle(text: string): number | null {
  const match = ANGLE_DIGITS_PATTERN.exec(text);
  return match ? parseInt(match[0], 10) : null;
}

export function defaultHoldLabel(column: number, row: RowId): string {
  return `C${column}_R${row}`;
}

/**
 * Turn one header pair into hold facts, one per data cell that carries
 * an angle and resolves to a column.
 */
export function extractHoldFacts(rows: string[][], pair: HeaderPair, layout: GridLayout): HoldFact[] {
  const stride: ColumnStride = { start: layout.columnStart, step: layout.columnStep };
  const facts: HoldFact[] = [];

  for (let j = layout.firstDataCell; j <= layout.lastDataCell; j++) {
    const angleText = pair.angleRow[j]?.trim() ?? '';
    if (angleText === '') continue;

    const angle = parseAngle(angleText);
    if (angle === null) continue;

    const column = pair.kickboard
      ? positionalColumn(j, stride)
      : resolveColumn(rows, pair.rowIndex, j, stride);
    if (!column) continue;

    facts.push({
      column,
      row: pair.rowId,
      angle,
      label: pair.labelRow[j]?.trim() ?? '',
      defaultLabel: defaultHoldLabel(column, pair.rowId),
      orientation: layout.orientation
    });
  }

  return facts;
}
