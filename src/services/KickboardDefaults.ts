// src/services/KickboardDefaults.ts
import { ConverterConfig, GridLayout } from '../types/config.types';
import { HoldTable } from './HoldTable';

function columnsWithParity(config: ConverterConfig, parity: 0 | 1): number[] {
  const columns: number[] = [];
  for (let column = config.firstColumn; column <= config.lastColumn; column++) {
    if (column % 2 === parity) columns.push(column);
  }
  return columns;
}

function fillLayout(table: HoldTable, layout: GridLayout, columns: number[]): number {
  const [angleH, angleV] = layout.kickboardDefault;
  let inserted = 0;
  for (const column of columns) {
    if (table.insertIfAbsent(column, layout.kickboardRow, { angleH, angleV, holdNumber: layout.kickboardRow })) {
      inserted++;
    }
  }
  return inserted;
}

/**
 * Give every even column a horizontal kickboard hold and every odd column
 * a vertical one. Entries already read from a source are kept.
 * Returns the number of entries added.
 */
export function fillKickboardDefaults(table: HoldTable, config: ConverterConfig): number {
  return fillLayout(table, config.horizontal, columnsWithParity(config, 0))
    + fillLayout(table, config.vertical, columnsWithParity(config, 1));
}
