// src/services/ScadSerializer.ts
import { NUMBERED_ROW_PATTERN } from '../config/patterns';
import { RowId } from '../types/hold.types';
import { HoldTable } from './HoldTable';
import { loadTemplate, MustacheTemplateEngine, TemplateEngine } from './TemplateEngine';

export const SCAD_TEMPLATE = 'hold-data.scad.mustache';

export interface ScadRenderOptions {
  title: string;
  includeTrace: boolean;
  horizontalKickboardRow: string;
  verticalKickboardRow: string;
  evenColumnDefault: [number, number];
  oddColumnDefault: [number, number];
}

export function holdKey(column: number, row: RowId): string {
  return `${column}_${row}`;
}

// Numbered rows first, then kickboard rows in the given order, then the rest
function rowRank(row: RowId, kickboardOrder: readonly string[]): [number, number | string] {
  const text = String(row);
  if (NUMBERED_ROW_PATTERN.test(text)) {
    return [1, Number(text)];
  }
  const kickboardIndex = kickboardOrder.indexOf(text);
  if (kickboardIndex >= 0) {
    return [2, kickboardIndex];
  }
  return [3, text];
}

export function compareRowIds(a: RowId, b: RowId, kickboardOrder: readonly string[] = ['K1', 'K2']): number {
  const [rankA, valueA] = rowRank(a, kickboardOrder);
  const [rankB, valueB] = rowRank(b, kickboardOrder);

  if (rankA !== rankB) {
    return rankA - rankB;
  }
  if (typeof valueA === 'number' && typeof valueB === 'number') {
    return valueA - valueB;
  }
  const textA = String(valueA);
  const textB = String(valueB);
  return textA < textB ? -1 : textA > textB ? 1 : 0;
}

export function escapeScadString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function formatPair([first, second]: [number, number]): string {
  return `[${first}, ${second}]`;
}

/**
 * Renders a hold table as OpenSCAD: the angle_data and hold_numbers
 * arrays followed by the lookup functions that read them.
 */
export class ScadSerializer {
  private engine: TemplateEngine;
  private template: string;

  constructor(engine: TemplateEngine = new MustacheTemplateEngine(), template: string = loadTemplate(SCAD_TEMPLATE)) {
    this.engine = engine;
    this.template = template;
  }

  render(table: HoldTable, options: ScadRenderOptions): string {
    const kickboardOrder = [options.horizontalKickboardRow, options.verticalKickboardRow];
    const angles: Array<{ key: string; angleH: number; angleV: number }> = [];
    const holdNumbers: Array<{ key: string; label: string }> = [];

    for (const column of table.columnNumbers()) {
      const rows = table.rowIds(column).sort((a, b) => compareRowIds(a, b, kickboardOrder));
      for (const row of rows) {
        const entry = table.get(column, row);
        if (!entry) continue;

        const key = holdKey(column, row);
        angles.push({ key, angleH: entry.angleH, angleV: entry.angleV });
        holdNumbers.push({ key, label: escapeScadString(entry.holdNumber) });
      }
    }

    return this.engine.render(this.template, {
      title: options.title,
      trace: options.includeTrace,
      angles,
      holdNumbers,
      horizontalKickboardRow: escapeScadString(options.horizontalKickboardRow),
      verticalKickboardRow: escapeScadString(options.verticalKickboardRow),
      evenDefault: formatPair(options.evenColumnDefault),
      oddDefault: formatPair(options.oddColumnDefault)
    });
  }
}
