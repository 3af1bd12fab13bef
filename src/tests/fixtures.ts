// src/tests/fixtures.ts
// Row builders for synthetic hold map grids

export const MAINLINE_WIDTH = 15;
export const AUX_WIDTH = 16;

export function makeRow(width: number, cells: Record<number, string>): string[] {
  const row: string[] = new Array<string>(width).fill('');
  for (const [index, value] of Object.entries(cells)) {
    row[Number(index)] = value;
  }
  return row;
}

export function mainlineRow(cells: Record<number, string>): string[] {
  return makeRow(MAINLINE_WIDTH, cells);
}

export function auxRow(cells: Record<number, string>): string[] {
  return makeRow(AUX_WIDTH, cells);
}

export function toCsv(rows: string[][]): string {
  return rows.map(row => row.join(',')).join('\n') + '\n';
}
