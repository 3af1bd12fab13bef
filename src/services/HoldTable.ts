// src/services/HoldTable.ts
import { HoldEntry, HoldFact, HoldMapSummary, Orientation, RowId } from '../types/hold.types';

/**
 * Hold data keyed by column, then row. Each source writes only the angle
 * slot of its own orientation; the first label written for a key is kept.
 */
export class HoldTable {
  private columns = new Map<number, Map<RowId, HoldEntry>>();

  upsert(fact: HoldFact): HoldEntry {
    let rows = this.columns.get(fact.column);
    if (!rows) {
      rows = new Map<RowId, HoldEntry>();
      this.columns.set(fact.column, rows);
    }

    const existing = rows.get(fact.row);
    if (existing) {
      setAngle(existing, fact.orientation, fact.angle);
      return existing;
    }

    const entry: HoldEntry = {
      angleH: 0,
      angleV: 0,
      holdNumber: fact.label || fact.defaultLabel
    };
    setAngle(entry, fact.orientation, fact.angle);
    rows.set(fact.row, entry);
    return entry;
  }

  /**
   * Insert an entry only if the key is free. Returns true when inserted.
   */
  insertIfAbsent(column: number, row: RowId, entry: HoldEntry): boolean {
    let rows = this.columns.get(column);
    if (!rows) {
      rows = new Map<RowId, HoldEntry>();
      this.columns.set(column, rows);
    }
    if (rows.has(row)) {
      return false;
    }
    rows.set(row, { ...entry });
    return true;
  }

  get(column: number, row: RowId): HoldEntry | undefined {
    return this.columns.get(column)?.get(row);
  }

  has(column: number, row: RowId): boolean {
    return this.columns.get(column)?.has(row) ?? false;
  }

  get size(): number {
    let total = 0;
    for (const rows of this.columns.values()) {
      total += rows.size;
    }
    return total;
  }

  columnNumbers(): number[] {
    return [...this.columns.keys()].sort((a, b) => a - b);
  }

  rowIds(column: number): RowId[] {
    return [...(this.columns.get(column)?.keys() ?? [])];
  }

  summarize(horizontalKickboardRow: RowId, verticalKickboardRow: RowId): HoldMapSummary {
    const summary: HoldMapSummary = {
      totalHolds: 0,
      horizontalHolds: 0,
      verticalHolds: 0,
      horizontalKickboardHolds: 0,
      verticalKickboardHolds: 0
    };

    for (const [column, rows] of this.columns) {
      summary.totalHolds += rows.size;
      if (column % 2 === 0) {
        summary.horizontalHolds += rows.size;
        if (rows.has(horizontalKickboardRow)) summary.horizontalKickboardHolds++;
      } else {
        summary.verticalHolds += rows.size;
        if (rows.has(verticalKickboardRow)) summary.verticalKickboardHolds++;
      }
    }

    return summary;
  }
}

function setAngle(entry: HoldEntry, orientation: Orientation, angle: number): void {
  if (orientation === 'horizontal') {
    entry.angleH = angle;
  } else {
    entry.angleV = angle;
  }
}
