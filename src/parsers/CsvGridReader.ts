// src/parsers/CsvGridReader.ts
import * as fs from 'fs';
import { pipeline, Readable } from 'stream';
import csv from 'csv-parser';

type CsvRecord = Record<string, string>;

// Without headers csv-parser keys each cell by its column index
function toCells(record: CsvRecord): string[] {
  const cells: string[] = [];
  for (let i = 0; String(i) in record; i++) {
    cells.push(record[String(i)]);
  }
  return cells;
}

/**
 * Read a whole CSV stream into rows of raw cell text.
 */
export function readCsvRows(input: Readable, options: csv.Options = {}): Promise<string[][]> {
  const rows: string[][] = [];

  return new Promise<string[][]>((resolve, reject) => {
    const parser = csv({ ...options, headers: false });
    parser.on('data', (record: CsvRecord) => {
      rows.push(toCells(record));
    });

    // pipeline tears down the source when the parser fails
    pipeline(input, parser, error => {
      if (error) {
        reject(error);
      } else {
        resolve(rows);
      }
    });
  });
}

export function readCsvFile(filePath: string, options: csv.Options = {}): Promise<string[][]> {
  return readCsvRows(fs.createReadStream(filePath), options);
}
