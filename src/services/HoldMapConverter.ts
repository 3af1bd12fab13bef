// src/services/HoldMapConverter.ts
import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_CONVERTER_CONFIG } from '../config/converter-config';
import { readCsvFile } from '../parsers/CsvGridReader';
import { scanGrid } from '../parsers/GridScanner';
import { extractHoldFacts } from '../parsers/HoldCellExtractor';
import { ConverterConfig, GridLayout } from '../types/config.types';
import { HoldMapSummary } from '../types/hold.types';
import { ConversionError, describeError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { HoldTable } from './HoldTable';
import { fillKickboardDefaults } from './KickboardDefaults';
import { ScadSerializer } from './ScadSerializer';

export interface ConversionResult {
  table: HoldTable;
  scad: string;
  summary: HoldMapSummary;
}

export interface GridSources {
  mainline: string[][];
  aux: string[][];
}

export class HoldMapConverter {
  private logger = new Logger('HoldMapConverter');
  private config: ConverterConfig;
  private serializer: ScadSerializer;

  constructor(config: ConverterConfig = DEFAULT_CONVERTER_CONFIG, serializer: ScadSerializer = new ScadSerializer()) {
    this.config = config;
    this.serializer = serializer;
  }

  /**
   * Scan one source grid into the table. Returns the number of hold
   * cells read.
   */
  scanSource(table: HoldTable, rows: string[][], layout: GridLayout): number {
    const pairs = scanGrid(rows, layout);
    let cells = 0;

    for (const pair of pairs) {
      for (const fact of extractHoldFacts(rows, pair, layout)) {
        table.upsert(fact);
        cells++;
      }
    }

    this.logger.debug(`${layout.orientation}: ${pairs.length} header pairs, ${cells} hold cells`);
    return cells;
  }

  buildTable(sources: GridSources): HoldTable {
    const table = new HoldTable();

    this.scanSource(table, sources.mainline, this.config.horizontal);
    this.scanSource(table, sources.aux, this.config.vertical);

    const added = fillKickboardDefaults(table, this.config);
    this.logger.debug(`Added ${added} default kickboard holds`);

    return table;
  }

  convertRows(sources: GridSources): ConversionResult {
    const table = this.buildTable(sources);
    const scad = this.serializer.render(table, {
      title: this.config.title,
      includeTrace: this.config.includeTrace,
      horizontalKickboardRow: this.config.horizontal.kickboardRow,
      verticalKickboardRow: this.config.vertical.kickboardRow,
      evenColumnDefault: this.config.horizontal.kickboardDefault,
      oddColumnDefault: this.config.vertical.kickboardDefault
    });

    return {
      table,
      scad,
      summary: table.summarize(this.config.horizontal.kickboardRow, this.config.vertical.kickboardRow)
    };
  }

  async convertFiles(mainlinePath: string, auxPath: string, outputPath: string): Promise<ConversionResult> {
    this.logger.info(`Processing Mainline (horizontal) holds from: ${mainlinePath}`);
    const mainline = await this.readSource(mainlinePath);

    this.logger.info(`Processing Auxiliary (vertical) holds from: ${auxPath}`);
    const aux = await this.readSource(auxPath);

    const result = this.convertRows({ mainline, aux });

    try {
      const dir = path.dirname(outputPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      fs.writeFileSync(outputPath, result.scad, 'utf-8');
    } catch (error) {
      throw new ConversionError(`Failed to write ${outputPath}: ${describeError(error)}`, outputPath, error);
    }

    return result;
  }

  private async readSource(filePath: string): Promise<string[][]> {
    try {
      return await readCsvFile(filePath);
    } catch (error) {
      throw new ConversionError(`Failed to read ${filePath}: ${describeError(error)}`, filePath, error);
    }
  }
}
