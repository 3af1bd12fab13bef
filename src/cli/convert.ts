#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import * as dotenv from 'dotenv';
import { loadConverterConfig } from '../config/converter-config';
import { ConversionResult, HoldMapConverter } from '../services/HoldMapConverter';
import { LogLevel } from '../types/config.types';
import { ConfigurableLogger } from '../utils/configurable-logger';
import { initializeLogger } from '../utils/log-config-loader';
import { Logger, parseLogLevel } from '../utils/logger';

dotenv.config();

const logger = new Logger('Convert');

export const USAGE = 'Usage: hold-map-scad <mainline_csv> <aux_csv> <output_file>';

export interface ConvertCommandOptions {
  trace: boolean;
  config?: string;
  logLevel?: LogLevel;
}

function parseLevelOption(value: string): LogLevel {
  const level = parseLogLevel(value);
  if (!level) {
    throw new InvalidArgumentError('Expected one of: error, warn, info, debug.');
  }
  return level;
}

export async function runConversion(
  mainlinePath: string,
  auxPath: string,
  outputPath: string,
  options: ConvertCommandOptions
): Promise<ConversionResult> {
  if (options.logLevel) {
    Logger.setLevel(options.logLevel);
  }

  const config = loadConverterConfig(options.config);
  config.includeTrace = config.includeTrace && options.trace;

  const converter = new HoldMapConverter(config);
  const result = await converter.convertFiles(mainlinePath, auxPath, outputPath);
  const { summary } = result;

  logger.info(`Successfully generated OpenSCAD code in ${outputPath}`);
  logger.info(`Found ${summary.totalHolds} holds`);
  logger.info(`Horizontal holds: ${summary.horizontalHolds}`);
  logger.info(`Vertical holds: ${summary.verticalHolds}`);
  logger.info(`${config.horizontal.kickboardRow} (horizontal kicker) holds: ${summary.horizontalKickboardHolds}`);
  logger.info(`${config.vertical.kickboardRow} (vertical kicker) holds: ${summary.verticalKickboardHolds}`);

  const logFiles = ConfigurableLogger.getLogFilePaths();
  if (logFiles) {
    logger.info(`Log written to: ${logFiles.combined}`);
  }

  return result;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('hold-map-scad')
    .description('Convert hold map CSV grids into OpenSCAD hold angle data')
    .version('1.0.0')
    .argument('<mainline_csv>', 'Main line (horizontal) grid CSV')
    .argument('<aux_csv>', 'Aux (vertical) grid CSV')
    .argument('<output_file>', 'OpenSCAD file to write')
    .option('--no-trace', 'Omit echo trace statements from the lookup functions')
    .option('--config <path>', 'Converter config JSON (default: config/converter-config.json)')
    .option('--log-level <level>', 'Log level: error, warn, info, debug', parseLevelOption)
    .allowExcessArguments(false)
    .showHelpAfterError(USAGE)
    .action(async (mainlineCsv: string, auxCsv: string, outputFile: string, options: ConvertCommandOptions) => {
      await runConversion(mainlineCsv, auxCsv, outputFile, options);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  initializeLogger();
  await createProgram().parseAsync(argv);
}

if (require.main === module) {
  main().catch(error => {
    logger.error('Error', error);
    process.exit(1);
  });
}
