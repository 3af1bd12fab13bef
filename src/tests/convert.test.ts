import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Command } from 'commander';
import { createProgram, runConversion } from '../cli/convert';
import { ConfigError } from '../utils/errors';
import { mainlineRow, toCsv } from './fixtures';

function quietProgram(): Command {
  return createProgram()
    .exitOverride()
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
}

describe('convert CLI', () => {
  let tmpDir: string;
  let mainlinePath: string;
  let auxPath: string;
  let outputPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hold-map-cli-'));
    mainlinePath = path.join(tmpDir, 'mainline.csv');
    auxPath = path.join(tmpDir, 'aux.csv');
    outputPath = path.join(tmpDir, 'holds.scad');

    fs.writeFileSync(mainlinePath, toCsv([
      mainlineRow({ 0: 'Hold #', 1: '42', 14: 'R-1' }),
      mainlineRow({ 0: 'Angle', 1: '180˚' })
    ]));
    fs.writeFileSync(auxPath, toCsv([mainlineRow({ 0: 'Aux Grid' })]));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should require all three paths', async () => {
    await expect(quietProgram().parseAsync(['node', 'convert', mainlinePath, auxPath])).rejects.toMatchObject({
      code: 'commander.missingArgument',
      exitCode: 1
    });
  });

  it('should reject extra arguments', async () => {
    await expect(
      quietProgram().parseAsync(['node', 'convert', mainlinePath, auxPath, outputPath, 'extra.scad'])
    ).rejects.toMatchObject({ code: 'commander.excessArguments', exitCode: 1 });
  });

  it('should reject an unknown log level', async () => {
    await expect(
      quietProgram().parseAsync(['node', 'convert', mainlinePath, auxPath, outputPath, '--log-level', 'loud'])
    ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });

  it('should write the OpenSCAD file', async () => {
    await quietProgram().parseAsync(['node', 'convert', mainlinePath, auxPath, outputPath]);

    const lines = fs.readFileSync(outputPath, 'utf-8').split('\n');
    expect(lines).toContain('    ["2_1", [180, 0]],');
    expect(lines).toContain('    ["2_1", "42"],');
    expect(lines).toContain('        debug_1 = echo("DEBUG - get_angle:"),');
  });

  it('should drop trace statements with --no-trace', async () => {
    await quietProgram().parseAsync(['node', 'convert', mainlinePath, auxPath, outputPath, '--no-trace']);

    expect(fs.readFileSync(outputPath, 'utf-8')).not.toContain('echo(');
  });

  it('should report the run summary', async () => {
    const result = await runConversion(mainlinePath, auxPath, outputPath, { trace: true });

    expect(result.summary.totalHolds).toBe(28);
    expect(result.summary.horizontalKickboardHolds).toBe(13);
  });

  it('should fail for a missing config file', async () => {
    const run = runConversion(mainlinePath, auxPath, outputPath, {
      trace: true,
      config: path.join(tmpDir, 'nope.json')
    });

    await expect(run).rejects.toBeInstanceOf(ConfigError);
  });
});
