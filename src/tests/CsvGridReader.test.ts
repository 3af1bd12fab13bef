import * as path from 'path';
import * as os from 'os';
import { Readable } from 'stream';
import { readCsvFile, readCsvRows } from '../parsers/CsvGridReader';

function streamOf(text: string): Readable {
  return Readable.from([Buffer.from(text, 'utf-8')]);
}

describe('CsvGridReader', () => {
  it('should keep the first row as data', async () => {
    const rows = await readCsvRows(streamOf('Main Line Grid,C-2,C-4\nHold #,42,x\n'));

    expect(rows).toEqual([
      ['Main Line Grid', 'C-2', 'C-4'],
      ['Hold #', '42', 'x']
    ]);
  });

  it('should keep rows of different widths', async () => {
    const rows = await readCsvRows(streamOf('Angle,180˚\nHold #,1,2,3,R-1\n'));

    expect(rows[0]).toEqual(['Angle', '180˚']);
    expect(rows[1]).toEqual(['Hold #', '1', '2', '3', 'R-1']);
  });

  it('should unquote cells containing commas', async () => {
    const rows = await readCsvRows(streamOf('"C-2, top",180˚\n'));

    expect(rows).toEqual([['C-2, top', '180˚']]);
  });

  it('should close the source when the parser fails', async () => {
    const input = streamOf('Hold #,1,2,3,4,5,6,7,8,9');

    await expect(readCsvRows(input, { maxRowBytes: 8 })).rejects.toBeInstanceOf(Error);
    expect(input.destroyed).toBe(true);
  });

  it('should reject when the source fails', async () => {
    const input = new Readable({
      read() {
        this.destroy(new Error('disk gone'));
      }
    });

    await expect(readCsvRows(input)).rejects.toThrow('disk gone');
  });

  it('should reject when the file does not exist', async () => {
    const missing = path.join(os.tmpdir(), 'hold-map-missing', 'nothing.csv');

    await expect(readCsvFile(missing)).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
