import { DEFAULT_CONVERTER_CONFIG } from '../config/converter-config';
import { defaultHoldLabel, extractHoldFacts, parseAngle } from '../parsers/HoldCellExtractor';
import { HeaderPair } from '../types/hold.types';
import { auxRow, mainlineRow } from './fixtures';

const horizontal = DEFAULT_CONVERTER_CONFIG.horizontal;
const vertical = DEFAULT_CONVERTER_CONFIG.vertical;

function pairAt(rows: string[][], rowIndex: number, rowId: number | string, kickboard = false): HeaderPair {
  return { rowIndex, rowId, labelRow: rows[rowIndex], angleRow: rows[rowIndex + 1], kickboard };
}

describe('HoldCellExtractor', () => {
  describe('parseAngle', () => {
    it('should read the first run of digits', () => {
      expect(parseAngle('180˚')).toBe(180);
      expect(parseAngle('~45 deg (was 60)')).toBe(45);
      expect(parseAngle('0')).toBe(0);
    });

    it('should return null without digits', () => {
      expect(parseAngle('n/a')).toBeNull();
      expect(parseAngle('')).toBeNull();
    });
  });

  describe('defaultHoldLabel', () => {
    it('should combine column and row', () => {
      expect(defaultHoldLabel(4, 12)).toBe('C4_R12');
      expect(defaultHoldLabel(3, 'K2')).toBe('C3_RK2');
    });
  });

  describe('extractHoldFacts', () => {
    it('should emit one fact per angle cell', () => {
      const rows = [
        mainlineRow({ 0: 'Hold #', 1: '42', 3: ' 17 ', 14: 'R-1' }),
        mainlineRow({ 0: 'Angle', 1: '180˚', 2: 'none', 3: '90˚' })
      ];

      const facts = extractHoldFacts(rows, pairAt(rows, 0, 1), horizontal);

      expect(facts).toEqual([
        { column: 2, row: 1, angle: 180, label: '42', defaultLabel: 'C2_R1', orientation: 'horizontal' },
        { column: 6, row: 1, angle: 90, label: '17', defaultLabel: 'C6_R1', orientation: 'horizontal' }
      ]);
    });

    it('should stop at the last data cell of the layout', () => {
      const rows = [
        mainlineRow({ 0: 'Hold #', 14: 'R-1' }),
        mainlineRow({ 0: 'Angle', 13: '90˚', 14: '45˚' })
      ];

      const facts = extractHoldFacts(rows, pairAt(rows, 0, 1), horizontal);

      expect(facts.map(f => [f.column, f.angle])).toEqual([[26, 90]]);
    });

    it('should use column labels for ordinary pairs', () => {
      const rows = [
        auxRow({ 0: 'Aux Grid' }),
        auxRow({ 0: 'Columns', 2: 'C-9' }),
        auxRow({ 0: 'Hold #', 15: 'R-2' }),
        auxRow({ 0: 'Angle', 2: '270˚' })
      ];

      const facts = extractHoldFacts(rows, pairAt(rows, 2, 2), vertical);

      expect(facts).toEqual([
        { column: 9, row: 2, angle: 270, label: '', defaultLabel: 'C9_R2', orientation: 'vertical' }
      ]);
    });

    it('should ignore column labels for kickboard pairs', () => {
      const rows = [
        auxRow({ 0: 'Kickboard Below' }),
        auxRow({ 0: 'Columns', 2: 'C-9' }),
        auxRow({ 0: 'Hold #', 15: 'K-2' }),
        auxRow({ 0: 'Angle', 2: '90˚' })
      ];

      const facts = extractHoldFacts(rows, pairAt(rows, 2, 'K2', true), vertical);

      expect(facts).toEqual([
        { column: 3, row: 'K2', angle: 90, label: '', defaultLabel: 'C3_RK2', orientation: 'vertical' }
      ]);
    });

    it('should skip cells whose column label is C-0', () => {
      const rows = [
        mainlineRow({ 0: 'Grid' }),
        mainlineRow({ 0: 'Columns', 1: 'C-0' }),
        mainlineRow({ 0: 'Hold #', 14: 'R-1' }),
        mainlineRow({ 0: 'Angle', 1: '180˚' })
      ];

      expect(extractHoldFacts(rows, pairAt(rows, 2, 1), horizontal)).toEqual([]);
    });
  });
});
