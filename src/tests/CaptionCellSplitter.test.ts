// src/tests/CaptionCellSplitter.test.ts
import { joinCaptionCell, splitCaptionCell, splitCaptionCells } from '../parsers/CaptionCellSplitter';
import { ParseError } from '../utils/errors';

describe('CaptionCellSplitter', () => {
  describe('splitCaptionCell', () => {
    it('should split the four stacked values', () => {
      expect(splitCaptionCell('12.5\n11.0\n23.5\n3')).toEqual({ comp: 12.5, perf: 11, total: 23.5, place: 3 });
    });

    it('should trim lines and ignore anything after the fourth', () => {
      expect(splitCaptionCell(' 9 \n8.25\n17.25\n10\nnote')).toEqual({ comp: 9, perf: 8.25, total: 17.25, place: 10 });
    });

    it('should round-trip through joinCaptionCell', () => {
      const cell = '12.5\n11.0\n23.5\n3';
      expect(joinCaptionCell(splitCaptionCell(cell))).toBe(cell);
    });

    it('should accept signed and trailing-point decimals', () => {
      expect(splitCaptionCell('+12.5\n11.\n.5\n3')).toEqual({ comp: 12.5, perf: 11, total: 0.5, place: 3 });
      expect(() => splitCaptionCell('.\n11.0\n23.5\n3')).toThrow('Non-numeric score value "."');
    });

    it('should reject cells with fewer than four lines', () => {
      expect(() => splitCaptionCell('12.5\n11.0\n23.5')).toThrow(ParseError);
    });

    it('should reject non-numeric scores and fractional placements', () => {
      expect(() => splitCaptionCell('abc\n11.0\n23.5\n3')).toThrow('Non-numeric score value "abc"');
      expect(() => splitCaptionCell('12.5\n11.0\n23.5\n3.5')).toThrow('Non-integer placement "3.5"');
    });
  });

  describe('splitCaptionCells', () => {
    it('should replace caption columns with their four sub-columns', () => {
      const split = splitCaptionCells({
        columns: ['Group', 'HomeCity', 'Music', 'SubTotal', 'Penalty'],
        rows: [
          {
            Group: 'Pulse',
            HomeCity: 'Irvine',
            Music: '10\n9.5\n19.5\n1',
            SubTotal: '10\n9.5\n19.5\n1',
            Penalty: '0.5'
          },
          { Group: 'Cadets', HomeCity: 'Allentown', Music: '  ', SubTotal: null, Penalty: null }
        ]
      });

      expect(split.columns).toEqual([
        'Group',
        'HomeCity',
        'music_comp',
        'music_perf',
        'music_total',
        'music_place',
        'subtotal_comp',
        'subtotal_perf',
        'subtotal_total',
        'subtotal_place',
        'Penalty'
      ]);
      expect(split.rows[0]).toEqual({
        Group: 'Pulse',
        HomeCity: 'Irvine',
        music_comp: 10,
        music_perf: 9.5,
        music_total: 19.5,
        music_place: 1,
        subtotal_comp: 10,
        subtotal_perf: 9.5,
        subtotal_total: 19.5,
        subtotal_place: 1,
        Penalty: '0.5'
      });
      expect(split.rows[1].music_comp).toBeNull();
      expect(split.rows[1].subtotal_total).toBeNull();
    });

    it('should return tables without caption columns unchanged', () => {
      const table = { columns: ['Group', 'HomeCity'], rows: [{ Group: 'Pulse', HomeCity: 'Irvine' }] };
      expect(splitCaptionCells(table)).toBe(table);
    });

    it('should fail on a malformed cell', () => {
      expect(() =>
        splitCaptionCells({
          columns: ['Group', 'HomeCity', 'Visual'],
          rows: [{ Group: 'Pulse', HomeCity: 'Irvine', Visual: '20.0\n19.0' }]
        })
      ).toThrow(ParseError);
    });
  });
});
