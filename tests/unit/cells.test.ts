import { cellAt, cellNumber, cellText, isEmptyRow } from '../../src/utils/cells';

describe('cells', () => {
  describe('cellNumber', () => {
    it('should read numeric strings and numbers', () => {
      expect(cellNumber(' 7 ')).toBe(7);
      expect(cellNumber('-2.5')).toBe(-2.5);
      expect(cellNumber('1e3')).toBe(1000);
      expect(cellNumber(4)).toBe(4);
    });

    it('should treat missing and non-numeric values as 0', () => {
      expect(cellNumber('n/a')).toBe(0);
      expect(cellNumber('')).toBe(0);
      expect(cellNumber('$5')).toBe(0);
      expect(cellNumber('12abc')).toBe(0);
      expect(cellNumber(null)).toBe(0);
      expect(cellNumber(undefined)).toBe(0);
      expect(cellNumber(true)).toBe(0);
      expect(cellNumber(Number.NaN)).toBe(0);
    });
  });

  describe('cellAt', () => {
    it('should return null past the end of a short row', () => {
      expect(cellAt(['Member Q'], 0)).toBe('Member Q');
      expect(cellAt(['Member Q'], 3)).toBeNull();
    });
  });

  describe('cellText and isEmptyRow', () => {
    it('should trim text and treat blank cells as empty', () => {
      expect(cellText('  Jane ')).toBe('Jane');
      expect(cellText(null)).toBe('');
      expect(isEmptyRow(['', ' ', null])).toBe(true);
      expect(isEmptyRow(['', 'x'])).toBe(false);
    });
  });
});
