import type { CellRow, CellValue } from '../types/models.js';

/**
 * Cell contents as trimmed text; null and undefined become ''
 */
export function cellText(value: CellValue): string {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value).trim();
}

export function cellAt(row: CellRow, column: number): CellValue {
  return column < row.length ? row[column] : null;
}

export function isEmptyRow(row: CellRow): boolean {
  return row.every((value) => cellText(value) === '');
}

/**
 * Coerce a cell to a number. Anything missing or non-numeric is 0.
 */
export function cellNumber(value: CellValue): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value !== 'string') {
    return 0;
  }

  const text = value.trim();
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/.test(text)) {
    return 0;
  }
  return Number(text);
}
