import * as XLSX from 'xlsx-js-style';
import type { CellValue } from './excel-types';

const DECIMAL_LITERAL_REGEX = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses a single column identifier (letter or 1-indexed number) into a 0-indexed column number.
 * @param identifier The string to parse (e.g., "H" or "8").
 * @returns A 0-indexed column number or null if invalid.
 */
export function parseColumnIdentifier(identifier: string): number | null {
  const part = identifier.trim().toUpperCase();
  if (!part) return null;

  if (/^[A-Z]+$/.test(part)) {
    return XLSX.utils.decode_col(part);
  } else if (/^\d+$/.test(part)) {
    const colIndex = parseInt(part, 10) - 1;
    return colIndex >= 0 ? colIndex : null;
  }
  return null;
}

/**
 * Reads one cell of a worksheet as a CellValue.
 * @param worksheet The worksheet to read from.
 * @param rowIndex 0-indexed row.
 * @param colIndex 0-indexed column.
 */
export function readCellValue(worksheet: XLSX.WorkSheet, rowIndex: number, colIndex: number): CellValue {
  const address = XLSX.utils.encode_cell({ r: rowIndex, c: colIndex });
  const cell: XLSX.CellObject | undefined = worksheet[address];
  if (!cell || cell.v === undefined || cell.v === null) {
    return { kind: 'empty' };
  }

  switch (cell.t) {
    case 'n':
      return typeof cell.v === 'number' ? { kind: 'number', value: cell.v } : { kind: 'text', value: String(cell.v) };
    case 'b':
      return { kind: 'number', value: cell.v === true ? 1 : 0 };
    case 'd':
      return cell.v instanceof Date ? { kind: 'number', value: cell.v.getTime() } : { kind: 'text', value: String(cell.v) };
    case 'e':
      return { kind: 'text', value: cell.w ?? String(cell.v) };
    case 'z':
      return { kind: 'empty' };
    default:
      return { kind: 'text', value: String(cell.v) };
  }
}

/** True for an absent cell or text that is empty after trimming. */
export function isBlankCell(cell: CellValue): boolean {
  switch (cell.kind) {
    case 'empty':
      return true;
    case 'text':
      return cell.value.trim() === '';
    case 'number':
      return false;
  }
}

/**
 * Converts a measure cell to a number. Text is trimmed and stripped of
 * thousands separators before parsing; text that still isn't a decimal
 * literal becomes 0 instead of failing the run.
 * @returns The numeric value and whether it was coerced to zero.
 */
export function coerceMeasure(cell: CellValue): { value: number; coerced: boolean } {
  switch (cell.kind) {
    case 'number':
      return { value: cell.value, coerced: false };
    case 'empty':
      return { value: 0, coerced: true };
    case 'text': {
      const cleaned = cell.value.trim().replace(/,/g, '');
      if (!DECIMAL_LITERAL_REGEX.test(cleaned)) {
        return { value: 0, coerced: true };
      }
      return { value: parseFloat(cleaned), coerced: false };
    }
  }
}

/** Text of a category cell, trimmed. Empty cells give an empty string. */
export function categoryText(cell: CellValue): string {
  switch (cell.kind) {
    case 'empty':
      return '';
    case 'number':
      return String(cell.value);
    case 'text':
      return cell.value.trim();
  }
}
