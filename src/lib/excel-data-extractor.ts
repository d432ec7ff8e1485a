import * as fs from 'fs';
import * as XLSX from 'xlsx-js-style';
import type { ExtractionResult, RawRecord, SheetLayout, SkipReason } from './excel-types';
import { categoryText, coerceMeasure, isBlankCell, parseColumnIdentifier, readCellValue } from './excel-helpers';
import { PipelineError } from './pipeline-errors';

export const DEFAULT_SHEET_LAYOUT: SheetLayout = {
  dataStartRow: 6,
  categoryColumn: 'H',
  measureColumn: 'I',
};

/**
 * Opens a workbook from disk. The file is read into memory and parsed there.
 * @param filePath Path to the .xlsx file.
 * @returns The parsed workbook.
 */
export function loadWorkbook(filePath: string): XLSX.WorkBook {
  if (!fs.existsSync(filePath)) {
    throw new PipelineError('MISSING_FILE', `Input file not found: ${filePath}`, { filePath });
  }
  const data = fs.readFileSync(filePath);
  return XLSX.read(data, { type: 'buffer' });
}

function resolveColumn(identifier: string): number {
  const index = parseColumnIdentifier(identifier);
  if (index === null) {
    throw new PipelineError('INVALID_CONFIG', `Invalid column identifier: "${identifier}"`, { identifier });
  }
  return index;
}

/**
 * Reads (state, verified loss) pairs from one sheet of a workbook.
 *
 * Rows without a state are skipped. Rows with a blank measure are skipped
 * too, never counted as zero. Measure text that doesn't parse becomes 0 and
 * the row is kept.
 *
 * @param workbook The workbook object.
 * @param sheetName The exact name of the sheet to read.
 * @param layout Where the data region starts and which columns hold the state and loss.
 * @returns The accepted records and a summary of what was skipped.
 */
export function extractRecordsFromWorkbook(
  workbook: XLSX.WorkBook,
  sheetName: string,
  layout: SheetLayout = DEFAULT_SHEET_LAYOUT
): ExtractionResult {
  const worksheet = workbook.Sheets[sheetName];
  if (!worksheet) {
    const availableSheets = [...workbook.SheetNames];
    throw new PipelineError(
      'MISSING_SHEET',
      `Sheet "${sheetName}" not found. Available sheets: ${availableSheets.map(name => `"${name}"`).join(', ')}`,
      { sheetName, availableSheets }
    );
  }

  const categoryColIdx = resolveColumn(layout.categoryColumn);
  const measureColIdx = resolveColumn(layout.measureColumn);
  const startRowIndex = layout.dataStartRow - 1;

  const records: RawRecord[] = [];
  const rowsSkipped: Record<SkipReason, number> = { emptyCategory: 0, blankCategory: 0, blankMeasure: 0 };
  let rowsScanned = 0;
  let measuresCoercedToZero = 0;

  const ref = worksheet['!ref'];
  const lastRowIndex = ref ? XLSX.utils.decode_range(ref).e.r : -1;

  for (let R = startRowIndex; R <= lastRowIndex; R++) {
    rowsScanned++;

    const categoryCell = readCellValue(worksheet, R, categoryColIdx);
    if (categoryCell.kind === 'empty') {
      rowsSkipped.emptyCategory++;
      continue;
    }
    const category = categoryText(categoryCell);
    if (!category) {
      rowsSkipped.blankCategory++;
      continue;
    }

    const measureCell = readCellValue(worksheet, R, measureColIdx);
    if (isBlankCell(measureCell)) {
      rowsSkipped.blankMeasure++;
      continue;
    }

    const { value, coerced } = coerceMeasure(measureCell);
    if (coerced) measuresCoercedToZero++;
    records.push({ category, measure: value });
  }

  return {
    records,
    summary: {
      sheetName,
      rowsScanned,
      rowsAccepted: records.length,
      rowsSkipped,
      measuresCoercedToZero,
    },
  };
}

/**
 * Opens the workbook at `filePath` and extracts records from `sheetName`.
 */
export function extractLossRecords(
  filePath: string,
  sheetName: string,
  layout: SheetLayout = DEFAULT_SHEET_LAYOUT
): ExtractionResult {
  return extractRecordsFromWorkbook(loadWorkbook(filePath), sheetName, layout);
}
