import ExcelJS from 'exceljs';
import type { CellValue } from 'exceljs';
import type { Logger } from 'pino';
import { CoercionError } from '../lib/errors.js';
import type { RowRejection, SurveyRow } from '../staging/types.js';

/** How an empty cell reaches the staging core. It is also a sentinel. */
export const ABSENT_CELL = 'None';

export interface SurveySheet {
  headers: string[];
  rows: SurveyRow[];
  /** Position of each entry of `rows` among the sheet's data rows. */
  rowIndices: number[];
  /** Rows left out because a cell could not be rendered. */
  issues: RowRejection[];
}

type Primitive = string | number | boolean | Date;

function formatDate(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

function renderPrimitive(value: Primitive): string {
  if (value instanceof Date) return formatDate(value);
  if (typeof value === 'string') return value.trim();
  return String(value);
}

/**
 * Unwraps the object forms exceljs uses for rich text, hyperlinks and
 * formulas down to a primitive. Returns null for an empty cell.
 */
function unwrapCell(value: CellValue, column: number): Primitive | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value;
  if (typeof value !== 'object') return value;

  if ('error' in value) {
    throw new CoercionError(`Cell in column ${column} holds error ${value.error}`, column);
  }
  if ('richText' in value) {
    return value.richText.map((run) => run.text).join('');
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  if ('formula' in value || 'sharedFormula' in value) {
    const result = value.result;
    if (result === undefined) return null;
    if (result instanceof Date) return result;
    if (typeof result === 'object') {
      throw new CoercionError(`Formula in column ${column} evaluated to ${result.error}`, column);
    }
    return result;
  }
  throw new CoercionError(`Unsupported cell content in column ${column}`, column);
}

export function renderHeaderCell(value: CellValue, column: number): string {
  const unwrapped = unwrapCell(value, column);
  if (unwrapped === null) return '';
  return (unwrapped instanceof Date ? formatDate(unwrapped) : String(unwrapped)).replace(/\u00a0/g, ' ');
}

export function renderBodyCell(value: CellValue, column: number): string {
  const unwrapped = unwrapCell(value, column);
  return unwrapped === null ? ABSENT_CELL : renderPrimitive(unwrapped);
}

/**
 * Reads the first worksheet of an .xlsx survey export into a header sequence
 * and string rows aligned with it.
 */
export async function readSurveyWorkbook(bytes: Buffer, log?: Logger): Promise<SurveySheet> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(new Uint8Array(bytes).buffer);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CoercionError(`Error when reading Excel: ${message}`);
  }

  const worksheet = workbook.worksheets[0];
  if (!worksheet) {
    throw new CoercionError('Workbook has no worksheets');
  }

  const columnCount = worksheet.columnCount;
  const headerRow = worksheet.getRow(1);
  const headers: string[] = [];
  for (let col = 1; col <= columnCount; col++) {
    headers.push(renderHeaderCell(headerRow.getCell(col).value, col));
  }
  log?.info({ columns: headers.length }, 'Processed survey column headers');

  const rows: SurveyRow[] = [];
  const rowIndices: number[] = [];
  const issues: RowRejection[] = [];
  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber++) {
    const row = worksheet.getRow(rowNumber);
    try {
      const cells: string[] = [];
      for (let col = 1; col <= columnCount; col++) {
        cells.push(renderBodyCell(row.getCell(col).value, col));
      }
      rows.push(cells);
      rowIndices.push(rowNumber - 2);
    } catch (err) {
      if (!(err instanceof CoercionError)) throw err;
      issues.push({ rowIndex: rowNumber - 2, kind: 'shape', message: err.message });
      log?.warn({ rowNumber, error: err.message }, 'Skipping survey row with unreadable cell');
    }
  }
  log?.info({ rows: rows.length, skipped: issues.length }, 'Processed survey row values');

  return { headers, rows, rowIndices, issues };
}
