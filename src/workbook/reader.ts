/**
 * Worksheet reader for annotated workbooks.
 */

import { readFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';

import { WorksheetNotFoundError } from '../errors.js';
import type { CellValue } from '../types/layer.js';

export interface WorksheetData {
  sheetName: string;
  /** First row of the sheet. */
  headers: CellValue[];
  /** Every following non-blank row, in sheet order. */
  rows: CellValue[][];
}

function toCellValue(value: unknown): CellValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return null;
}

/**
 * Extract headers and rows from one sheet of a parsed workbook.
 */
export function readSheet(workbook: XLSX.WorkBook, sheetName: string): WorksheetData {
  const sheet = workbook.Sheets[sheetName];
  if (!workbook.SheetNames.includes(sheetName) || !sheet) {
    throw new WorksheetNotFoundError(sheetName, workbook.SheetNames);
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: false,
    raw: true,
  });

  const [headerRow = [], ...body] = matrix;
  return {
    sheetName,
    headers: headerRow.map(toCellValue),
    rows: body.map((row) => row.map(toCellValue)),
  };
}

/**
 * Read a sheet from a workbook file. File system errors propagate unchanged.
 * Date-formatted cells come back as ISO 8601 strings.
 */
export async function readWorksheet(path: string, sheetName: string): Promise<WorksheetData> {
  const data = await readFile(path);
  const workbook = XLSX.read(data, { type: 'buffer', cellDates: true });
  return readSheet(workbook, sheetName);
}
