/**
 * Header-driven column mapping for annotated worksheets.
 *
 * Only the Navigator technique fields are recognized; any other column is
 * ignored. Header matching is exact and case-sensitive.
 */

import { MissingColumnError } from '../errors.js';
import { LAYER_COLUMNS } from '../types/layer.js';
import type { CellValue, LayerColumn, LayerTechnique } from '../types/layer.js';

/** Column index of each recognized header. `techniqueID` is always present. */
export interface ColumnMap {
  techniqueID: number;
  color?: number;
  enabled?: number;
  score?: number;
  comment?: number;
}

const COLUMN_NAMES: readonly string[] = LAYER_COLUMNS;

function isLayerColumn(value: CellValue): value is LayerColumn {
  return typeof value === 'string' && COLUMN_NAMES.includes(value);
}

/**
 * Locate the recognized headers. When a header repeats, the last occurrence
 * wins.
 */
export function mapColumns(headers: readonly CellValue[], sheetName = 'worksheet'): ColumnMap {
  const found: Partial<Record<LayerColumn, number>> = {};

  headers.forEach((header, index) => {
    if (isLayerColumn(header)) {
      found[header] = index;
    }
  });

  const { techniqueID, ...rest } = found;
  if (techniqueID === undefined) {
    throw new MissingColumnError('techniqueID', sheetName);
  }

  return { techniqueID, ...rest };
}

/**
 * Build a technique entry from one row. Keys follow the column map; cells
 * past the end of the row read as null.
 */
export function mapRow(columns: ColumnMap, cells: readonly CellValue[]): LayerTechnique {
  const cell = (index: number): CellValue => cells[index] ?? null;

  const technique: LayerTechnique = { techniqueID: cell(columns.techniqueID) };
  if (columns.color !== undefined) technique.color = cell(columns.color);
  if (columns.enabled !== undefined) technique.enabled = cell(columns.enabled);
  if (columns.score !== undefined) technique.score = cell(columns.score);
  if (columns.comment !== undefined) technique.comment = cell(columns.comment);
  return technique;
}

export function mapRows(
  headers: readonly CellValue[],
  rows: readonly (readonly CellValue[])[],
  sheetName?: string,
): LayerTechnique[] {
  const columns = mapColumns(headers, sheetName);
  return rows.map((row) => mapRow(columns, row));
}
