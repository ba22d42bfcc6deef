import { COLUMN_BY_FIELD, FIELD_BY_COLUMN, type ToolField } from './columns';
import { DEFAULT_TOOL_STATUS, isToolStatus } from '../types';
import type { Row, ToolFields, ToolId, ToolRecord, ToolStatus } from '../types';

export type SkipReason = 'missing_id' | 'invalid_status';

export type RowReadResult =
  | { kind: 'item'; item: ToolRecord }
  | { kind: 'skip'; reason: SkipReason };

// Status labels written by earlier versions of the sheet
const LEGACY_STATUS_LABELS: Record<string, ToolStatus> = {
  在庫: 'in_stock',
};

/**
 * Lays out one sheet row for `header`. Cells are placed by header lookup, so
 * the sheet may reorder columns freely; columns the service does not know
 * about are left blank.
 */
export function toRow(id: ToolId, fields: ToolFields, header: readonly string[]): string[] {
  return header.map((label) => {
    const field = FIELD_BY_COLUMN.get(label.trim());
    if (!field) return '';
    if (field === 'id') return id;
    return toCell(fields[field]);
  });
}

/** Inverse of `toRow`; `row` is keyed by header label. */
export function fromRow(row: Row): RowReadResult {
  const id = cell(row, 'id');
  if (id.trim() === '') return { kind: 'skip', reason: 'missing_id' };

  const status = parseStatus(cell(row, 'status'));
  if (!status) return { kind: 'skip', reason: 'invalid_status' };

  return {
    kind: 'item',
    item: {
      id,
      name: cell(row, 'name'),
      modelNumber: cell(row, 'modelNumber'),
      type: cell(row, 'type'),
      storageLocation: cell(row, 'storageLocation'),
      status,
      purchaseDate: optionalCell(row, 'purchaseDate'),
      purchasePrice: parsePrice(cell(row, 'purchasePrice')),
      recommendedReplacement: optionalCell(row, 'recommendedReplacement'),
      remarks: optionalCell(row, 'remarks'),
      imageUrl: optionalCell(row, 'imageUrl'),
    },
  };
}

/** Zips a header with a row of cell values; short rows read as blank. */
export function rowFromValues(header: readonly string[], values: readonly string[]): Row {
  const row: Row = {};
  header.forEach((label, idx) => {
    if (label.trim() === '') return;
    row[label.trim()] = values[idx] ?? '';
  });
  return row;
}

export function parsePrice(raw: string): number {
  const trimmed = raw.trim();
  if (trimmed === '') return 0;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : 0;
}

function parseStatus(raw: string): ToolStatus | null {
  const value = raw.trim();
  if (value === '') return DEFAULT_TOOL_STATUS;
  if (isToolStatus(value)) return value;
  return LEGACY_STATUS_LABELS[value] ?? null;
}

function cell(row: Row, field: ToolField): string {
  return row[COLUMN_BY_FIELD[field]] ?? '';
}

function optionalCell(row: Row, field: ToolField): string | null {
  const value = cell(row, field);
  return value === '' ? null : value;
}

function toCell(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  return typeof value === 'number' ? String(value) : value;
}
