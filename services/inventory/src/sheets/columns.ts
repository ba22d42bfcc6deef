import type { ToolRecord } from '../types';

export type ToolField = keyof ToolRecord;

/**
 * Field ↔ header label table. The labels are the ones used in the
 * inventory sheet; the header row decides their order.
 */
export const COLUMN_BY_FIELD = {
  id: '工具治具ID',
  name: '名称',
  modelNumber: '型番品番',
  type: '種類',
  storageLocation: '保管場所',
  status: '状態',
  purchaseDate: '購入日',
  purchasePrice: '購入価格',
  recommendedReplacement: '推奨交換時期',
  remarks: '備考',
  imageUrl: '画像URL',
} as const satisfies Record<ToolField, string>;

export type ColumnName = (typeof COLUMN_BY_FIELD)[ToolField];

function isToolField(key: string): key is ToolField {
  return key in COLUMN_BY_FIELD;
}

export const TOOL_FIELDS: readonly ToolField[] = Object.keys(COLUMN_BY_FIELD).filter(isToolField);

export const FIELD_BY_COLUMN: ReadonlyMap<string, ToolField> = new Map(
  TOOL_FIELDS.map((field): [string, ToolField] => [COLUMN_BY_FIELD[field], field]),
);

export const ID_COLUMN = COLUMN_BY_FIELD.id;
export const STATUS_COLUMN = COLUMN_BY_FIELD.status;

export const ALL_COLUMNS: readonly ColumnName[] = Object.values(COLUMN_BY_FIELD);

// The service cannot create, list or update without these
export const REQUIRED_COLUMNS: readonly ColumnName[] = [ID_COLUMN, COLUMN_BY_FIELD.name, STATUS_COLUMN];

export interface HeaderCheck {
  missingRequired: ColumnName[];
  missingOptional: ColumnName[];
  unknown: string[];
}

export function checkHeader(header: readonly string[]): HeaderCheck {
  const present = new Set(header.map((h) => h.trim()));
  const missing = ALL_COLUMNS.filter((column) => !present.has(column));
  return {
    missingRequired: missing.filter((column) => REQUIRED_COLUMNS.includes(column)),
    missingOptional: missing.filter((column) => !REQUIRED_COLUMNS.includes(column)),
    unknown: header.filter((h) => h.trim() !== '' && !FIELD_BY_COLUMN.has(h.trim())),
  };
}

/** 1-based position of `column` in the header, or null when absent. */
export function columnIndex(header: readonly string[], column: string): number | null {
  const idx = header.findIndex((h) => h.trim() === column);
  return idx === -1 ? null : idx + 1;
}
