export type ToolId = string;

export const TOOL_STATUSES = ['in_stock', 'on_loan', 'under_maintenance', 'disposed'] as const;
export type ToolStatus = (typeof TOOL_STATUSES)[number];

export const DEFAULT_TOOL_STATUS: ToolStatus = 'in_stock';

// Everything a caller supplies on create (id and qrCode are minted server-side)
export interface ToolFields {
  name: string;
  modelNumber: string;
  type: string;
  storageLocation: string;
  status: ToolStatus;
  purchaseDate: string | null;   // YYYY-MM-DD
  purchasePrice: number | null;
  recommendedReplacement: string | null;
  remarks: string | null;
  imageUrl: string | null;
}

// Persisted shape, as reconstructed from a sheet row
export interface ToolRecord extends Omit<ToolFields, 'purchasePrice'> {
  id: ToolId;
  purchasePrice: number;         // blank cells read back as 0
}

// API shape: record plus the rendered QR image
export interface Tool extends ToolRecord {
  qrCode: string;                // base64 PNG of `id`
}

/** One data row of the sheet, keyed by header label. */
export type Row = Record<string, string>;

export function isToolStatus(value: unknown): value is ToolStatus {
  return typeof value === 'string' && (TOOL_STATUSES as readonly string[]).includes(value);
}
