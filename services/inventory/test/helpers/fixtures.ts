import { ALL_COLUMNS } from '../../src/sheets/columns';
import type { QrEncoder } from '../../src/qr/encoder';
import type { ToolFields } from '../../src/types';

export const HEADER: string[] = [...ALL_COLUMNS];

export const pressJig: ToolFields = {
  name: 'Press Jig',
  modelNumber: 'PJ-1',
  type: 'jig',
  storageLocation: 'Plant1',
  status: 'in_stock',
  purchaseDate: '2023-04-01',
  purchasePrice: 12500.5,
  recommendedReplacement: '2028-04',
  remarks: 'left bench',
  imageUrl: 'https://example.com/pj-1.png',
};

/** Stand-in encoder: `qr:<data>` so tests can assert which id was rendered. */
export const fakeQr: QrEncoder = {
  encode: async (data) => `qr:${data}`,
};

/** A sheet row in HEADER order. */
export function sheetRow(values: Partial<Record<string, string>>): string[] {
  return HEADER.map((column) => values[column] ?? '');
}
