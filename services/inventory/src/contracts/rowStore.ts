import type { Row } from '../types';

/**
 * Row-oriented store the inventory service persists to. Every call is an
 * independent round trip; there are no transactions and no caching.
 *
 * Implementations raise `StoreError` for transport failures.
 */
export interface RowStore {
  /** Column labels of row 1, in sheet order. */
  getHeader(): Promise<string[]>;
  /** Every data row in sheet order. The record at index `i` sits on sheet row `i + 2`. */
  getAllRecords(): Promise<Row[]>;
  /** Appends one row; `values` are already positioned for the current header. */
  appendRow(values: string[]): Promise<void>;
  /** Overwrites a single cell. Both indexes are 1-based. */
  updateCell(rowIndex: number, columnIndex: number, value: string): Promise<void>;
}

/** Sheet row number of the record at `recordIndex` in `getAllRecords()`. */
export const sheetRowOf = (recordIndex: number) => recordIndex + 2;
