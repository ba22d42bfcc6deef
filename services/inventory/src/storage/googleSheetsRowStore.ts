import { StoreError, errorMessage } from '../errors';
import { rowFromValues } from '../sheets/mapper';
import type { RowStore } from '../contracts/rowStore';
import type { CallOptions, SheetsValuesApi } from '../sheets/client';
import type { Row } from '../types';

export interface GoogleSheetsRowStoreOptions {
  spreadsheetId: string;
  sheetName: string;
  timeoutMs: number;
  /** Extra attempts for reads after a failure. Writes are never retried. */
  readRetries: number;
}

/**
 * `RowStore` on top of the Sheets v4 values API. Row 1 is the header; every
 * call re-reads the sheet, nothing is cached between calls.
 */
export class GoogleSheetsRowStore implements RowStore {
  constructor(
    private readonly api: SheetsValuesApi,
    private readonly opts: GoogleSheetsRowStoreOptions,
  ) {}

  async getHeader(): Promise<string[]> {
    const values = await this.read('getHeader', this.range('1:1'));
    return (values[0] ?? []).map(toCellString);
  }

  async getAllRecords(): Promise<Row[]> {
    const values = await this.read('getAllRecords', quoteSheet(this.opts.sheetName));
    const [headerValues, ...rows] = values;
    if (!headerValues) return [];
    const header = headerValues.map(toCellString);
    return rows.map((cells) => rowFromValues(header, cells.map(toCellString)));
  }

  async appendRow(values: string[]): Promise<void> {
    await this.call('appendRow', (options) =>
      this.api.append(
        {
          spreadsheetId: this.opts.spreadsheetId,
          range: this.range('A1'),
          valueInputOption: 'RAW',
          insertDataOption: 'INSERT_ROWS',
          requestBody: { values: [values] },
        },
        options,
      ),
    );
  }

  async updateCell(rowIndex: number, columnIndex: number, value: string): Promise<void> {
    if (!Number.isInteger(rowIndex) || rowIndex < 1 || !Number.isInteger(columnIndex) || columnIndex < 1) {
      throw new RangeError(`invalid cell position row=${rowIndex} column=${columnIndex}`);
    }
    await this.call('updateCell', (options) =>
      this.api.update(
        {
          spreadsheetId: this.opts.spreadsheetId,
          range: this.range(`${columnLetter(columnIndex)}${rowIndex}`),
          valueInputOption: 'RAW',
          requestBody: { values: [[value]] },
        },
        options,
      ),
    );
  }

  private async read(label: string, range: string): Promise<unknown[][]> {
    let lastError: StoreError | undefined;
    for (let attempt = 0; attempt <= this.opts.readRetries; attempt++) {
      try {
        const res = await this.call(label, (options) =>
          this.api.get(
            {
              spreadsheetId: this.opts.spreadsheetId,
              range,
              valueRenderOption: 'UNFORMATTED_VALUE',
              dateTimeRenderOption: 'FORMATTED_STRING',
            },
            options,
          ),
        );
        return res.data.values ?? [];
      } catch (err) {
        if (!(err instanceof StoreError)) throw err;
        lastError = err;
      }
    }
    throw lastError ?? new StoreError('store_unavailable', `${label} failed`);
  }

  /**
   * Runs one remote call under the configured timeout. A fired timeout aborts
   * the request and surfaces as `store_timeout`; anything else the transport
   * throws becomes `store_unavailable`.
   */
  private async call<T>(label: string, fn: (options: CallOptions) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
        reject(new StoreError('store_timeout', `${label} timed out after ${this.opts.timeoutMs}ms`));
      }, this.opts.timeoutMs);
    });

    try {
      return await Promise.race([fn({ signal: controller.signal }), timeout]);
    } catch (err) {
      if (err instanceof StoreError) throw err;
      if (timedOut) {
        throw new StoreError('store_timeout', `${label} timed out after ${this.opts.timeoutMs}ms`, { cause: err });
      }
      throw new StoreError('store_unavailable', `${label} failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }

  private range(a1: string) {
    return `${quoteSheet(this.opts.sheetName)}!${a1}`;
  }
}

export function quoteSheet(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}

/** 1 -> A, 26 -> Z, 27 -> AA */
export function columnLetter(index: number): string {
  let n = index;
  let letters = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

function toCellString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value == null) return '';
  return String(value);
}
