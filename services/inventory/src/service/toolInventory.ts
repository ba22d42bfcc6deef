import type { FastifyBaseLogger } from 'fastify';
import { generateToolId, type IdSource } from '../ids';
import { InventoryError, NotFoundError, SchemaMismatchError, type ServiceResult } from '../errors';
import { ID_COLUMN, STATUS_COLUMN, checkHeader, columnIndex } from '../sheets/columns';
import { fromRow, toRow, type SkipReason } from '../sheets/mapper';
import { SerialQueue } from '../storage/serialQueue';
import { sheetRowOf, type RowStore } from '../contracts/rowStore';
import type { QrEncoder } from '../qr/encoder';
import type { Row, Tool, ToolFields, ToolId, ToolRecord, ToolStatus } from '../types';

export interface ToolInventoryDeps {
  store: RowStore;
  qr: QrEncoder;
  log: FastifyBaseLogger;
  ids?: IdSource;
  /** Share one queue between services that write to the same sheet. */
  writeQueue?: SerialQueue;
}

/**
 * Create / list / status-update over a `RowStore`.
 *
 * Writes go through a single in-process queue, so the id collision check and
 * the status lookup cannot interleave with another write from this process.
 * Writers in other processes are not coordinated.
 */
export class ToolInventory {
  private readonly store: RowStore;
  private readonly qr: QrEncoder;
  private readonly log: FastifyBaseLogger;
  private readonly ids: IdSource;
  private readonly writes: SerialQueue;

  constructor(deps: ToolInventoryDeps) {
    this.store = deps.store;
    this.qr = deps.qr;
    this.log = deps.log;
    this.ids = deps.ids ?? {};
    this.writes = deps.writeQueue ?? new SerialQueue();
  }

  /**
   * Checks the live header against the column table. Missing core columns
   * fail; missing optional ones are only logged.
   */
  async verifySchema(): Promise<ServiceResult<string[]>> {
    return this.attempt(async () => {
      const header = await this.store.getHeader();
      const check = checkHeader(header);
      if (check.missingRequired.length > 0) throw new SchemaMismatchError(check.missingRequired);
      if (check.missingOptional.length > 0) {
        this.log.warn({ missing: check.missingOptional }, 'Sheet header lacks optional columns; they will not be stored');
      }
      if (check.unknown.length > 0) {
        this.log.info({ unknown: check.unknown }, 'Sheet header has columns the service leaves blank');
      }
      return header;
    });
  }

  async create(fields: ToolFields): Promise<ServiceResult<Tool>> {
    return this.attempt(() =>
      this.writes.run(async () => {
        const header = await this.store.getHeader();
        if (columnIndex(header, ID_COLUMN) === null) throw new SchemaMismatchError([ID_COLUMN]);

        // every id cell counts, including rows the listing would skip
        const rows = await this.store.getAllRecords();
        const existing = new Set(rows.map((row) => row[ID_COLUMN] ?? '').filter((id) => id !== ''));
        const id = generateToolId(existing, this.ids);

        await this.store.appendRow(toRow(id, fields, header));
        this.log.info({ toolId: id }, 'Tool registered');

        const { purchasePrice, ...rest } = fields;
        return this.withQr({ ...rest, id, purchasePrice: purchasePrice ?? 0 });
      }),
    );
  }

  async list(): Promise<ServiceResult<Tool[]>> {
    return this.attempt(async () => {
      const records = this.readAll(await this.store.getAllRecords());
      return Promise.all(records.map((record) => this.withQr(record)));
    });
  }

  async updateStatus(id: ToolId, status: ToolStatus): Promise<ServiceResult<Tool>> {
    return this.attempt(() =>
      this.writes.run(async () => {
        const records = await this.store.getAllRecords();
        const recordIndex = records.findIndex((row) => (row[ID_COLUMN] ?? '') === id);
        if (recordIndex === -1) throw new NotFoundError(id);

        // looked up on every call: the header may have been edited since the last one
        const header = await this.store.getHeader();
        const statusColumn = columnIndex(header, STATUS_COLUMN);
        if (statusColumn === null) throw new SchemaMismatchError([STATUS_COLUMN]);

        await this.store.updateCell(sheetRowOf(recordIndex), statusColumn, status);
        this.log.info({ toolId: id, status }, 'Tool status updated');

        // read back; another process may have written in between
        const updated = this.readAll(await this.store.getAllRecords()).find((tool) => tool.id === id);
        if (!updated) throw new NotFoundError(id);
        return this.withQr(updated);
      }),
    );
  }

  private readAll(rows: Row[]): ToolRecord[] {
    const tools: ToolRecord[] = [];
    const skipped: Partial<Record<SkipReason, number>> = {};
    let skippedCount = 0;
    for (const row of rows) {
      const result = fromRow(row);
      if (result.kind === 'item') {
        tools.push(result.item);
      } else {
        skipped[result.reason] = (skipped[result.reason] ?? 0) + 1;
        skippedCount += 1;
      }
    }
    if (skippedCount > 0) {
      this.log.warn({ skipped, total: rows.length }, `Skipped ${skippedCount} unreadable sheet row(s)`);
    }
    return tools;
  }

  private async withQr(record: ToolRecord): Promise<Tool> {
    return { ...record, qrCode: await this.qr.encode(record.id) };
  }

  private async attempt<T>(fn: () => Promise<T>): Promise<ServiceResult<T>> {
    try {
      return { ok: true, value: await fn() };
    } catch (err) {
      if (err instanceof InventoryError) return { ok: false, error: err };
      throw err;
    }
  }
}
