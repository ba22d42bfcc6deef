/**
 * Error kinds surfaced by the inventory service.
 *
 * Every error carries a stable `kind` so the HTTP layer can map it to a status
 * code from a single table instead of inspecting messages.
 */

export type InventoryErrorKind =
  | 'config_invalid'
  | 'validation_failed'
  | 'not_found'
  | 'schema_mismatch'
  | 'id_exhausted'
  | 'store_timeout'
  | 'store_unavailable';

export abstract class InventoryError extends Error {
  abstract readonly kind: InventoryErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Missing or malformed environment. Only raised at startup.
 */
export class ConfigError extends InventoryError {
  readonly kind = 'config_invalid';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export class ValidationError extends InventoryError {
  readonly kind = 'validation_failed';
}

export class NotFoundError extends InventoryError {
  readonly kind = 'not_found';

  constructor(readonly toolId: string) {
    super(`Tool not found: ${toolId}`);
  }
}

/**
 * The sheet's header row no longer has a column the service depends on.
 */
export class SchemaMismatchError extends InventoryError {
  readonly kind = 'schema_mismatch';

  constructor(readonly missingColumns: string[]) {
    super(`Sheet header is missing column(s): ${missingColumns.join(', ')}`);
  }
}

export class IdGenerationError extends InventoryError {
  readonly kind = 'id_exhausted';

  constructor(attempts: number) {
    super(`Could not mint a unique tool id after ${attempts} attempts`);
  }
}

export class StoreError extends InventoryError {
  constructor(
    readonly kind: 'store_timeout' | 'store_unavailable',
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export type ServiceResult<T> = { ok: true; value: T } | { ok: false; error: InventoryError };

export const HTTP_STATUS_BY_KIND: Record<InventoryErrorKind, number> = {
  config_invalid: 500,
  validation_failed: 400,
  not_found: 404,
  schema_mismatch: 500,
  id_exhausted: 500,
  store_timeout: 504,
  store_unavailable: 503,
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
