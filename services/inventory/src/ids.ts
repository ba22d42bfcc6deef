import { randomBytes } from 'crypto';
import { IdGenerationError } from './errors';
import type { ToolId } from './types';

const ID_PREFIX = 'TOOL';
const SUFFIX_BYTES = 3;
const MAX_ATTEMPTS = 10;

export const TOOL_ID_PATTERN = /^TOOL-\d{14}-[0-9a-f]{6}$/;

export interface IdSource {
  now?: () => Date;
  randomSuffix?: () => string;
}

/**
 * Mints `TOOL-<yyyymmddhhmmss UTC>-<6 hex>` and retries on collision with
 * `existing`. Gives up with `IdGenerationError` after a bounded number of tries.
 */
export function generateToolId(existing: ReadonlySet<ToolId>, source: IdSource = {}): ToolId {
  const now = source.now ?? (() => new Date());
  const randomSuffix = source.randomSuffix ?? (() => randomBytes(SUFFIX_BYTES).toString('hex'));

  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const candidate = `${ID_PREFIX}-${utcStamp(now())}-${randomSuffix()}`;
    if (!existing.has(candidate)) return candidate;
  }
  throw new IdGenerationError(MAX_ATTEMPTS);
}

export function utcStamp(date: Date): string {
  // 2024-05-01T09:03:07.123Z -> 20240501090307
  return date.toISOString().slice(0, 19).replace(/[-:T]/g, '');
}
